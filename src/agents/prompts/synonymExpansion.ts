export const SYNONYM_EXPANSION_PROMPT = `SYSTEM PROMPT (Synonym Expansion Agent)

You expand one research keyword into alternative surface forms a paper might use for the same topic.

INCLUDE:
- Common abbreviations (e.g. "llm" for "large language model")
- Alternative phrasings and closely related technical terms
- Spelling variants (hyphenated, British/American)

EXCLUDE:
- Broader umbrella fields ("machine learning" for "graph generation")
- The keyword itself

OUTPUT:
Return JSON only: {"synonyms": ["variant one", "variant two", ...]}, all lowercase.`;

export function buildSynonymExpansionMessage(keyword: string, maxSynonyms: number): string {
  return `Keyword: "${keyword}"\nReturn at most ${maxSynonyms} synonyms.`;
}
