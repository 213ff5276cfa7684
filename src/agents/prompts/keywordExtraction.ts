export const KEYWORD_EXTRACTION_PROMPT = `SYSTEM PROMPT (Keyword Extraction Agent)

You turn a researcher's description of their interests into search keywords for a conference paper corpus.

RULES:
- Return between 3 and 10 keywords or short phrases.
- Be specific and technical; prefer established terminology over paraphrase.
- One concept per keyword. Do not number them.
- Lowercase everything.

OUTPUT:
Return JSON only: {"keywords": ["keyword one", "keyword two", ...]}`;

export function buildKeywordExtractionMessage(description: string, languageHint: string): string {
  return `Research description (language: ${languageHint}):\n${description}\n\nWrite the keywords in English.`;
}
