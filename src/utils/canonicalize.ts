/**
 * Normal form shared by keywords, synonym variants and matching:
 * trimmed, internal whitespace collapsed to one space, lowercased.
 */
export function normalizeTerm(input: string): string {
  if (!input) return '';
  return input.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Normalizes and deduplicates while keeping first-seen order. Empty results are dropped.
 */
export function normalizeTerms(inputs: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const input of inputs) {
    const term = normalizeTerm(input);
    if (term && !seen.has(term)) {
      seen.add(term);
      result.push(term);
    }
  }
  return result;
}

/**
 * "Graph Neural Network (GNN)" yields both the long form and the alias so either can match.
 */
export function extractAliases(input: string): string[] {
  if (!input) return [];

  const trimmed = input.trim();
  const parentheticalMatch = trimmed.match(/^(.+?)\s*\(([^)]+)\)\s*$/);
  if (parentheticalMatch) {
    const name = (parentheticalMatch[1] ?? '').trim();
    const alias = (parentheticalMatch[2] ?? '').trim();
    return [name, alias].filter(Boolean);
  }
  return trimmed ? [trimmed] : [];
}

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive pattern for a normalized term. The term must start at a word
 * boundary, so "graph" does not hit "graphene" or "subgraph"; a plural "s" or "es"
 * is allowed before the closing boundary, so "diffusion model" hits "diffusion models".
 */
function termPattern(term: string): RegExp {
  const body = escapeRegExp(term).replace(/ /g, '\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?:s|es)?(?![\\p{L}\\p{N}])`, 'iu');
}

/**
 * Pass a map to reuse compiled patterns across calls; its lifetime is the caller's.
 */
export function containsTerm(text: string, term: string, patterns?: Map<string, RegExp>): boolean {
  if (!term) return false;
  let pattern = patterns?.get(term);
  if (!pattern) {
    pattern = termPattern(term);
    patterns?.set(term, pattern);
  }
  return pattern.test(text);
}
