import type { PaperRecord } from '../corpus/types';
import { containsTerm } from '../utils/canonicalize';
import type { CandidateScore, SynonymSet } from './types';

type PatternCache = Map<string, RegExp>;

// Patterns are case-insensitive and whitespace-tolerant, so paper text is matched as stored.
function variantHits(paper: PaperRecord, variant: string, patterns: PatternCache): boolean {
  return (
    containsTerm(paper.title, variant, patterns) ||
    containsTerm(paper.abstract, variant, patterns) ||
    paper.keywords.some((keyword) => containsTerm(keyword, variant, patterns))
  );
}

/**
 * Fraction of keyword groups with at least one variant present in the
 * paper's title, abstract or keyword list. A group counts once however many
 * of its variants hit.
 */
export function scorePaper(
  paper: PaperRecord,
  synonyms: SynonymSet,
  patterns: PatternCache = new Map()
): CandidateScore {
  const groups = Object.values(synonyms);
  const matched = new Set<string>();
  let matchedGroups = 0;

  for (const variants of groups) {
    let groupHit = false;
    for (const variant of variants) {
      if (variantHits(paper, variant, patterns)) {
        matched.add(variant);
        groupHit = true;
      }
    }
    if (groupHit) matchedGroups++;
  }

  return {
    paper_id: paper.id,
    initial_score: groups.length === 0 ? 0 : matchedGroups / groups.length,
    matched_terms: [...matched].sort(),
  };
}

/**
 * One score per paper, zero-match papers included. Compiled patterns live for this call only.
 */
export function scoreCandidates(papers: readonly PaperRecord[], synonyms: SynonymSet): CandidateScore[] {
  const patterns: PatternCache = new Map();
  return papers.map((paper) => scorePaper(paper, synonyms, patterns));
}
