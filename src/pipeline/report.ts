import type { PipelineInput, PipelineResult, RankedResult } from './types';

export interface ReportEntry extends RankedResult {
  title: string;
  decision: string;
  forum_url: string | null;
}

export interface RunReport {
  venue: string;
  year: number;
  success: boolean;
  state: string;
  history: string[];
  cancelled?: boolean;
  keywords?: string[];
  synonyms?: Record<string, string[]>;
  stats?: { corpusSize: number; selected: number; degradedEvaluations: number; processingTimeMs: number };
  results?: ReportEntry[];
  error?: { stage: string; message: string };
}

/** JSON-ready view of a run, with titles joined back onto the ranking. */
export function buildReport(input: PipelineInput, result: PipelineResult): RunReport {
  const base = {
    venue: input.venue,
    year: input.year,
    success: result.success,
    state: result.state,
    history: result.history,
  };
  if (!result.success) {
    return { ...base, error: { stage: result.stage, message: result.error.message } };
  }
  return {
    ...base,
    cancelled: result.cancelled,
    keywords: result.keywords,
    synonyms: result.synonyms,
    stats: {
      corpusSize: result.stats.corpusSize,
      selected: result.selected.length,
      degradedEvaluations: result.stats.degradedEvaluations,
      processingTimeMs: result.stats.processingTimeMs,
    },
    results: result.ranked.map((entry) => {
      const paper = result.papers.get(entry.paper_id);
      return {
        ...entry,
        title: paper?.title ?? '',
        decision: paper?.decision ?? '',
        forum_url: paper?.forum_url ?? null,
      };
    }),
  };
}
