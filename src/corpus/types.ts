import { z } from 'zod';

export const PaperRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  abstract: z.string().default(''),
  keywords: z.array(z.string()).default([]),
  decision: z.string().default(''),
  presentation_type: z.string().default(''),
  review_scores: z.array(z.number()).default([]),
  meta_review_text: z.string().default(''),
  review_texts: z.array(z.string()).default([]),
  venue: z.string(),
  year: z.number().int(),
  authors: z.array(z.string()).optional(),
  pdf_url: z.string().optional(),
  forum_url: z.string().optional(),
});

export type PaperRecord = z.infer<typeof PaperRecordSchema>;

export const PaperRecordListSchema = z.array(PaperRecordSchema);

export interface CorpusProvider {
  fetch(venue: string, year: number): Promise<PaperRecord[]>;
}

export class InMemoryCorpusProvider implements CorpusProvider {
  constructor(private readonly papers: PaperRecord[]) {}

  async fetch(venue: string, year: number): Promise<PaperRecord[]> {
    const venueKey = venue.toLowerCase();
    return this.papers.filter(
      (paper) => paper.venue.toLowerCase() === venueKey && paper.year === year
    );
  }
}
