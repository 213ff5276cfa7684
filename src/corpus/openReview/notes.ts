import { z } from 'zod';
import { DEFAULT_STRATEGIES, ReviewSignalStrategy, scoreFromReview, selectStrategy } from '../reviewSignal';
import type { PaperRecord } from '../types';

const ReplySchema = z.object({
  id: z.string().optional(),
  invitations: z.array(z.string()).default([]),
  content: z.record(z.unknown()).default({}),
});

export const NoteSchema = z.object({
  id: z.string().min(1),
  content: z.record(z.unknown()).default({}),
  details: z
    .object({
      replies: z.array(ReplySchema).default([]),
    })
    .default({}),
});

export const NotesPageSchema = z.object({
  notes: z.array(NoteSchema),
  count: z.number().optional(),
});

export type OpenReviewReply = z.infer<typeof ReplySchema>;
export type OpenReviewNote = z.infer<typeof NoteSchema>;

const SCORE_FIELDS = ['rating', 'overall_recommendation', 'score', 'recommendation'];
const REVIEW_TEXT_FIELDS = [
  'summary',
  'strengths_and_weaknesses',
  'strengths',
  'weaknesses',
  'main_review',
  'review',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** API v2 wraps every content field as `{ value: ... }`. */
export function unwrap(value: unknown): unknown {
  return isRecord(value) && 'value' in value ? value.value : value;
}

function unwrapContent(content: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(content).map(([key, value]) => [key, unwrap(value)]));
}

function text(content: Record<string, unknown>, ...keys: string[]): string {
  for (const key of keys) {
    const value = unwrap(content[key]);
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number') return String(value);
  }
  return '';
}

function list(content: Record<string, unknown>, key: string): string[] {
  const value = unwrap(content[key]);
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function hasInvitation(reply: OpenReviewReply, fragment: string): boolean {
  return reply.invitations.some((invitation) => invitation.includes(fragment));
}

/**
 * Official reviews only: rebuttals and comments posted under the review
 * invitation are skipped, as are notes without a score that look too thin
 * to be a review.
 */
export function isOfficialReview(reply: OpenReviewReply): boolean {
  if (!hasInvitation(reply, 'Official_Review')) return false;
  const fields = Object.keys(reply.content);
  if (fields.length === 0) return false;
  if (fields.length === 1 && (fields[0] === 'comment' || fields[0] === 'rebuttal')) return false;
  if (SCORE_FIELDS.some((field) => field in reply.content)) return true;
  return 'summary' in reply.content && fields.length >= 5;
}

export function presentationType(decision: string, venueLabel: string): string {
  const haystack = `${decision} ${venueLabel}`.toLowerCase();
  if (haystack.includes('oral')) return 'oral';
  if (haystack.includes('spotlight')) return 'spotlight';
  if (haystack.includes('poster')) return 'poster';
  return '';
}

export function isAccepted(paper: Pick<PaperRecord, 'decision'>): boolean {
  return paper.decision.toLowerCase().includes('accept');
}

export function noteToPaperRecord(
  note: OpenReviewNote,
  venue: string,
  year: number,
  strategies: readonly ReviewSignalStrategy[] = DEFAULT_STRATEGIES
): PaperRecord {
  const strategy = selectStrategy(venue, strategies);
  const replies = note.details.replies;
  const reviews = replies.filter(isOfficialReview).map((reply) => unwrapContent(reply.content));

  const decisionNote = replies.find((reply) => hasInvitation(reply, 'Decision'));
  const metaNote = replies.find((reply) => hasInvitation(reply, 'Meta_Review'));
  const decision = decisionNote ? text(decisionNote.content, 'decision') : '';
  const venueLabel = text(note.content, 'venue');

  return {
    id: note.id,
    title: text(note.content, 'title'),
    abstract: text(note.content, 'abstract'),
    keywords: list(note.content, 'keywords'),
    authors: list(note.content, 'authors'),
    decision,
    presentation_type: presentationType(decision, venueLabel),
    review_scores: reviews
      .map((review) => scoreFromReview(review, strategy))
      .filter((score): score is number => score !== null),
    meta_review_text: metaNote ? text(metaNote.content, 'metareview', 'recommendation', 'summary') : '',
    review_texts: reviews
      .map((review) =>
        REVIEW_TEXT_FIELDS.map((field) => text(review, field))
          .filter(Boolean)
          .join('\n')
      )
      .filter(Boolean),
    venue,
    year,
    pdf_url: `https://openreview.net/pdf?id=${note.id}`,
    forum_url: `https://openreview.net/forum?id=${note.id}`,
  };
}
