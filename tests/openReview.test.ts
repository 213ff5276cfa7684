import { describe, it, expect, beforeEach } from '@jest/globals';
import fetch, { Response } from 'node-fetch';
import { UpstreamUnavailableError } from '../src/agents/errors';
import { OpenReviewClient, venueId } from '../src/corpus/openReview/client';
import { isAccepted, NoteSchema, noteToPaperRecord, presentationType } from '../src/corpus/openReview/notes';
import { silentLogger } from '../src/utils/logger';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual<Record<string, unknown>>('node-fetch');
  return { __esModule: true, ...actual, default: jest.fn() };
});

const mockedFetch = jest.mocked(fetch);

const INVITATION = 'NeurIPS.cc/2025/Conference/Submission1/-';

function rawNote(id: string, decision: string | null = 'Accept (spotlight)') {
  return {
    id,
    content: {
      title: { value: 'Molecular Graph Synthesis' },
      abstract: { value: ' We generate graphs. ' },
      keywords: { value: ['graph generation', 'diffusion'] },
      authors: { value: ['A. Author'] },
      venue: { value: 'NeurIPS 2025 spotlight' },
    },
    details: {
      replies: [
        {
          invitations: [`${INVITATION}/Official_Review`],
          content: {
            rating: { value: '8: accept' },
            confidence: { value: '4: confident' },
            summary: { value: 'Solid work.' },
            strengths_and_weaknesses: { value: 'Clear writing.' },
          },
        },
        {
          invitations: [`${INVITATION}/Official_Review`],
          content: { rating: { value: 6 }, summary: { value: 'Fine.' } },
        },
        {
          invitations: [`${INVITATION}/Official_Review`],
          content: { comment: { value: 'Thanks for the rebuttal.' } },
        },
        { invitations: [`${INVITATION}/Meta_Review`], content: { metareview: { value: 'Accept as spotlight.' } } },
        ...(decision ? [{ invitations: [`${INVITATION}/Decision`], content: { decision: { value: decision } } }] : []),
      ],
    },
  };
}

describe('noteToPaperRecord', () => {
  it('converts a submission with its replies', () => {
    const record = noteToPaperRecord(NoteSchema.parse(rawNote('abc123')), 'NeurIPS', 2025);

    expect(record).toEqual({
      id: 'abc123',
      title: 'Molecular Graph Synthesis',
      abstract: 'We generate graphs.',
      keywords: ['graph generation', 'diffusion'],
      authors: ['A. Author'],
      decision: 'Accept (spotlight)',
      presentation_type: 'spotlight',
      review_scores: [8, 6],
      meta_review_text: 'Accept as spotlight.',
      review_texts: ['Solid work.\nClear writing.', 'Fine.'],
      venue: 'NeurIPS',
      year: 2025,
      pdf_url: 'https://openreview.net/pdf?id=abc123',
      forum_url: 'https://openreview.net/forum?id=abc123',
    });
  });

  it('reads the score field of the venue strategy', () => {
    const note = NoteSchema.parse({
      id: 'icml1',
      content: { title: { value: 'T' } },
      details: {
        replies: [
          {
            invitations: ['ICML.cc/2024/Conference/Submission9/-/Official_Review'],
            content: { overall_recommendation: { value: 4 }, summary: { value: 'Good.' } },
          },
        ],
      },
    });
    expect(noteToPaperRecord(note, 'ICML', 2024).review_scores).toEqual([4]);
  });

  it('tolerates notes without replies', () => {
    const record = noteToPaperRecord(NoteSchema.parse({ id: 'bare', content: {} }), 'ICLR', 2025);
    expect(record).toMatchObject({ title: '', decision: '', review_scores: [], review_texts: [] });
  });
});

describe('presentationType / isAccepted', () => {
  it('derives the presentation from the decision or venue label', () => {
    expect(presentationType('Accept (oral)', '')).toBe('oral');
    expect(presentationType('', 'ICML 2024 Poster')).toBe('poster');
    expect(presentationType('Reject', '')).toBe('');
  });

  it('treats any accept decision as accepted', () => {
    expect(isAccepted({ decision: 'Accept (poster)' })).toBe(true);
    expect(isAccepted({ decision: 'Reject' })).toBe(false);
  });
});

describe('OpenReviewClient', () => {
  beforeEach(() => {
    mockedFetch.mockReset();
  });

  function page(notes: unknown[], count: number): Response {
    return new Response(JSON.stringify({ notes, count }), { status: 200 });
  }

  it('pages through submissions and retries an overloaded server', async () => {
    mockedFetch
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(page([rawNote('n1'), rawNote('n2')], 3))
      .mockResolvedValueOnce(page([rawNote('n3')], 3));
    const client = new OpenReviewClient({
      baseUrl: 'http://openreview.test',
      pageSize: 2,
      retry: { tries: 2, baseMs: 1, jitterMs: 0 },
      logger: silentLogger,
    });

    const papers = await client.fetchPapers('NeurIPS', 2025);

    expect(papers.map((p) => p.id)).toEqual(['n1', 'n2', 'n3']);
    expect(mockedFetch).toHaveBeenCalledTimes(3);
    const lastUrl = new URL(String(mockedFetch.mock.calls[2]?.[0]));
    expect(lastUrl.searchParams.get('invitation')).toBe(`${venueId('NeurIPS', 2025)}/-/Submission`);
    expect(lastUrl.searchParams.get('offset')).toBe('2');
    expect(lastUrl.searchParams.get('details')).toBe('replies');
  });

  it('filters to accepted papers on request', async () => {
    mockedFetch.mockResolvedValueOnce(page([rawNote('a1'), rawNote('r1', 'Reject'), rawNote('u1', null)], 3));
    const client = new OpenReviewClient({ baseUrl: 'http://openreview.test', logger: silentLogger });

    const papers = await client.fetchPapers('NeurIPS', 2025, { acceptedOnly: true });

    expect(papers.map((p) => p.id)).toEqual(['a1']);
  });

  it('gives up with UpstreamUnavailableError when the server stays down', async () => {
    mockedFetch.mockImplementation(async () => new Response('down', { status: 502 }));
    const client = new OpenReviewClient({
      baseUrl: 'http://openreview.test',
      retry: { tries: 2, baseMs: 1, jitterMs: 0 },
      logger: silentLogger,
    });

    await expect(client.fetchSubmissions('NeurIPS', 2025)).rejects.toBeInstanceOf(UpstreamUnavailableError);
    expect(mockedFetch).toHaveBeenCalledTimes(2);
  });
});
