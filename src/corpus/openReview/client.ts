import fetch, { FetchError, Response } from 'node-fetch';
import { AGENT_CONFIG } from '../../agents/config';
import { CancelledError, UpstreamUnavailableError } from '../../agents/errors';
import { limit } from '../../utils/limiter';
import { createConsoleLogger, errorMessage, Logger } from '../../utils/logger';
import { RetryOptions, withRetry } from '../../utils/retry';
import type { FileCorpusProvider } from '../fileCorpus';
import type { ReviewSignalStrategy } from '../reviewSignal';
import type { CorpusProvider, PaperRecord } from '../types';
import { isAccepted, noteToPaperRecord, NotesPageSchema, OpenReviewNote } from './notes';

export interface OpenReviewClientOptions {
  baseUrl?: string;
  token?: string;
  pageSize?: number;
  retry?: Pick<RetryOptions, 'tries' | 'baseMs' | 'maxMs' | 'jitterMs'>;
  logger?: Logger;
}

export interface FetchPapersOptions {
  acceptedOnly?: boolean;
  strategies?: readonly ReviewSignalStrategy[];
  signal?: AbortSignal;
}

function isUnavailableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function venueId(venue: string, year: number): string {
  return `${venue}.cc/${year}/Conference`;
}

export class OpenReviewClient {
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly retry: NonNullable<OpenReviewClientOptions['retry']>;
  private readonly logger: Logger;

  constructor(private readonly options: OpenReviewClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://api2.openreview.net';
    this.pageSize = options.pageSize ?? 1000;
    this.retry = {
      tries: AGENT_CONFIG.upstreamTries,
      baseMs: AGENT_CONFIG.backoffBaseMs,
      maxMs: AGENT_CONFIG.backoffMaxMs,
      jitterMs: AGENT_CONFIG.backoffJitterMs,
      ...options.retry,
    };
    this.logger = options.logger ?? createConsoleLogger('OpenReview');
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = { Accept: 'application/json' };
    if (this.options.token) h.Authorization = `Bearer ${this.options.token}`;
    return h;
  }

  private async getPage(invitation: string, offset: number): Promise<{ notes: OpenReviewNote[]; count?: number }> {
    return limit('corpus', async () => {
      const url =
        `${this.baseUrl}/notes?` +
        new URLSearchParams({
          invitation,
          details: 'replies',
          limit: String(this.pageSize),
          offset: String(offset),
        }).toString();

      let res: Response;
      try {
        res = await fetch(url, { headers: this.headers() });
      } catch (error) {
        if (error instanceof FetchError) {
          throw new UpstreamUnavailableError('OpenReview', error.message, undefined, { cause: error });
        }
        throw error;
      }
      if (!res.ok) {
        const detail = `${res.status} ${await res.text()}`;
        if (isUnavailableStatus(res.status)) {
          throw new UpstreamUnavailableError('OpenReview', detail, res.status);
        }
        throw new Error(`OpenReview notes request failed: ${detail}`);
      }

      const body: unknown = await res.json();
      const page = NotesPageSchema.safeParse(body);
      if (!page.success) {
        throw new Error(`Unexpected OpenReview response: ${page.error.issues[0]?.message ?? 'invalid body'}`);
      }
      return page.data;
    });
  }

  /** All submissions of a venue/year with their replies, page by page. */
  async fetchSubmissions(venue: string, year: number, signal?: AbortSignal): Promise<OpenReviewNote[]> {
    const invitation = `${venueId(venue, year)}/-/Submission`;
    const notes: OpenReviewNote[] = [];

    for (let offset = 0; ; offset += this.pageSize) {
      if (signal?.aborted) {
        throw new CancelledError('OpenReview fetch');
      }
      const page = await withRetry(() => this.getPage(invitation, offset), {
        ...this.retry,
        signal,
        isRetryable: (error) => error instanceof UpstreamUnavailableError,
        onRetry: (error, retry, delayMs) =>
          this.logger.warn(`Backing off ${delayMs}ms`, { retry, offset, error: errorMessage(error) }),
      });
      notes.push(...page.notes);
      this.logger.info(`Fetched ${notes.length}${page.count !== undefined ? `/${page.count}` : ''} submissions`);
      if (page.notes.length < this.pageSize || (page.count !== undefined && notes.length >= page.count)) {
        break;
      }
    }
    return notes;
  }

  async fetchPapers(venue: string, year: number, options: FetchPapersOptions = {}): Promise<PaperRecord[]> {
    const notes = await this.fetchSubmissions(venue, year, options.signal);
    const papers = notes.map((note) => noteToPaperRecord(note, venue, year, options.strategies));
    return options.acceptedOnly ? papers.filter(isAccepted) : papers;
  }
}

/**
 * Serves a venue/year from the local corpus file when present, otherwise
 * downloads it once and stores it there.
 */
export class OpenReviewCorpusProvider implements CorpusProvider {
  constructor(
    private readonly client: OpenReviewClient,
    private readonly local: FileCorpusProvider,
    private readonly options: Omit<FetchPapersOptions, 'signal'> = {}
  ) {}

  async fetch(venue: string, year: number): Promise<PaperRecord[]> {
    if (await this.local.has(venue, year)) {
      return this.local.fetch(venue, year);
    }
    const papers = await this.client.fetchPapers(venue, year, this.options);
    if (papers.length > 0) {
      await this.local.save(venue, year, papers);
    }
    return papers;
  }
}
