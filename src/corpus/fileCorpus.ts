import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { createConsoleLogger, Logger } from '../utils/logger';
import { CorpusProvider, PaperRecord, PaperRecordListSchema } from './types';

export const DEFAULT_CORPUS_ROOT = path.resolve(process.env.CORPUS_DIR || 'storage/papers_data');

const CORPUS_FILE = 'all_papers.json';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Venue/year corpora stored as `<root>/<venue>_<year>/all_papers.json`.
 * A missing file reads as an empty corpus; a malformed one is an error.
 */
export class FileCorpusProvider implements CorpusProvider {
  constructor(
    private readonly root: string = DEFAULT_CORPUS_ROOT,
    private readonly logger: Logger = createConsoleLogger('Corpus')
  ) {}

  filePath(venue: string, year: number): string {
    return path.join(this.root, `${venue}_${year}`, CORPUS_FILE);
  }

  async has(venue: string, year: number): Promise<boolean> {
    try {
      await fs.access(this.filePath(venue, year));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  async fetch(venue: string, year: number): Promise<PaperRecord[]> {
    const file = this.filePath(venue, year);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (isMissing(error)) {
        this.logger.warn(`No corpus file for ${venue} ${year}`, { file });
        return [];
      }
      throw error;
    }

    const parsed = PaperRecordListSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Malformed corpus file ${file}: ${issues}`);
    }
    this.logger.info(`Loaded ${parsed.data.length} papers from ${file}`);
    return parsed.data;
  }

  async save(venue: string, year: number, papers: readonly PaperRecord[]): Promise<string> {
    const file = this.filePath(venue, year);
    await fs.mkdir(path.dirname(file), { recursive: true });
    const tmpPath = `${file}.${randomUUID()}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(papers, null, 2), { encoding: 'utf8' });
    await fs.rename(tmpPath, file);
    this.logger.info(`Saved ${papers.length} papers to ${file}`);
    return file;
  }
}
