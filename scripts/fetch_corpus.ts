import 'dotenv/config';
import { FileCorpusProvider } from '../src/corpus/fileCorpus';
import { OpenReviewClient } from '../src/corpus/openReview/client';
import { createConsoleLogger } from '../src/utils/logger';

const logger = createConsoleLogger('FetchCorpus');

async function main() {
  const args = process.argv.slice(2);
  const [venue, yearArg] = args;
  const year = Number(yearArg);
  if (!venue || !Number.isInteger(year)) {
    console.error('Usage: ts-node scripts/fetch_corpus.ts <venue> <year> [--force] [--accepted-only]');
    process.exit(1);
  }
  const force = args.includes('--force');
  const acceptedOnly = args.includes('--accepted-only');

  const local = new FileCorpusProvider();
  if (!force && (await local.has(venue, year))) {
    logger.info(`Corpus already present at ${local.filePath(venue, year)} (use --force to re-download)`);
    return;
  }

  const client = new OpenReviewClient({ token: process.env.OPENREVIEW_TOKEN, logger });
  const papers = await client.fetchPapers(venue, year, { acceptedOnly });
  if (papers.length === 0) {
    logger.warn(`OpenReview returned no submissions for ${venue} ${year}`);
    process.exit(1);
  }
  const withScores = papers.filter((paper) => paper.review_scores.length > 0).length;
  logger.info(`${papers.length} papers, ${withScores} with reviewer scores`);
  await local.save(venue, year, papers);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
