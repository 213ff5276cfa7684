#!/usr/bin/env node
import 'dotenv/config';
import * as fs from 'fs/promises';
import { loadPipelineConfig, PipelineConfigInput } from './config/pipeline';
import { FileCorpusProvider } from './corpus/fileCorpus';
import { OpenReviewClient, OpenReviewCorpusProvider } from './corpus/openReview/client';
import type { CorpusProvider } from './corpus/types';
import { createGeminiGenerator } from './llm/gemini';
import { buildReport } from './pipeline/report';
import { runPipeline } from './pipeline/runPipeline';
import { createQuery } from './pipeline/types';
import { FileKeyValueStore } from './utils/cache';
import { createStderrLogger } from './utils/logger';

const USAGE = [
  'Usage: paper-ranker --venue <venue> --year <year> (--terms "a, b" | --description "<text>")',
  '  [--top-k <n>] [--min-review-score <n>] [--skip-llm] [--offline] [--output <file>]',
  'Example: paper-ranker --venue NeurIPS --year 2025 --terms "graph generation, drug discovery"',
].join('\n');

export interface CliOptions {
  venue: string;
  year: number;
  terms: string[];
  description: string | null;
  overrides: PipelineConfigInput;
  offline: boolean;
  output: string | null;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('--')) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    const name = arg.slice(2);
    if (name === 'skip-llm' || name === 'offline') {
      flags.add(name);
      continue;
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for --${name}`);
    }
    values.set(name, value);
    i++;
  }

  const venue = values.get('venue');
  const year = Number(values.get('year'));
  if (!venue || !Number.isInteger(year)) {
    throw new Error('--venue and --year are required');
  }
  const terms = (values.get('terms') ?? '')
    .split(',')
    .map((term) => term.trim())
    .filter(Boolean);
  const description = values.get('description') ?? null;
  if (terms.length === 0 && !description) {
    throw new Error('Either --terms or --description is required');
  }

  const overrides: PipelineConfigInput = {};
  const topK = values.get('top-k');
  if (topK !== undefined) overrides.top_k = Number(topK);
  const minReviewScore = values.get('min-review-score');
  if (minReviewScore !== undefined) overrides.min_review_score = Number(minReviewScore);
  if (flags.has('skip-llm')) overrides.skip_llm_evaluation = true;

  return {
    venue,
    year,
    terms,
    description,
    overrides,
    offline: flags.has('offline'),
    output: values.get('output') ?? null,
  };
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exit(1);
  }

  const config = loadPipelineConfig(options.overrides);
  const local = new FileCorpusProvider(undefined, createStderrLogger('Corpus'));
  const corpus: CorpusProvider = options.offline
    ? local
    : new OpenReviewCorpusProvider(
        new OpenReviewClient({ token: process.env.OPENREVIEW_TOKEN, logger: createStderrLogger('OpenReview') }),
        local
      );

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('Interrupted, ranking what has been evaluated so far');
    controller.abort();
  });

  const input = {
    venue: options.venue,
    year: options.year,
    query: createQuery({ terms: options.terms, description: options.description }),
  };
  const result = await runPipeline(
    input,
    {
      corpus,
      generator: createGeminiGenerator(config.model_identifier),
      cache: new FileKeyValueStore(),
      signal: controller.signal,
      logger: createStderrLogger('Pipeline'),
    },
    config
  );

  const json = JSON.stringify(buildReport(input, result), null, 2);
  if (options.output) {
    await fs.writeFile(options.output, json, 'utf8');
    console.error(`Wrote ${options.output}`);
  } else {
    process.stdout.write(`${json}\n`);
  }
  if (!result.success) {
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { runPipeline } from './pipeline/runPipeline';
export type { PipelineDependencies } from './pipeline/runPipeline';
export { loadPipelineConfig } from './config/pipeline';
export { FileCorpusProvider } from './corpus/fileCorpus';
export { OpenReviewClient, OpenReviewCorpusProvider } from './corpus/openReview/client';
export { InMemoryCorpusProvider } from './corpus/types';
export { GeminiTextGenerator } from './llm/gemini';
export { MemoryKeyValueStore, FileKeyValueStore } from './utils/cache';
export * from './agents/errors';
export * from './pipeline/types';
