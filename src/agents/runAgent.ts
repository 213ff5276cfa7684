import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { AGENT_CONFIG, AgentConfig } from './config';
import {
  TimeoutError,
  SchemaValidationError,
  AgentExecutionError,
  UpstreamUnavailableError,
  CancelledError,
} from './errors';
import {
  buildCacheEntry,
  buildCacheKey,
  KeyValueStore,
  readCache,
  writeCache,
} from '../utils/cache';
import { LaneLimiter, limit } from '../utils/limiter';
import { withRetry } from '../utils/retry';
import { createConsoleLogger, errorMessage, Logger } from '../utils/logger';
import type { TextGenerator } from '../llm/types';

const defaultLogger: Logger = createConsoleLogger('Agent');

export interface AgentContext {
  generator: TextGenerator;
  config?: AgentConfig;
  logger?: Logger;
  limiter?: LaneLimiter;
  signal?: AbortSignal;
}

export interface CacheOptions {
  store: KeyValueStore;
  input: unknown;
  promptVersion: string;
  schemaVersion: string;
  disableCache?: boolean;
}

type AttemptFailure =
  | { kind: 'parse'; message: string }
  | { kind: 'schema'; error: z.ZodError }
  | { kind: 'timeout'; error: TimeoutError }
  | { kind: 'other'; error: Error };

function formatValidationErrors(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `- ${path}: ${issue.message}`;
  });
  return `Schema validation errors:\n${issues.join('\n')}`;
}

/**
 * Decodes a JSON document from raw model output. A single fenced code block
 * is unwrapped; anything else must be the JSON document itself.
 */
export function decodeJson(text: string): unknown {
  let body = text.trim();
  const fenced = body.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (fenced) {
    body = fenced[1] ?? '';
  }
  return JSON.parse(body);
}

function buildFeedback(userMessage: string, failure: AttemptFailure | null): string {
  if (!failure) return userMessage;
  switch (failure.kind) {
    case 'parse':
      return `${userMessage}\n\nPrevious response could not be parsed (${failure.message}). Return valid JSON only, with no surrounding text.`;
    case 'schema':
      return `${userMessage}\n\nPrevious validation errors:\n${formatValidationErrors(failure.error)}\n\nPlease fix these errors and return valid JSON.`;
    default:
      return userMessage;
  }
}

async function generateWithTimeout(
  agentName: string,
  generator: TextGenerator,
  prompt: string,
  responseSchema: object,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<string> {
  if (signal?.aborted) {
    throw new CancelledError(agentName);
  }
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new TimeoutError(agentName, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      generator.generate({ prompt, responseSchema, signal: controller.signal }),
      timeoutPromise,
    ]);
  } finally {
    clearTimeout(timeoutHandle);
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Runs one structured generation: decode, validate against `schema`, and
 * retry with feedback up to `config.maxRetries` extra attempts.
 *
 * Throws SchemaValidationError or TimeoutError when the attempts run out,
 * UpstreamUnavailableError once the backoff budget for an unreachable
 * generator is spent, and CancelledError when `signal` fires.
 */
export async function runAgent<T>(
  agentName: string,
  systemPrompt: string,
  userMessage: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context: AgentContext,
  cacheOptions?: CacheOptions
): Promise<T> {
  const { generator, signal } = context;
  const config = context.config ?? AGENT_CONFIG;
  const logger = context.logger ?? defaultLogger;
  const limitLlm = <R>(fn: () => Promise<R>): Promise<R> =>
    context.limiter ? context.limiter.limit('llm', fn) : limit('llm', fn);
  const modelName = generator.model;

  const cacheKey =
    cacheOptions && !cacheOptions.disableCache
      ? buildCacheKey({
          agentName,
          model: modelName,
          promptVersion: cacheOptions.promptVersion,
          schemaVersion: cacheOptions.schemaVersion,
          input: cacheOptions.input,
        })
      : null;

  if (cacheOptions && cacheKey) {
    const cached = await readCache(cacheOptions.store, cacheKey.key, schema);
    if (cached !== null) {
      logger.info(`[${agentName}] Cache hit`);
      return cached;
    }
  }

  const responseSchema: object = zodToJsonSchema(schema, { target: 'openApi3' });
  const totalAttempts = config.maxRetries + 1;
  let lastFailure: AttemptFailure | null = null;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    if (signal?.aborted) {
      throw new CancelledError(agentName);
    }
    const startedAt = Date.now();
    logger.info(
      `[${agentName}] Attempt ${attempt}/${totalAttempts} (model: ${modelName}, timeoutMs: ${config.timeoutMs})`
    );

    const fullPrompt = `${systemPrompt}\n\nUser input:\n${buildFeedback(userMessage, lastFailure)}`;

    let responseText: string;
    try {
      responseText = await withRetry(
        () =>
          limitLlm(() =>
            generateWithTimeout(agentName, generator, fullPrompt, responseSchema, config.timeoutMs, signal)
          ),
        {
          tries: config.upstreamTries,
          baseMs: config.backoffBaseMs,
          maxMs: config.backoffMaxMs,
          jitterMs: config.backoffJitterMs,
          signal,
          isRetryable: (error) => error instanceof UpstreamUnavailableError,
          onRetry: (error, retry, delayMs) =>
            logger.warn(`[${agentName}] Upstream unavailable, backing off ${delayMs}ms`, {
              retry,
              error: errorMessage(error),
            }),
        }
      );
    } catch (error) {
      if (error instanceof UpstreamUnavailableError || error instanceof CancelledError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new CancelledError(agentName);
      }
      if (error instanceof TimeoutError) {
        logger.warn(`[${agentName}] Attempt ${attempt} timed out after ${config.timeoutMs}ms`);
        lastFailure = { kind: 'timeout', error };
      } else {
        logger.warn(`[${agentName}] Error on attempt ${attempt}`, { error: errorMessage(error) });
        lastFailure = {
          kind: 'other',
          error: error instanceof Error ? error : new Error(String(error)),
        };
      }
      continue;
    }

    logger.info(`[${agentName}] Response length: ${responseText.length} chars`);

    let jsonData: unknown;
    try {
      jsonData = decodeJson(responseText);
    } catch (parseError) {
      logger.warn(`[${agentName}] JSON parse error`, {
        attempt,
        error: errorMessage(parseError),
        preview: responseText.substring(0, 200),
      });
      lastFailure = { kind: 'parse', message: errorMessage(parseError) };
      continue;
    }

    const validationResult = schema.safeParse(jsonData);
    if (!validationResult.success) {
      logger.warn(`[${agentName}] Schema validation failed`, {
        attempt,
        errors: validationResult.error.issues,
      });
      lastFailure = { kind: 'schema', error: validationResult.error };
      continue;
    }

    logger.info(`[${agentName}] Success on attempt ${attempt}`);

    if (cacheOptions && cacheKey) {
      const entry = buildCacheEntry(
        {
          agentName,
          promptVersion: cacheOptions.promptVersion,
          schemaVersion: cacheOptions.schemaVersion,
          model: modelName,
          inputHash: cacheKey.inputHash,
          durationMs: Date.now() - startedAt,
        },
        validationResult.data
      );
      // A failed write costs a repeat call on the next run, not this result.
      try {
        await writeCache(cacheOptions.store, cacheKey.key, entry);
        logger.info(`[${agentName}] Cached result`);
      } catch (cacheError) {
        logger.warn(`[${agentName}] Failed to cache result`, { error: errorMessage(cacheError) });
      }
    }

    return validationResult.data;
  }

  if (!lastFailure) {
    throw new Error(`Unexpected state in runAgent for ${agentName}`);
  }
  switch (lastFailure.kind) {
    case 'schema':
      throw new SchemaValidationError(agentName, lastFailure.error, totalAttempts);
    case 'parse':
      throw new SchemaValidationError(agentName, null, totalAttempts, lastFailure.message);
    case 'timeout':
      throw lastFailure.error;
    case 'other':
      throw new AgentExecutionError(agentName, lastFailure.error);
  }
}
