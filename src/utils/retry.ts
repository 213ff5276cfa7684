import { CancelledError, UpstreamUnavailableError } from '../agents/errors';

export interface RetryOptions {
  tries?: number;
  baseMs?: number;
  maxMs?: number;
  jitterMs?: number;
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof UpstreamUnavailableError) {
    return true;
  }
  const msg = error instanceof Error ? error.message : String(error);
  const is429 =
    msg.includes(' 429 ') ||
    msg.includes('"code": "429"') ||
    msg.toLowerCase().includes('too many requests');
  const is5xx =
    msg.includes(' 500 ') ||
    msg.includes(' 502 ') ||
    msg.includes(' 503 ') ||
    msg.includes(' 504 ');
  return is429 || is5xx;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError('sleep'));
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('sleep'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts?: RetryOptions
): Promise<T> {
  const tries = Math.max(1, opts?.tries ?? 6);
  const baseMs = opts?.baseMs ?? 500;
  const maxMs = opts?.maxMs ?? 8000;
  const jitterMs = opts?.jitterMs ?? 250;
  const isRetryable = opts?.isRetryable ?? isTransientError;
  let lastErr: unknown;

  for (let i = 0; i < tries; i++) {
    if (opts?.signal?.aborted) {
      throw new CancelledError('retry');
    }
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      if (!isRetryable(e) || i === tries - 1) {
        throw e;
      }
      const jitter = Math.floor(Math.random() * jitterMs);
      const delay = Math.min(maxMs, baseMs * Math.pow(2, i)) + jitter;
      opts?.onRetry?.(e, i + 1, delay);
      await sleep(delay, opts?.signal);
    }
  }
  throw lastErr;
}
