export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
}

export function createConsoleLogger(prefix: string): Logger {
  return {
    error: (msg, ctx) => console.error(`[${prefix}] ${msg}`, ctx || ''),
    warn: (msg, ctx) => console.warn(`[${prefix}] ${msg}`, ctx || ''),
    info: (msg, ctx) => console.info(`[${prefix}] ${msg}`, ctx || ''),
  };
}

/** Writes every level to stderr, leaving stdout free for machine-readable output. */
export function createStderrLogger(prefix: string): Logger {
  const write = (msg: string, ctx?: Record<string, unknown>) => console.error(`[${prefix}] ${msg}`, ctx || '');
  return { error: write, warn: write, info: write };
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
