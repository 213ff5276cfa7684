import { z } from 'zod';

export class TimeoutError extends Error {
  constructor(
    public readonly agent: string,
    public readonly timeoutMs: number
  ) {
    super(`Agent ${agent} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class SchemaValidationError extends Error {
  constructor(
    public readonly agent: string,
    public readonly validationErrors: z.ZodError | null,
    public readonly attempts: number,
    detail?: string
  ) {
    super(
      `Agent ${agent} failed schema validation after ${attempts} attempts: ${detail ?? validationErrors?.message ?? 'unparsable response'}`
    );
    this.name = 'SchemaValidationError';
  }
}

export class AgentExecutionError extends Error {
  constructor(
    public readonly agent: string,
    public readonly originalError: Error
  ) {
    super(`Agent ${agent} execution failed: ${originalError.message}`);
    this.name = 'AgentExecutionError';
    this.cause = originalError;
  }
}

export class UpstreamUnavailableError extends Error {
  constructor(
    public readonly upstream: string,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(`${upstream} unavailable: ${message}`);
    this.name = 'UpstreamUnavailableError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class CancelledError extends Error {
  constructor(public readonly operation: string) {
    super(`${operation} cancelled`);
    this.name = 'CancelledError';
  }
}

export class FatalInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalInputError';
  }
}

export class EmptyInputError extends FatalInputError {
  constructor(message = 'No keywords could be derived from the query') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

export class CorpusEmptyError extends Error {
  constructor(
    public readonly venue: string,
    public readonly year: number
  ) {
    super(`Corpus for ${venue} ${year} contains no papers`);
    this.name = 'CorpusEmptyError';
  }
}

export class InsufficientCandidatesError extends CorpusEmptyError {
  constructor(venue: string, year: number) {
    super(venue, year);
    this.name = 'InsufficientCandidatesError';
  }
}

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Illegal run state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class PipelineStageError extends Error {
  constructor(
    public readonly stage: string,
    public readonly originalError: Error
  ) {
    super(`Pipeline failed during ${stage}: ${originalError.message}`);
    this.name = 'PipelineStageError';
    this.cause = originalError;
  }
}
