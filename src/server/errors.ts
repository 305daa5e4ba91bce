/**
 * Error classes thrown across the pipeline.
 *
 * Validation rejections and database failures are values (verdicts and
 * execution results), not exceptions; only the conditions below are thrown.
 */

/** Missing or invalid configuration at startup. Fatal. */
export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** The LLM call did not finish before its deadline. */
export class GenerationTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`SQL generation exceeded ${timeoutMs}ms`);
    this.name = 'GenerationTimeoutError';
  }
}

/** Transport, authentication or empty-response failure from the LLM service. */
export class GenerationUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationUnavailableError';
  }
}

/** The caller abandoned the request. */
export class RequestCancelledError extends Error {
  constructor() {
    super('Request was cancelled');
    this.name = 'RequestCancelledError';
  }
}

/** Something other than an accepted validator verdict reached the executor. */
export class UnvalidatedStatementError extends Error {
  constructor() {
    super('Refusing to execute a statement without an accepted validation verdict');
    this.name = 'UnvalidatedStatementError';
  }
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RequestCancelledError();
  }
}
