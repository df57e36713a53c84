/**
 * RAG pipeline error taxonomy.
 *
 * ConfigurationError   invalid parameters, fatal
 * IndexUnavailableError index missing or store/embedding endpoint unreachable, retryable
 * GenerationError      generation call failed or produced no content
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class IndexUnavailableError extends Error {
  constructor(
    public readonly indexName: string,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'IndexUnavailableError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class GenerationError extends Error {
  constructor(
    public readonly question: string,
    public readonly contextPresent: boolean,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'GenerationError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
