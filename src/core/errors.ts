// Error taxonomy for a mining run. Per-item errors never abort the batch;
// ConfigurationError and a failed store initialization do.

export class MiningError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends MiningError {}

export class FetchError extends MiningError {
  constructor(public readonly sourceKind: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class EnrichmentError extends MiningError {}

export type WriteFailureReason = 'store' | 'cloze';

export class WriteError extends MiningError {
  constructor(public readonly reason: WriteFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CompletionError extends MiningError {}

export class ClozeError extends MiningError {}

// Transport-level failures carry `retryable` so the retry helper can tell a dead
// endpoint apart from an API answer that will not change on a second try.
export class AnkiConnectError extends MiningError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class TodoistError extends MiningError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
