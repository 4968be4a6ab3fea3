/** Missing credentials or an invalid startup setting. Never retried. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** One failed search attempt: non-200 status, bad body or transport failure. */
export class FetchTransientError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchTransientError';
    this.status = status;
  }
}

/** Every attempt failed; carries the message of the last one. */
export class FetchExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: string;

  constructor(lastError: string, attempts: number) {
    super(lastError);
    this.name = 'FetchExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class NotifyDeliveryError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotifyDeliveryError';
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
