// Request body could not be understood as an alert notification batch
export class MalformedPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedPayloadError";
  }
}

// Inbound request failed the credential check
export class AuthenticationError extends Error {
  constructor(message = "unauthorized") {
    super(message);
    this.name = "AuthenticationError";
  }
}

export abstract class BackendError extends Error {
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

// Timeout, network failure, 5xx or 429: retried, then dropped for this cycle
export class BackendTransientError extends BackendError {
  readonly retryable = true;

  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "BackendTransientError";
  }
}

// Any other 4xx: a logic problem on our side, never retried
export class BackendPermanentError extends BackendError {
  readonly retryable = false;

  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "BackendPermanentError";
  }
}

export function isBackendError(e: unknown): e is BackendError {
  return e instanceof BackendError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// Backend failures never fail a batch: they are logged, counted and left for the next trigger
export function reportBackendFailure(
  action: string,
  error: unknown,
  metrics?: { backendFailure(retryable: boolean): void },
  context: Record<string, unknown> = {},
): void {
  if (isBackendError(error)) {
    metrics?.backendFailure(error.retryable);
    if (error.retryable) {
      console.warn(`${action} failed, dropped for this cycle`, { ...context, error: error.message, status: error.status });
    } else {
      console.error(`${action} failed permanently`, { ...context, error: error.message, status: error.status });
    }
    return;
  }
  console.error(`${action} failed unexpectedly`, { ...context, error: errorMessage(error) });
}
