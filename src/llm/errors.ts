export class CompletionError extends Error {
  constructor(
    message: string,
    public provider?: string,
    public status?: number,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}

export class CompletionAuthError extends CompletionError {
  constructor(provider: string, originalError?: unknown) {
    super(`Authentication failed for ${provider}`, provider, 401, originalError);
    this.name = 'CompletionAuthError';
  }
}

export class CompletionRateLimitError extends CompletionError {
  constructor(provider: string, originalError?: unknown) {
    super(`Rate limit exceeded for ${provider} (status 429)`, provider, 429, originalError);
    this.name = 'CompletionRateLimitError';
  }
}

export class CompletionTimeoutError extends CompletionError {
  constructor(
    label: string,
    public timeoutMs: number,
  ) {
    super(`${label} timeout after ${timeoutMs}ms`);
    this.name = 'CompletionTimeoutError';
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/** Normalize whatever an SDK threw into the CompletionError family */
export function toCompletionError(provider: string, error: unknown): CompletionError {
  if (error instanceof CompletionError) return error;

  const status = statusOf(error);
  if (status === 401 || status === 403) return new CompletionAuthError(provider, error);
  if (status === 429) return new CompletionRateLimitError(provider, error);

  const message = error instanceof Error ? error.message : String(error);
  const suffix = status !== undefined ? ` (status ${status})` : '';
  return new CompletionError(`${provider} request failed${suffix}: ${message}`, provider, status, error);
}
