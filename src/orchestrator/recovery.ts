import { CompletionAuthError, CompletionRateLimitError, CompletionTimeoutError } from '../llm/errors';
import { SandboxTimeoutError } from '../sandbox/errors';
import type { DevelopmentState } from './states';

/** Severity classification for errors */
export type ErrorSeverity = 'transient' | 'retryable' | 'fatal';

/** Structured classification of an error raised by an agent */
export interface ErrorClassification {
  severity: ErrorSeverity;
  code: string;
  message: string;
}

/** Label used in the `errors` log, e.g. `Coder error: ...` */
export type FailureSource = 'Coder' | 'Reviewer' | 'Runner';

/**
 * RecoveryManager classifies agent errors and folds them into the state.
 *
 *  - transient / retryable failures count one step toward the failure limit
 *  - fatal failures (bad credentials, broken configuration) exhaust it at once,
 *    since retrying them cannot succeed
 */
export class RecoveryManager {
  /** Classify an error based on its type and message content */
  classify(error: unknown): ErrorClassification {
    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof CompletionAuthError || RecoveryManager.isFatal(message)) {
      return { severity: 'fatal', code: 'FATAL_ERROR', message };
    }

    if (error instanceof CompletionRateLimitError || error instanceof CompletionTimeoutError || error instanceof SandboxTimeoutError || RecoveryManager.isTransient(message)) {
      return { severity: 'transient', code: 'TRANSIENT_ERROR', message };
    }

    return { severity: 'retryable', code: 'RETRYABLE_ERROR', message };
  }

  /** Append the failure to the error log and advance the failure streak */
  recordFailure(state: Readonly<DevelopmentState>, source: FailureSource, error: unknown): DevelopmentState {
    const classification = this.classify(error);
    const consecutiveFailures = classification.severity === 'fatal' ? Math.max(state.failureLimit, state.consecutiveFailures + 1) : state.consecutiveFailures + 1;

    return {
      ...state,
      errors: [...state.errors, `${source} error: ${classification.message}`],
      consecutiveFailures,
    };
  }

  // ── Private Helpers ─────────────────────────────────────────────────

  private static isTransient(message: string): boolean {
    const patterns = ['rate limit', 'timeout', 'ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'socket hang up', 'network error', 'status 429', 'status 503', 'status 502'];
    const lower = message.toLowerCase();
    return patterns.some((p) => lower.includes(p.toLowerCase()));
  }

  private static isFatal(message: string): boolean {
    const patterns = ['Authentication failed', 'API key is required', 'API_KEY is required', 'No provider bound for role', 'Invalid configuration'];
    return patterns.some((p) => message.includes(p));
  }
}
