import type { ExecutionResult } from '../sandbox/types';

export type SessionStatus = 'starting' | 'in_progress' | 'completed' | 'failed';

export type PendingAgent = 'none' | 'code' | 'execute' | 'review' | 'done';

/** Agents the session can dispatch to (every pending value except the control ones) */
export type AgentName = Exclude<PendingAgent, 'none' | 'done'>;

export type ReviewOutcome = { kind: 'approved' } | { kind: 'issues'; details: string } | { kind: 'unknown'; reason: string };

/**
 * The record threaded through one `develop` call.
 * Steps never mutate it; every agent and every decision returns a new value.
 */
export interface DevelopmentState {
  readonly request: string;
  code: string;
  executionResult?: ExecutionResult;
  reviewFeedback: string;
  reviewOutcome?: ReviewOutcome;
  iterationCount: number;
  readonly iterationLimit: number;
  consecutiveFailures: number;
  readonly failureLimit: number;
  status: SessionStatus;
  pendingAgent: PendingAgent;
  errors: string[];
  /** Set only when the session driver itself blew up */
  fatalError?: string;
}

export const TERMINAL_STATUSES: readonly SessionStatus[] = ['completed', 'failed'];

export function isTerminal(status: SessionStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function createInitialState(request: string, iterationLimit: number, failureLimit: number): DevelopmentState {
  if (!Number.isInteger(iterationLimit) || iterationLimit < 1) {
    throw new RangeError(`iterationLimit must be a positive integer, got ${iterationLimit}`);
  }
  if (!Number.isInteger(failureLimit) || failureLimit < 1) {
    throw new RangeError(`failureLimit must be a positive integer, got ${failureLimit}`);
  }

  return {
    request,
    code: '',
    executionResult: undefined,
    reviewFeedback: '',
    reviewOutcome: undefined,
    iterationCount: 0,
    iterationLimit,
    consecutiveFailures: 0,
    failureLimit,
    status: 'starting',
    pendingAgent: 'none',
    errors: [],
  };
}

/**
 * Replace the code artifact. Everything derived from the previous code is
 * dropped in the same step so it can never be read against the new code.
 */
export function withNewCode(state: DevelopmentState, code: string): DevelopmentState {
  return {
    ...state,
    code,
    executionResult: undefined,
    reviewFeedback: '',
    reviewOutcome: undefined,
    iterationCount: state.iterationCount + 1,
    consecutiveFailures: 0,
  };
}
