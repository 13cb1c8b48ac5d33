import { isTerminal } from './states';
import type { DevelopmentState, PendingAgent } from './states';
import { awaitingReview, budgetExhausted, executionFailed, executionPassed, failureStreakExhausted, hasCode, hasExecutionResult, reviewFoundIssues } from './guards';
import type { GuardFn } from './guards';

export type RuleName =
  | 'terminal'
  | 'bootstrap'
  | 'budget-exhausted'
  | 'failure-streak'
  | 'draft-missing-code'
  | 'execute-new-code'
  | 'fix-execution-failure'
  | 'review-passing-code'
  | 'address-review-issues'
  | 'accept';

export interface TransitionRule {
  name: RuleName;
  when: GuardFn;
  apply: (state: Readonly<DevelopmentState>) => DevelopmentState;
}

export interface Decision {
  state: DevelopmentState;
  pendingAgent: PendingAgent;
  rule: RuleName;
}

const route =
  (pendingAgent: PendingAgent) =>
  (state: Readonly<DevelopmentState>): DevelopmentState => ({ ...state, pendingAgent });

const ACCEPT: TransitionRule = {
  name: 'accept',
  when: () => true,
  apply: (state) => ({ ...state, status: 'completed', pendingAgent: 'done' }),
};

/**
 * Evaluated in order; the first rule whose guard holds decides.
 *
 * `bootstrap` and the code agent are the only things that advance
 * iterationCount, so `budget-exhausted` bounds generation. Steps that fail
 * without producing code are bounded by `failure-streak`.
 */
export const TRANSITION_RULES: readonly TransitionRule[] = [
  {
    name: 'bootstrap',
    when: (state) => state.iterationCount === 0,
    apply: (state) => ({ ...state, status: 'in_progress', iterationCount: 1, pendingAgent: 'code' }),
  },
  {
    // Running out of budget is success-by-timeout: the best code so far is returned.
    name: 'budget-exhausted',
    when: budgetExhausted,
    apply: (state) => ({ ...state, status: 'completed', pendingAgent: 'done' }),
  },
  {
    name: 'failure-streak',
    when: failureStreakExhausted,
    apply: (state) => ({ ...state, status: 'failed', pendingAgent: 'done' }),
  },
  {
    // The first draft failed; nothing exists to run or review yet.
    name: 'draft-missing-code',
    when: (state) => !hasCode(state),
    apply: route('code'),
  },
  {
    name: 'execute-new-code',
    when: (state) => !hasExecutionResult(state),
    apply: route('execute'),
  },
  {
    name: 'fix-execution-failure',
    when: executionFailed,
    apply: route('code'),
  },
  {
    name: 'review-passing-code',
    when: (state) => executionPassed(state) && awaitingReview(state),
    apply: route('review'),
  },
  {
    name: 'address-review-issues',
    when: reviewFoundIssues,
    apply: route('code'),
  },
  ACCEPT,
];

/**
 * Pick the next step for `state`. Pure: the input is never modified and the
 * same input always yields the same decision.
 */
export function decide(state: Readonly<DevelopmentState>): Decision {
  if (isTerminal(state.status)) {
    return { state: { ...state, pendingAgent: 'done' }, pendingAgent: 'done', rule: 'terminal' };
  }

  const rule = TRANSITION_RULES.find((candidate) => candidate.when(state)) ?? ACCEPT;
  const next = rule.apply(state);
  return { state: next, pendingAgent: next.pendingAgent, rule: rule.name };
}
