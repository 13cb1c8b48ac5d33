import type { DevelopmentState } from './states';

export type GuardFn = (state: Readonly<DevelopmentState>) => boolean;

export const hasCode: GuardFn = (state) => state.code.length > 0;

export const hasExecutionResult: GuardFn = (state) => state.executionResult !== undefined;

export const executionFailed: GuardFn = (state) => state.executionResult !== undefined && state.executionResult.exitStatus !== 0;

export const executionPassed: GuardFn = (state) => state.executionResult !== undefined && state.executionResult.exitStatus === 0;

/** No usable verdict yet: never reviewed, or the last review could not be completed */
export const awaitingReview: GuardFn = (state) => state.reviewOutcome === undefined || state.reviewOutcome.kind === 'unknown';

export const reviewFoundIssues: GuardFn = (state) => state.reviewOutcome?.kind === 'issues';

export const budgetExhausted: GuardFn = (state) => state.iterationCount >= state.iterationLimit;

export const failureStreakExhausted: GuardFn = (state) => state.consecutiveFailures >= state.failureLimit;
