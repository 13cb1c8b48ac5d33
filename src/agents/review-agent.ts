import type { CompletionPort } from './completion-port';
import { APPROVED_MARKER, ISSUES_MARKER, getReviewPrompt } from './prompts/code-review';
import { fillTemplate } from './prompts/code-generation';
import { CompletionError, CompletionTimeoutError } from '../llm/errors';
import type { DevelopmentState, ReviewOutcome } from '../orchestrator/states';
import { RecoveryManager } from '../orchestrator/recovery';
import type { RuntimeLanguage } from '../sandbox/types';
import { withDeadline } from '../utils/deadline';
import { logger as defaultLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

/** Stored as the feedback when the reviewer could not be reached */
export const REVIEW_ERROR_FEEDBACK = 'Error during review';

export interface ReviewAgentOptions {
  language: RuntimeLanguage;
  timeoutMs: number;
  /** Template with `{code}` and `{request}` placeholders */
  reviewPrompt?: string;
  logger?: Logger;
  recovery?: RecoveryManager;
}

/**
 * Turn reviewer text into a verdict. The verdict line the prompt asks for
 * is honoured first; otherwise any mention of issues counts as issues.
 * Text with no marker at all is accepted.
 */
export function classifyReview(feedback: string): ReviewOutcome {
  const firstLine = (feedback.split('\n').find((line) => line.trim() !== '') ?? '').trim().toUpperCase();
  const verdictLine = firstLine.replace(/^[#*\s]+/, '');

  if (verdictLine.startsWith(ISSUES_MARKER)) return { kind: 'issues', details: feedback };
  if (verdictLine.startsWith(APPROVED_MARKER)) return { kind: 'approved' };

  const lower = feedback.toLowerCase();
  if (lower.includes('issues')) return { kind: 'issues', details: feedback };
  return { kind: 'approved' };
}

export class ReviewAgent {
  private reviewPrompt: string;
  private logger: Logger;
  private recovery: RecoveryManager;

  constructor(
    private port: CompletionPort,
    private options: ReviewAgentOptions,
  ) {
    this.reviewPrompt = options.reviewPrompt ?? getReviewPrompt(options.language);
    this.logger = options.logger ?? defaultLogger;
    this.recovery = options.recovery ?? new RecoveryManager();
  }

  async review(state: Readonly<DevelopmentState>): Promise<DevelopmentState> {
    if (!state.code) {
      return this.recovery.recordFailure(state, 'Reviewer', new CompletionError('No code provided to reviewer'));
    }

    const prompt = fillTemplate(this.reviewPrompt, { code: state.code, request: state.request });

    try {
      const timeoutMs = this.options.timeoutMs;
      const completion = await withDeadline(this.port.invoke('reviewer', prompt), timeoutMs, () => new CompletionTimeoutError('Reviewer', timeoutMs));
      const feedback = completion.trim();
      const outcome = classifyReview(feedback);

      if (outcome.kind === 'approved') {
        if (!feedback.toUpperCase().includes(APPROVED_MARKER)) {
          this.logger.warn('Review carried no verdict marker; treating it as approved');
        }
        this.logger.info('Code approved by review');
      } else {
        this.logger.info('Review found issues, feedback provided');
      }

      return { ...state, reviewFeedback: feedback, reviewOutcome: outcome, consecutiveFailures: 0 };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Reviewer failed', { error: message });
      return {
        ...this.recovery.recordFailure(state, 'Reviewer', error),
        reviewFeedback: REVIEW_ERROR_FEEDBACK,
        reviewOutcome: { kind: 'unknown', reason: message },
      };
    }
  }
}
