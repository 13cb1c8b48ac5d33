import type { CompletionPort } from './completion-port';
import { ContextBuilder } from './context-builder';
import { ErrorAnalyzer } from './error-analyzer';
import { extractCode } from './code-extractor';
import { fillTemplate, getFixCodePrompt, getInitialCodePrompt } from './prompts/code-generation';
import { CompletionError, CompletionTimeoutError } from '../llm/errors';
import { withNewCode } from '../orchestrator/states';
import type { DevelopmentState } from '../orchestrator/states';
import { RecoveryManager } from '../orchestrator/recovery';
import type { RuntimeLanguage } from '../sandbox/types';
import { withDeadline } from '../utils/deadline';
import { logger as defaultLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export interface CodeAgentOptions {
  language: RuntimeLanguage;
  /** Deadline for one completion call */
  timeoutMs: number;
  /** Template for the first draft; `{context}` is replaced with the request */
  initialPrompt?: string;
  /** Template for fix-ups; `{context}` is replaced with request, code, results and review */
  fixPrompt?: string;
  logger?: Logger;
  recovery?: RecoveryManager;
}

/**
 * Writes the first draft and every fix-up. A provider failure leaves the
 * code as it was and is recorded in the state instead of thrown.
 */
export class CodeAgent {
  private initialPrompt: string;
  private fixPrompt: string;
  private analyzer = new ErrorAnalyzer();
  private logger: Logger;
  private recovery: RecoveryManager;

  constructor(
    private port: CompletionPort,
    private options: CodeAgentOptions,
  ) {
    this.initialPrompt = options.initialPrompt ?? getInitialCodePrompt(options.language);
    this.fixPrompt = options.fixPrompt ?? getFixCodePrompt(options.language);
    this.logger = options.logger ?? defaultLogger;
    this.recovery = options.recovery ?? new RecoveryManager();
  }

  /** Build the prompt for the next generation step */
  buildPrompt(state: Readonly<DevelopmentState>): string {
    const analysis = state.executionResult ? this.analyzer.analyze(state.executionResult) : undefined;
    const context = ContextBuilder.build(state, analysis);
    const template = state.code ? this.fixPrompt : this.initialPrompt;
    return fillTemplate(template, { context });
  }

  async generate(state: Readonly<DevelopmentState>): Promise<DevelopmentState> {
    const prompt = this.buildPrompt(state);
    const mode = state.code ? 'fix' : 'initial';
    this.logger.debug(`Calling coder (${mode} prompt, ${prompt.length} chars)`);

    try {
      const timeoutMs = this.options.timeoutMs;
      const completion = await withDeadline(this.port.invoke('coder', prompt), timeoutMs, () => new CompletionTimeoutError('Coder', timeoutMs));
      const code = extractCode(completion);
      if (!code) {
        throw new CompletionError('Coder returned no code');
      }

      this.logger.info(`Generated ${code.length} characters of code`);
      return withNewCode(state, code);
    } catch (error) {
      this.logger.error('Coder failed', { error: error instanceof Error ? error.message : String(error) });
      return this.recovery.recordFailure(state, 'Coder', error);
    }
  }
}
