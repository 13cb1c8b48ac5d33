import { DevelopmentSession } from './session';
import { createDevelopmentCoordinator } from './register-handlers';
import { OutputStore } from './output-store';
import { RecoveryManager } from './recovery';
import { CodeAgent } from '../agents/code-agent';
import { ReviewAgent } from '../agents/review-agent';
import type { CompletionPort } from '../agents/completion-port';
import { createCompletionPort } from '../llm/factory';
import { createSandboxExecutor } from '../sandbox';
import type { SandboxExecutor } from '../sandbox/types';
import type { Config } from '../config/validator';
import type { Logger } from '../utils/logger';

export interface SessionOverrides {
  /** Replaces the configured providers */
  completionPort?: CompletionPort;
  /** Replaces the configured sandbox backend */
  executor?: SandboxExecutor;
  logger?: Logger;
  runId?: string;
}

/** Wire a session from configuration; any collaborator can be swapped through `overrides` */
export function createDevelopmentSession(config: Config, overrides: SessionOverrides = {}): DevelopmentSession {
  const { logger } = overrides;
  const recovery = new RecoveryManager();
  const port = overrides.completionPort ?? createCompletionPort(config);
  const executor = overrides.executor ?? createSandboxExecutor(config, logger);
  const language = config.sandbox.language;
  const timeoutMs = config.session.agent_timeout_ms;

  const coordinator = createDevelopmentCoordinator({
    coder: new CodeAgent(port, {
      language,
      timeoutMs,
      initialPrompt: config.prompts.coder_initial,
      fixPrompt: config.prompts.coder_fix,
      logger,
      recovery,
    }),
    executor,
    reviewer: new ReviewAgent(port, {
      language,
      timeoutMs,
      reviewPrompt: config.prompts.reviewer,
      logger,
      recovery,
    }),
    recovery,
    logger,
  });

  const outputStore = config.output.enabled
    ? new OutputStore({ dir: config.output.dir, filename: config.output.filename, saveMetadata: config.output.save_metadata, logger })
    : undefined;

  return new DevelopmentSession({
    coordinator,
    runId: overrides.runId,
    logger,
    iterationLimit: config.session.iteration_limit,
    failureLimit: config.session.failure_limit,
    outputStore,
  });
}
