import { AgentCoordinator } from './agent-coordinator';
import type { DevelopmentState } from './states';
import { RecoveryManager } from './recovery';
import type { CodeAgent } from '../agents/code-agent';
import type { ReviewAgent } from '../agents/review-agent';
import type { SandboxExecutor } from '../sandbox/types';
import { SandboxInfrastructureError } from '../sandbox/errors';
import { logger as defaultLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export interface DevelopmentAgents {
  coder: Pick<CodeAgent, 'generate'>;
  executor: SandboxExecutor;
  reviewer: Pick<ReviewAgent, 'review'>;
  recovery?: RecoveryManager;
  logger?: Logger;
}

export function createDevelopmentCoordinator(agents: DevelopmentAgents): AgentCoordinator {
  const coordinator = new AgentCoordinator();
  const recovery = agents.recovery ?? new RecoveryManager();
  const logger = agents.logger ?? defaultLogger;

  // ── CODE ──────────────────────────────────────────────────────────────

  coordinator.registerHandler('code', (state) => agents.coder.generate(state));

  // ── EXECUTE ───────────────────────────────────────────────────────────

  coordinator.registerHandler('execute', async (state: Readonly<DevelopmentState>) => {
    if (!state.code) {
      return recovery.recordFailure(state, 'Runner', new Error('No code provided to runner'));
    }

    const result = await agents.executor.run(state.code);
    const next: DevelopmentState = { ...state, executionResult: result };

    if (result.infrastructureError !== undefined) {
      logger.error('Sandbox could not run the program', { exitStatus: result.exitStatus, error: result.infrastructureError });
      return recovery.recordFailure(next, 'Runner', new SandboxInfrastructureError(result.infrastructureError));
    }

    if (result.exitStatus === 0) {
      logger.info(`Code executed successfully (${result.durationMs}ms)`);
    } else {
      logger.info(`Code execution failed (exit code: ${result.exitStatus})`);
    }
    return { ...next, consecutiveFailures: 0 };
  });

  // ── REVIEW ────────────────────────────────────────────────────────────

  coordinator.registerHandler('review', (state) => agents.reviewer.review(state));

  return coordinator;
}
