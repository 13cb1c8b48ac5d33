import path from 'path';
import { CommandExitError, Sandbox } from '@e2b/code-interpreter';
import { SandboxInfrastructureError } from './errors';
import { RUNTIMES, scriptNameFor } from './runtimes';
import { buildResult, createRunId, infrastructureFailure } from './result';
import type { E2BSandboxOptions, ExecutionResult, SandboxExecutor } from './types';
import { logger as defaultLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

/** Sandbox lifetime beyond the program deadline, to leave room for upload and teardown */
const LIFETIME_MARGIN_MS = 30_000;

/**
 * Runs each program in its own E2B micro-VM. A sandbox is created per call
 * and killed before `run` returns, so concurrent runs share nothing.
 */
export class E2BSandboxExecutor implements SandboxExecutor {
  constructor(
    private options: E2BSandboxOptions,
    private logger: Logger = defaultLogger,
  ) {}

  async run(code: string): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const runId = createRunId();
    let sandbox: Sandbox | undefined;

    try {
      sandbox = await this.createSandbox(runId);

      const runDir = path.posix.join(this.options.workDir, runId);
      const scriptPath = path.posix.join(runDir, scriptNameFor(runId, this.options.language));
      await sandbox.files.makeDir(runDir);
      await sandbox.files.write(scriptPath, code);

      const command = [...RUNTIMES[this.options.language].command, scriptPath].join(' ');
      this.logger.debug('Running program in E2B sandbox', { runId, command });

      try {
        const execution = await sandbox.commands.run(command, { cwd: runDir, timeoutMs: this.options.timeoutMs });
        return buildResult(execution.exitCode, execution.stdout, execution.stderr, startedAt);
      } catch (error) {
        // The SDK reports a non-zero exit by throwing; that is the program's verdict, not ours.
        if (error instanceof CommandExitError) {
          return buildResult(error.exitCode, error.stdout, error.stderr, startedAt);
        }
        throw error;
      }
    } catch (error) {
      this.logger.error('Sandbox infrastructure failure', { runId, error: error instanceof Error ? error.message : String(error) });
      return infrastructureFailure(error, startedAt);
    } finally {
      if (sandbox) {
        await this.destroy(sandbox, runId);
      }
    }
  }

  private async createSandbox(runId: string): Promise<Sandbox> {
    if (!this.options.apiKey) {
      throw new SandboxInfrastructureError('E2B_API_KEY is required to use the e2b sandbox');
    }

    try {
      return await Sandbox.create(this.options.template, {
        apiKey: this.options.apiKey,
        timeoutMs: this.options.timeoutMs + LIFETIME_MARGIN_MS,
        metadata: { ...this.options.metadata, runId },
        envs: this.options.envs,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SandboxInfrastructureError(`Could not create E2B sandbox: ${message}`, error);
    }
  }

  private async destroy(sandbox: Sandbox, runId: string): Promise<void> {
    try {
      await sandbox.kill();
    } catch (error) {
      this.logger.warn('Could not kill E2B sandbox', { runId, error: error instanceof Error ? error.message : String(error) });
    }
  }
}
