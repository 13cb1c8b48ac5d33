import fs from 'fs/promises';
import path from 'path';
import { RUNTIMES, scriptNameFor } from './runtimes';
import { SandboxInfrastructureError, SandboxTimeoutError } from './errors';
import { buildResult, createRunId, infrastructureFailure } from './result';
import { spawnCommand } from './command-runner';
import type { CommandRunner } from './command-runner';
import type { DockerSandboxOptions, ExecutionResult, SandboxExecutor } from './types';
import { logger as defaultLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

/** `docker run` reserves 125 for failures of the daemon or the run command itself */
const DOCKER_RUN_FAILURE = 125;

/** The docker client prefixes its own diagnostics, a program exiting 125 does not */
const DOCKER_DIAGNOSTIC = /^docker: /m;

/**
 * Runs each program in a throwaway container. The only host state the
 * container sees is a per-run scratch directory, bound read-write, that
 * carries the script in; both the container and the directory are gone
 * when `run` returns.
 */
export class DockerSandboxExecutor implements SandboxExecutor {
  constructor(
    private options: DockerSandboxOptions,
    private runCommand: CommandRunner = spawnCommand,
    private logger: Logger = defaultLogger,
  ) {}

  async run(code: string): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const runId = createRunId();
    const scriptName = scriptNameFor(runId, this.options.language);
    const containerName = `codeloop-${runId}`;
    let scratchDir: string | undefined;

    try {
      const hostRoot = path.resolve(this.options.hostDir);
      await fs.mkdir(hostRoot, { recursive: true });
      scratchDir = await fs.mkdtemp(path.join(hostRoot, `${runId}-`));
      await fs.writeFile(path.join(scratchDir, scriptName), code, 'utf8');

      const args = this.buildRunArgs(containerName, scratchDir, scriptName);
      this.logger.debug('Starting container', { container: containerName, image: this.options.image });

      const result = await this.runCommand('docker', args, { timeoutMs: this.options.timeoutMs });

      if (result.timedOut) {
        await this.forceRemove(containerName);
        throw new SandboxTimeoutError(this.options.timeoutMs);
      }
      if (result.exitCode === DOCKER_RUN_FAILURE && DOCKER_DIAGNOSTIC.test(result.stderr)) {
        throw new SandboxInfrastructureError(`docker run failed: ${result.stderr.trim() || 'no diagnostic output'}`);
      }

      return buildResult(result.exitCode, result.stdout, result.stderr, startedAt);
    } catch (error) {
      this.logger.error('Sandbox infrastructure failure', { runId, error: error instanceof Error ? error.message : String(error) });
      return infrastructureFailure(error, startedAt);
    } finally {
      if (scratchDir) {
        await this.removeScratch(scratchDir);
      }
    }
  }

  private buildRunArgs(containerName: string, scratchDir: string, scriptName: string): string[] {
    const containerDir = this.options.containerDir.replace(/\\/g, '/');
    const containerScript = path.posix.join(containerDir, scriptName);
    return [
      'run',
      '--rm',
      '--name',
      containerName,
      '--network',
      this.options.network,
      '-v',
      `${scratchDir}:${containerDir}:rw`,
      '-w',
      containerDir,
      ...(this.options.user ? ['--user', this.options.user] : []),
      this.options.image,
      ...RUNTIMES[this.options.language].command,
      containerScript,
    ];
  }

  private async forceRemove(containerName: string): Promise<void> {
    try {
      await this.runCommand('docker', ['rm', '-f', containerName]);
    } catch (error) {
      this.logger.warn('Could not remove timed-out container', { container: containerName, error: error instanceof Error ? error.message : String(error) });
    }
  }

  private async removeScratch(scratchDir: string): Promise<void> {
    try {
      await fs.rm(scratchDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn('Could not remove scratch directory', { scratchDir, error: error instanceof Error ? error.message : String(error) });
    }
  }
}
