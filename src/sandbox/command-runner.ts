import { spawn } from 'child_process';
import { SandboxInfrastructureError } from './errors';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
}

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

/**
 * Spawn a process and collect its output. Rejects only when the process
 * cannot be started; a non-zero exit or a deadline kill resolves normally.
 */
export const spawnCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd: options.cwd || process.cwd() });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
          }, options.timeoutMs)
        : undefined;

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (timer) clearTimeout(timer);
      if (err.code === 'ENOENT') {
        reject(new SandboxInfrastructureError(`${command} is not installed or not on PATH`, err));
      } else {
        reject(new SandboxInfrastructureError(`Failed to start ${command}: ${err.message}`, err));
      }
    });

    // Stream decoding keeps a multi-byte character intact across chunk boundaries
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (data: string) => {
      stdout += data;
    });

    child.stderr.on('data', (data: string) => {
      stderr += data;
    });

    child.on('close', (code: number | null) => {
      if (timer) clearTimeout(timer);
      resolve({ exitCode: code ?? -1, stdout, stderr, timedOut });
    });
  });
};
