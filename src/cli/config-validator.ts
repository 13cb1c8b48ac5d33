import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import { spawnCommand } from '../sandbox/command-runner';
import type { CommandRunner } from '../sandbox/command-runner';
import { ProviderFactory } from '../llm/factory';
import type { TextProvider } from '../llm/types';
import type { Config, ProviderName, RoleBinding } from '../config/validator';

export type CheckStatus = 'ok' | 'warn' | 'fail';

export interface ConnectionCheck {
  name: string;
  status: CheckStatus;
  detail: string;
}

export interface ConfigValidatorDeps {
  runCommand?: CommandRunner;
  providers?: { get(name: ProviderName): TextProvider };
}

const PING_PROMPT = 'Reply with the single word OK.';
const DOCKER_CHECK_TIMEOUT_MS = 15_000;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? '';
}

/**
 * Checks that what the configuration points at is actually usable:
 * the sandbox backend and every provider bound to a role.
 */
export class ConfigValidator {
  private runCommand: CommandRunner;
  private providers: { get(name: ProviderName): TextProvider };

  constructor(
    private config: Config,
    deps: ConfigValidatorDeps = {},
  ) {
    this.runCommand = deps.runCommand ?? spawnCommand;
    this.providers = deps.providers ?? new ProviderFactory(config);
  }

  async testConnections(): Promise<ConnectionCheck[]> {
    const checks: ConnectionCheck[] = [];
    if (this.config.sandbox.provider === 'docker') {
      checks.push(...(await this.checkDocker()));
    }
    for (const [role, binding] of this.boundRoles()) {
      checks.push(await this.checkRole(role, binding));
    }
    return checks;
  }

  private boundRoles(): [string, RoleBinding][] {
    return Object.entries(this.config.roles).filter((entry): entry is [string, RoleBinding] => entry[1] !== undefined);
  }

  private async checkDocker(): Promise<ConnectionCheck[]> {
    const { image, host_dir: hostDir } = this.config.sandbox;
    const checks: ConnectionCheck[] = [];

    try {
      const info = await this.runCommand('docker', ['info', '--format', '{{.ServerVersion}}'], { timeoutMs: DOCKER_CHECK_TIMEOUT_MS });
      if (info.exitCode !== 0) {
        checks.push({ name: 'docker daemon', status: 'fail', detail: firstLine(info.stderr) || `docker info exited with ${info.exitCode}` });
        return [...checks, await this.checkHostDir(hostDir)];
      }
      checks.push({ name: 'docker daemon', status: 'ok', detail: `server ${info.stdout.trim()}` });

      const inspect = await this.runCommand('docker', ['image', 'inspect', image], { timeoutMs: DOCKER_CHECK_TIMEOUT_MS });
      checks.push(
        inspect.exitCode === 0
          ? { name: 'docker image', status: 'ok', detail: `${image} is present` }
          : { name: 'docker image', status: 'warn', detail: `${image} is not present locally and will be pulled on the first run` },
      );
    } catch (error) {
      checks.push({ name: 'docker daemon', status: 'fail', detail: describeError(error) });
    }

    checks.push(await this.checkHostDir(hostDir));
    return checks;
  }

  private async checkHostDir(hostDir: string): Promise<ConnectionCheck> {
    const root = path.resolve(hostDir);
    const marker = path.join(root, `.write-check-${crypto.randomBytes(4).toString('hex')}`);
    try {
      await fs.mkdir(root, { recursive: true });
      await fs.writeFile(marker, 'ok');
      await fs.rm(marker, { force: true });
      return { name: 'sandbox host_dir', status: 'ok', detail: `${root} is writable` };
    } catch (error) {
      return { name: 'sandbox host_dir', status: 'fail', detail: `${root}: ${describeError(error)}` };
    }
  }

  private async checkRole(role: string, binding: RoleBinding): Promise<ConnectionCheck> {
    const name = `${role} (${binding.provider}/${binding.model})`;
    try {
      const provider = this.providers.get(binding.provider);
      await provider.complete(PING_PROMPT, { model: binding.model, temperature: 0, maxOutputTokens: 1 });
      return { name, status: 'ok', detail: 'responded' };
    } catch (error) {
      return { name, status: 'fail', detail: describeError(error) };
    }
  }
}

export function formatConnectionCheck(check: ConnectionCheck): string {
  const line = `${check.name}: ${check.detail}`;
  switch (check.status) {
    case 'ok':
      return chalk.green(`✓ ${line}`);
    case 'warn':
      return chalk.yellow(`! ${line}`);
    case 'fail':
      return chalk.red(`✗ ${line}`);
  }
}
