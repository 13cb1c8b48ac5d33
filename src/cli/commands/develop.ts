import { Command } from 'commander';
import chalk from 'chalk';
import crypto from 'crypto';
import path from 'path';
import { loadConfig, ConfigError } from '../../config/loader';
import { findMissingCredentials } from '../../config/validator';
import { createDevelopmentSession } from '../../orchestrator/create-session';
import { formatDecision, formatDevelopmentResult, formatError, formatInfo, formatStep, formatWarning } from '../formatters';
import { toConfigOverrides, validateDevelopOptions, ValidationError } from '../validators/develop';
import type { DevelopCommandOptions } from '../types';
import type { Logger } from '../../utils/logger';

// ── Verbose-aware logger ────────────────────────────────────────────────

/** Logger that writes directly to the console; info and debug only show with --verbose */
export class CLISessionLogger implements Logger {
  constructor(
    private runId: string,
    private verbose: boolean,
  ) {}

  info(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(formatInfo(`[${this.runId.slice(0, 8)}] ${message}${suffix(data)}`));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(formatWarning(`WARN: ${message}${suffix(data)}`));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(formatError(`${message}${suffix(data)}`));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(formatInfo(`DEBUG: ${message}${suffix(data)}`));
    }
  }
}

function suffix(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : '';
}

// ── Command registration ────────────────────────────────────────────────

export function registerDevelopCommand(program: Command): void {
  program
    .command('develop')
    .description('Generate, run and review code until it satisfies the request')
    .argument('<request>', 'What the program should do')
    .option('-n, --max-iterations <n>', 'Maximum number of code generations')
    .option('--sandbox <provider>', 'Sandbox backend (docker or e2b)')
    .option('--language <language>', 'Program language (python or node)')
    .option('--image <image>', 'Docker image used by the docker sandbox')
    .option('-o, --output <file>', 'Where to write the final code')
    .option('--save-metadata', 'Also write a JSON file describing the session')
    .option('--no-save', 'Do not write the final code to disk')
    .option('-c, --config <file>', 'Path to a YAML configuration file')
    .option('--verbose', 'Show every decision and the final artifacts')
    .action(async (request: string, options: DevelopCommandOptions) => {
      await executeDevelopCommand(request, options, program.opts().verbose === true);
    });
}

// ── Main execution ──────────────────────────────────────────────────────

/**
 * Executes the `codeloop develop` command.
 *
 * Sets `process.exitCode` to 1 when the session does not complete,
 * or when the input or the configuration is rejected.
 */
export async function executeDevelopCommand(request: string, options: DevelopCommandOptions, globalVerbose = false): Promise<void> {
  try {
    const validated = validateDevelopOptions(request, { ...options, verbose: globalVerbose || options.verbose });
    const config = loadConfig(toConfigOverrides(validated), { configPath: validated.configPath });

    for (const missing of findMissingCredentials(config)) {
      console.log(formatWarning(missing));
    }

    const runId = crypto.randomUUID();
    const session = createDevelopmentSession(config, {
      runId,
      logger: new CLISessionLogger(runId, validated.verbose),
    });

    if (validated.verbose) {
      session.events.onDecision((event) => console.log(formatDecision(event)));
    }

    console.log('');
    console.log(formatStep(`Developing: ${validated.request}`));
    console.log(formatInfo(`sandbox:     ${config.sandbox.provider} (${config.sandbox.language})`));
    console.log(formatInfo(`coder:       ${config.roles.coder.provider}/${config.roles.coder.model}`));
    console.log(formatInfo(`reviewer:    ${config.roles.reviewer.provider}/${config.roles.reviewer.model}`));
    console.log(formatInfo(`iterations:  ${config.session.iteration_limit}`));

    const state = await session.develop(validated.request);

    const savedTo =
      config.output.enabled && state.status === 'completed' && state.code ? path.join(config.output.dir, config.output.filename) : undefined;
    console.log(formatDevelopmentResult(state, { verbose: validated.verbose, savedTo }));

    if (state.status !== 'completed') {
      process.exitCode = 1;
    }
  } catch (err) {
    if (err instanceof ValidationError || err instanceof ConfigError) {
      console.error(chalk.red(err.message));
    } else {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(formatError(msg));
    }
    process.exitCode = 1;
  }
}
