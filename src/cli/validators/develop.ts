import path from 'path';
import type { DevelopCommandOptions } from '../types';
import type { DeepPartial } from '../../config/loader';
import type { Config } from '../../config/validator';
import type { RuntimeLanguage, SandboxProvider } from '../../sandbox/types';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export interface ValidatedDevelopOptions {
  request: string;
  maxIterations?: number;
  sandbox?: SandboxProvider;
  language?: RuntimeLanguage;
  image?: string;
  output?: string;
  saveMetadata: boolean;
  save: boolean;
  configPath?: string;
  verbose: boolean;
}

const SANDBOX_PROVIDERS: readonly SandboxProvider[] = ['docker', 'e2b'];
const LANGUAGES: readonly RuntimeLanguage[] = ['python', 'node'];

function oneOf<T extends string>(value: string, allowed: readonly T[]): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

/**
 * Validate `develop` command input
 *
 * @throws {ValidationError} If validation fails
 */
export function validateDevelopOptions(request: string, options: DevelopCommandOptions): ValidatedDevelopOptions {
  const trimmed = request.trim();
  if (!trimmed) {
    throw new ValidationError('A request is required, e.g. codeloop develop "print the first 10 primes"');
  }

  let maxIterations: number | undefined;
  if (options.maxIterations !== undefined) {
    maxIterations = Number(options.maxIterations);
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new ValidationError(`--max-iterations must be a positive integer, got "${options.maxIterations}"`);
    }
  }

  let sandbox: SandboxProvider | undefined;
  if (options.sandbox !== undefined) {
    sandbox = oneOf(options.sandbox, SANDBOX_PROVIDERS);
    if (!sandbox) {
      throw new ValidationError(`--sandbox must be one of ${SANDBOX_PROVIDERS.join(', ')}, got "${options.sandbox}"`);
    }
  }

  let language: RuntimeLanguage | undefined;
  if (options.language !== undefined) {
    language = oneOf(options.language, LANGUAGES);
    if (!language) {
      throw new ValidationError(`--language must be one of ${LANGUAGES.join(', ')}, got "${options.language}"`);
    }
  }

  return {
    request: trimmed,
    maxIterations,
    sandbox,
    language,
    image: options.image,
    output: options.output,
    saveMetadata: options.saveMetadata ?? false,
    save: options.save ?? true,
    configPath: options.config,
    verbose: options.verbose ?? false,
  };
}

/** Map validated options onto the config layer they override */
export function toConfigOverrides(options: ValidatedDevelopOptions): DeepPartial<Config> {
  const overrides: DeepPartial<Config> = {
    output: { enabled: options.save, save_metadata: options.saveMetadata },
  };

  if (options.maxIterations !== undefined) {
    overrides.session = { iteration_limit: options.maxIterations };
  }
  if (options.sandbox || options.language || options.image) {
    overrides.sandbox = { provider: options.sandbox, language: options.language, image: options.image };
  }
  if (options.output) {
    overrides.output = { ...overrides.output, dir: path.dirname(options.output), filename: path.basename(options.output) };
  }

  return overrides;
}
