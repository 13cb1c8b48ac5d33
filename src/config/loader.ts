import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, Config } from './validator';
import { defaults } from './defaults';
import { isRuntimeLanguage, RUNTIMES } from '../sandbox/runtimes';

/**
 * DeepPartial allows for recursive partials of our Config interface
 * This is useful for CLI and YAML overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? DeepPartial<U>[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(issues.length ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Directory searched for `.env` and `config.yaml` (default: process.cwd()) */
  cwd?: string;
  /** Explicit YAML file; overrides the `config.yaml` lookup */
  configPath?: string;
  /** Environment to read instead of process.env; `.env` is not loaded when given */
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();

  // Load .env into process.env
  if (!options.env) {
    dotenv.config({ path: path.join(cwd, '.env') });
  }
  const env = options.env ?? process.env;

  // 1. Start with Defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  const layers: Record<string, unknown>[] = [];

  // 2. Override with config.yaml (if exists)
  const yamlPath = options.configPath ? path.resolve(cwd, options.configPath) : path.join(cwd, 'config.yaml');
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isPlainObject(parsedYaml)) {
      layers.push(parsedYaml);
    }
  } else if (options.configPath) {
    throw new ConfigError(`Config file not found: ${yamlPath}`);
  }

  // 3. Override with Environment Variables
  layers.push(environmentOverrides(env));

  // 4. Override with CLI Arguments
  layers.push(cliOverrides);

  for (const layer of layers) {
    deepMerge(config, layer);
  }
  applyRuntimeDefaults(config, layers);

  // 5. Validate with Zod
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(
      'Configuration validation failed',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return result.data;
}

function environmentOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    providers: {
      gemini: { api_key: env.GEMINI_API_KEY },
      openai: { api_key: env.OPENAI_API_KEY, base_url: env.OPENAI_BASE_URL },
      anthropic: { api_key: env.ANTHROPIC_API_KEY },
      ollama: { base_url: env.OLLAMA_BASE_URL },
    },
    roles: {
      coder: { provider: env.CODER_PROVIDER, model: env.CODER_MODEL },
      reviewer: { provider: env.REVIEWER_PROVIDER, model: env.REVIEWER_MODEL },
    },
    sandbox: {
      provider: env.SANDBOX_PROVIDER,
      image: env.RUNNER_DOCKER_IMAGE,
      host_dir: env.RUNNER_HOST_SCRIPT_DIR,
      container_dir: env.RUNNER_CONTAINER_SCRIPT_DIR,
    },
    e2b: { api_key: env.E2B_API_KEY },
  };
}

function isSet(value: unknown): boolean {
  return value !== undefined && value !== '';
}

function setByAnyLayer(layers: Record<string, unknown>[], section: string, key: string): boolean {
  return layers.some((layer) => {
    const values = layer[section];
    return isPlainObject(values) && isSet(values[key]);
  });
}

/**
 * The default image and output filename follow the selected language
 * unless some layer names them explicitly.
 */
function applyRuntimeDefaults(config: Record<string, unknown>, layers: Record<string, unknown>[]): void {
  const { sandbox, output } = config;
  if (!isPlainObject(sandbox)) return;
  const language = sandbox.language;
  if (!isRuntimeLanguage(language)) return;
  const runtime = RUNTIMES[language];

  if (!setByAnyLayer(layers, 'sandbox', 'image')) {
    sandbox.image = runtime.image;
  }
  if (isPlainObject(output) && !setByAnyLayer(layers, 'output', 'filename')) {
    output.filename = `output${runtime.extension}`;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple deep merge for config objects.
 * Undefined and empty-string leaves never overwrite an existing value.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (isPlainObject(sourceValue)) {
      const targetValue = target[key];
      const nested = isPlainObject(targetValue) ? targetValue : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (isSet(sourceValue)) {
      target[key] = sourceValue;
    }
  }
}
