import inquirer from 'inquirer';
import type { ProviderName } from '../config/validator';
import type { SandboxProvider } from '../sandbox/types';

export interface ConfigAnswers {
  provider: ProviderName;
  model: string;
  apiKey?: string;
  ollamaBaseUrl?: string;
  sandbox: SandboxProvider;
  e2bApiKey?: string;
}

const PROVIDERS: ProviderName[] = ['openai', 'anthropic', 'gemini', 'ollama'];

const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-sonnet-latest',
  gemini: 'gemini-1.5-flash',
  ollama: 'llama3.1',
};

const KEY_VARIABLES: Record<Exclude<ProviderName, 'ollama'>, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
};

export const promptForConfig = async (): Promise<ConfigAnswers> => {
  return inquirer.prompt<ConfigAnswers>([
    {
      type: 'list',
      name: 'provider',
      message: 'Select the model provider for coding and review:',
      choices: PROVIDERS,
      default: 'openai',
    },
    {
      type: 'input',
      name: 'model',
      message: 'Model name:',
      default: (answers: ConfigAnswers) => DEFAULT_MODELS[answers.provider],
      validate: (input: string) => input.trim().length > 0 || 'Model name is required',
    },
    {
      type: 'password',
      name: 'apiKey',
      message: 'Enter the provider API key:',
      when: (answers: ConfigAnswers) => answers.provider !== 'ollama',
      validate: (input: string) => input.length > 0 || 'API key is required',
    },
    {
      type: 'input',
      name: 'ollamaBaseUrl',
      message: 'Ollama base URL:',
      default: 'http://localhost:11434',
      when: (answers: ConfigAnswers) => answers.provider === 'ollama',
    },
    {
      type: 'list',
      name: 'sandbox',
      message: 'Where should generated code run?',
      choices: ['docker', 'e2b'],
      default: 'docker',
    },
    {
      type: 'password',
      name: 'e2bApiKey',
      message: 'Enter your E2B API Key:',
      when: (answers: ConfigAnswers) => answers.sandbox === 'e2b',
      validate: (input: string) => input.length > 0 || 'E2B API Key is required',
    },
  ]);
};

/** Render prompt answers as the `.env` lines `loadConfig` reads back */
export function toEnvFile(answers: ConfigAnswers): string {
  const lines = [
    `CODER_PROVIDER=${answers.provider}`,
    `CODER_MODEL=${answers.model}`,
    `REVIEWER_PROVIDER=${answers.provider}`,
    `REVIEWER_MODEL=${answers.model}`,
  ];

  if (answers.provider !== 'ollama' && answers.apiKey) {
    lines.push(`${KEY_VARIABLES[answers.provider]}=${answers.apiKey}`);
  }
  if (answers.provider === 'ollama' && answers.ollamaBaseUrl) {
    lines.push(`OLLAMA_BASE_URL=${answers.ollamaBaseUrl}`);
  }

  lines.push(`SANDBOX_PROVIDER=${answers.sandbox}`);
  if (answers.e2bApiKey) {
    lines.push(`E2B_API_KEY=${answers.e2bApiKey}`);
  }

  return `${lines.join('\n')}\n`;
}
