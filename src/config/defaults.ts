import type { Config } from './validator';
import { RUNTIMES } from '../sandbox/runtimes';

export const defaults: Config = {
  session: {
    iteration_limit: 5,
    failure_limit: 3,
    agent_timeout_ms: 120_000,
  },
  providers: {
    gemini: {},
    openai: {},
    anthropic: {},
    ollama: { base_url: 'http://localhost:11434' },
  },
  roles: {
    coder: { provider: 'openai', model: 'gpt-4o-mini', temperature: 0.1 },
    reviewer: { provider: 'openai', model: 'gpt-4o-mini', temperature: 0 },
  },
  prompts: {},
  sandbox: {
    provider: 'docker',
    language: 'python',
    image: RUNTIMES.python.image,
    host_dir: '.codeloop/runs',
    container_dir: '/workspace',
    network: 'none',
    timeout_ms: 60_000,
  },
  e2b: {
    template: 'base',
    work_dir: '/home/user/codeloop',
  },
  output: {
    enabled: true,
    dir: 'out',
    filename: `output${RUNTIMES.python.extension}`,
    save_metadata: false,
  },
};
