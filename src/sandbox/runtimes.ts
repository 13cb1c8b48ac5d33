import type { RuntimeLanguage } from './types';

export interface Runtime {
  /** Interpreter invocation, the script path is appended */
  command: string[];
  extension: string;
  /** Docker image used when none is configured */
  image: string;
}

export const RUNTIMES: Record<RuntimeLanguage, Runtime> = {
  python: { command: ['python3'], extension: '.py', image: 'python:3.12-slim' },
  node: { command: ['node'], extension: '.js', image: 'node:20-slim' },
};

export function isRuntimeLanguage(value: unknown): value is RuntimeLanguage {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(RUNTIMES, value);
}

export function scriptNameFor(runId: string, language: RuntimeLanguage): string {
  return `${runId}${RUNTIMES[language].extension}`;
}
