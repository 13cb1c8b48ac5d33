import crypto from 'crypto';
import type { ExecutionResult } from './types';

/** Fresh identifier for one materialized program, e.g. `run_3f9a0c1b` */
export function createRunId(): string {
  return `run_${crypto.randomBytes(4).toString('hex')}`;
}

export function buildResult(exitStatus: number, stdout: string, stderr: string, startedAt: number): ExecutionResult {
  return {
    exitStatus,
    output: stdout + stderr,
    stdout,
    stderr,
    durationMs: Date.now() - startedAt,
    capturedAt: new Date().toISOString(),
  };
}

export function infrastructureFailure(error: unknown, startedAt: number): ExecutionResult {
  const message = error instanceof Error ? error.message : String(error);
  const diagnostic = `Runner error: ${message}`;
  return {
    exitStatus: -1,
    output: diagnostic,
    stdout: '',
    stderr: '',
    durationMs: Date.now() - startedAt,
    capturedAt: new Date().toISOString(),
    infrastructureError: message,
  };
}
