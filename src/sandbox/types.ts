export type SandboxProvider = 'docker' | 'e2b';

export type RuntimeLanguage = 'python' | 'node';

export interface ExecutionResult {
  /** Program exit status, or -1 when the sandbox itself could not run it */
  exitStatus: number;
  /** stdout followed by stderr */
  output: string;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** ISO-8601 timestamp of when the result was captured */
  capturedAt: string;
  /** Diagnostic for infrastructure failures; absent when the program itself ran */
  infrastructureError?: string;
}

export interface SandboxExecutor {
  /** Run `code` as a standalone program. Never rejects: infrastructure failures come back as exitStatus -1. */
  run(code: string): Promise<ExecutionResult>;
}

export interface DockerSandboxOptions {
  image: string;
  hostDir: string;
  containerDir: string;
  language: RuntimeLanguage;
  timeoutMs: number;
  /** Value passed to `docker run --network` */
  network: string;
  /** `uid:gid` the container runs as, so files it leaves in the bind mount stay removable */
  user?: string;
}

export interface E2BSandboxOptions {
  apiKey: string;
  template: string;
  language: RuntimeLanguage;
  timeoutMs: number;
  /** Directory inside the sandbox that receives the program */
  workDir: string;
  metadata?: Record<string, string>;
  envs?: Record<string, string>;
}
