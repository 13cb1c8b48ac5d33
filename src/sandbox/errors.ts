/**
 * The sandbox could not host the program at all (daemon down, image missing,
 * quota exhausted, deadline hit). Kept apart from a program that ran and exited non-zero.
 */
export class SandboxInfrastructureError extends Error {
  constructor(
    message: string,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'SandboxInfrastructureError';
  }
}

export class SandboxTimeoutError extends SandboxInfrastructureError {
  constructor(public timeoutMs: number) {
    super(`Execution exceeded the ${timeoutMs}ms deadline`);
    this.name = 'SandboxTimeoutError';
  }
}
