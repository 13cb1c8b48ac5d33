import { DockerSandboxExecutor } from './docker-executor';
import { E2BSandboxExecutor } from './e2b-executor';
import type { SandboxExecutor } from './types';
import type { Config } from '../config/validator';
import type { Logger } from '../utils/logger';

export * from './types';
export { DockerSandboxExecutor } from './docker-executor';
export { E2BSandboxExecutor } from './e2b-executor';
export { SandboxInfrastructureError, SandboxTimeoutError } from './errors';

/** Build the executor selected by `sandbox.provider` */
export function createSandboxExecutor(config: Config, logger?: Logger): SandboxExecutor {
  const { sandbox } = config;

  if (sandbox.provider === 'e2b') {
    return new E2BSandboxExecutor(
      {
        apiKey: config.e2b.api_key ?? '',
        template: config.e2b.template,
        language: sandbox.language,
        timeoutMs: sandbox.timeout_ms,
        workDir: config.e2b.work_dir,
      },
      logger,
    );
  }

  return new DockerSandboxExecutor(
    {
      image: sandbox.image,
      hostDir: sandbox.host_dir,
      containerDir: sandbox.container_dir,
      language: sandbox.language,
      timeoutMs: sandbox.timeout_ms,
      network: sandbox.network,
      user: hostUser(),
    },
    undefined,
    logger,
  );
}

function hostUser(): string | undefined {
  if (!process.getuid || !process.getgid) return undefined;
  return `${process.getuid()}:${process.getgid()}`;
}
