import fs from 'fs';
import os from 'os';
import path from 'path';
import { DockerSandboxExecutor } from '../../../src/sandbox/docker-executor';
import { SandboxInfrastructureError } from '../../../src/sandbox/errors';
import type { CommandOptions, CommandResult } from '../../../src/sandbox/command-runner';
import type { DockerSandboxOptions } from '../../../src/sandbox/types';
import { silentLogger } from '../../../src/utils/logger';

/** What the fake docker saw when it was asked to run */
interface Observed {
  args: string[];
  script: string;
}

describe('DockerSandboxExecutor', () => {
  let hostDir: string;
  let options: DockerSandboxOptions;

  beforeEach(() => {
    hostDir = fs.mkdtempSync(path.join(os.tmpdir(), 'codeloop-docker-'));
    options = { image: 'python:3.12-slim', hostDir, containerDir: '/workspace', language: 'python', timeoutMs: 5000, network: 'none' };
  });

  afterEach(() => {
    fs.rmSync(hostDir, { recursive: true, force: true });
  });

  /** Read the bound scratch directory back out of the `docker run` arguments */
  const scriptSeenBy = (args: string[]): string => {
    const volume = args[args.indexOf('-v') + 1] ?? '';
    const scratchDir = volume.split(':')[0] ?? '';
    const containerScript = args[args.length - 1] ?? '';
    return fs.readFileSync(path.join(scratchDir, path.posix.basename(containerScript)), 'utf8');
  };

  const fakeDocker = (result: Partial<CommandResult>, observed: Observed[] = []) =>
    jest.fn(async (_command: string, args: string[], _options?: CommandOptions): Promise<CommandResult> => {
      if (args[0] === 'run') {
        observed.push({ args, script: scriptSeenBy(args) });
      }
      return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...result };
    });

  it('should run the script in a throwaway container and capture its output', async () => {
    const observed: Observed[] = [];
    const docker = fakeDocker({ stdout: 'hello\n' }, observed);

    const result = await new DockerSandboxExecutor(options, docker, silentLogger).run('print("hello")');

    expect(result.exitStatus).toBe(0);
    expect(result.output).toBe('hello\n');
    expect(result.infrastructureError).toBeUndefined();
    expect(docker).toHaveBeenCalledWith('docker', expect.any(Array), { timeoutMs: 5000 });

    expect(observed).toHaveLength(1);
    const { args, script } = observed[0] ?? { args: [], script: '' };
    expect(script).toBe('print("hello")');
    expect(args.slice(0, 2)).toEqual(['run', '--rm']);
    expect(args[args.indexOf('--network') + 1]).toBe('none');
    expect(args).not.toContain('--user');
    expect(args.slice(-3, -1)).toEqual(['python:3.12-slim', 'python3']);
    expect(args[args.length - 1]).toMatch(/^\/workspace\/run_[0-9a-f]{8}\.py$/);
  });

  it('should remove the scratch directory afterwards', async () => {
    await new DockerSandboxExecutor(options, fakeDocker({}), silentLogger).run('print(1)');
    expect(fs.readdirSync(hostDir)).toEqual([]);
  });

  it('should report a non-zero exit as the program failing', async () => {
    const result = await new DockerSandboxExecutor(options, fakeDocker({ exitCode: 1, stderr: 'ZeroDivisionError: division by zero\n' }), silentLogger).run('1/0');

    expect(result.exitStatus).toBe(1);
    expect(result.output).toBe('ZeroDivisionError: division by zero\n');
    expect(result.stderr).toBe('ZeroDivisionError: division by zero\n');
    expect(result.infrastructureError).toBeUndefined();
  });

  it('should treat exit 125 with a docker diagnostic as a docker failure', async () => {
    const stderr = "Unable to find image 'missing:1' locally\ndocker: Error response from daemon: pull access denied for missing.\n";
    const docker = fakeDocker({ exitCode: 125, stderr });

    const result = await new DockerSandboxExecutor(options, docker, silentLogger).run('print(1)');

    const expected = "docker run failed: Unable to find image 'missing:1' locally\ndocker: Error response from daemon: pull access denied for missing.";
    expect(result.exitStatus).toBe(-1);
    expect(result.infrastructureError).toBe(expected);
    expect(result.output).toBe(`Runner error: ${expected}`);
  });

  it('should report a program that exits 125 itself as the program failing', async () => {
    const docker = fakeDocker({ exitCode: 125, stderr: 'giving up\n' });

    const result = await new DockerSandboxExecutor(options, docker, silentLogger).run('raise SystemExit(125)');

    expect(result.exitStatus).toBe(125);
    expect(result.output).toBe('giving up\n');
    expect(result.infrastructureError).toBeUndefined();
  });

  it('should run the container as the configured user', async () => {
    const observed: Observed[] = [];

    await new DockerSandboxExecutor({ ...options, user: '1000:1000' }, fakeDocker({}, observed), silentLogger).run('print(1)');

    const args = observed[0]?.args ?? [];
    expect(args.slice(-5, -2)).toEqual(['--user', '1000:1000', 'python:3.12-slim']);
  });

  it('should force-remove the container when the deadline passes', async () => {
    const docker = fakeDocker({ exitCode: -1, timedOut: true });

    const result = await new DockerSandboxExecutor(options, docker, silentLogger).run('while True: pass');

    const runArgs = docker.mock.calls[0]?.[1] ?? [];
    const containerName = runArgs[runArgs.indexOf('--name') + 1];
    expect(containerName).toMatch(/^codeloop-run_[0-9a-f]{8}$/);
    expect(docker).toHaveBeenLastCalledWith('docker', ['rm', '-f', containerName]);
    expect(result.exitStatus).toBe(-1);
    expect(result.infrastructureError).toBe('Execution exceeded the 5000ms deadline');
    expect(fs.readdirSync(hostDir)).toEqual([]);
  });

  it('should report a missing docker binary as an infrastructure failure', async () => {
    const docker = jest.fn(async (): Promise<CommandResult> => {
      throw new SandboxInfrastructureError('docker is not installed or not on PATH');
    });

    const result = await new DockerSandboxExecutor(options, docker, silentLogger).run('print(1)');

    expect(result.exitStatus).toBe(-1);
    expect(result.output).toBe('Runner error: docker is not installed or not on PATH');
    expect(fs.readdirSync(hostDir)).toEqual([]);
  });

  it('should give concurrent runs their own container and script', async () => {
    const observed: Observed[] = [];
    const executor = new DockerSandboxExecutor(options, fakeDocker({}, observed), silentLogger);

    await Promise.all([executor.run('print("a")'), executor.run('print("b")')]);

    expect(observed.map((o) => o.script).sort()).toEqual(['print("a")', 'print("b")']);
    const names = observed.map((o) => o.args[o.args.indexOf('--name') + 1]);
    expect(new Set(names).size).toBe(2);
    const volumes = observed.map((o) => o.args[o.args.indexOf('-v') + 1]);
    expect(new Set(volumes).size).toBe(2);
  });

  it('should run node programs with node', async () => {
    const observed: Observed[] = [];

    await new DockerSandboxExecutor({ ...options, image: 'node:20-slim', language: 'node' }, fakeDocker({}, observed), silentLogger).run('console.log(1)');

    const args = observed[0]?.args ?? [];
    expect(args.slice(-3, -1)).toEqual(['node:20-slim', 'node']);
    expect(args[args.length - 1]).toMatch(/\.js$/);
  });
});
