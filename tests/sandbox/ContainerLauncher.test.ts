import { ContainerLauncher } from '../../src/sandbox/ContainerLauncher.js';
import { InfrastructureError } from '../../src/sandbox/ErrorHandling.js';
import type { ExecutionRequest, SandboxRecord } from '../../src/sandbox/types.js';
import { FakeContainerRuntime, limits } from '../helpers/FakeContainerRuntime.js';

describe('ContainerLauncher', () => {
  let runtime: FakeContainerRuntime;
  let launcher: ContainerLauncher;

  const sandbox: SandboxRecord = {
    userId: 'alice',
    rootDir: '/srv/sandboxes/alice',
    createdAt: 0,
    lastActivityAt: 0,
    sizeBytes: 0,
  };

  const request = (overrides: Partial<ExecutionRequest> = {}): ExecutionRequest => ({
    code: 'print(1)',
    workdir: '.',
    timeoutMs: 1000,
    limits,
    ...overrides,
  });

  beforeEach(() => {
    runtime = new FakeContainerRuntime();
    launcher = new ContainerLauncher({
      runtime,
      image: 'python:3.11-alpine',
      maxOutputBytes: 16,
      killGraceMs: 50,
    });
  });

  describe('buildRunArgs', () => {
    it('should build a hardened, offline invocation', () => {
      const args = launcher.buildRunArgs({
        name: 'sbx-run-abc',
        rootDir: '/srv/sandboxes/alice',
        workdir: 'src/app',
        limits,
      });

      expect(args).toEqual([
        'run',
        '--rm',
        '-i',
        '--name',
        'sbx-run-abc',
        '--network',
        'none',
        '--read-only',
        '--tmpfs',
        '/tmp:rw,noexec,nosuid,size=64m',
        '--pids-limit',
        '64',
        '--cpus',
        '1',
        '--memory',
        '268435456',
        '--memory-swap',
        '268435456',
        '--cap-drop',
        'ALL',
        '--security-opt',
        'no-new-privileges',
        '--user',
        '1000:1000',
        '-v',
        '/srv/sandboxes/alice:/workspace:rw',
        '-w',
        '/workspace/src/app',
        '-e',
        'PYTHONDONTWRITEBYTECODE=1',
        '-e',
        'PYTHONUNBUFFERED=1',
        '-e',
        'PYTHONPATH=/workspace/.site-packages',
        'python:3.11-alpine',
        'python',
        '-',
      ]);
    });

    it('should use the mount point itself for the sandbox root', () => {
      const args = launcher.buildRunArgs({ name: 'n', rootDir: '/r', workdir: '.', limits });

      expect(args[args.indexOf('-w') + 1]).toBe('/workspace');
    });
  });

  describe('run', () => {
    it('should send the code on stdin and capture both streams', async () => {
      runtime.script = (proc) => {
        proc.writeStdout('hello\n');
        proc.writeStderr('warning\n');
        proc.exit(0);
      };

      const result = await launcher.run(sandbox, request());

      expect(await runtime.spawned[0].whenInput()).toBe('print(1)');
      expect(result).toMatchObject({
        stdout: 'hello\n',
        stderr: 'warning\n',
        exitCode: 0,
        timedOut: false,
        truncated: false,
        status: 'completed',
      });
      expect(result.resource).toBeUndefined();
      expect(runtime.spawned[0].name).toMatch(/^sbx-run-[0-9a-f]{12}$/);
    });

    it('should report non-zero exit codes as completed runs', async () => {
      runtime.script = (proc) => {
        proc.writeStderr('ZeroDivisionError: division by zero\n');
        proc.exit(1);
      };

      const result = await launcher.run(sandbox, request());

      expect(result.status).toBe('completed');
      expect(result.exitCode).toBe(1);
    });

    it('should remove the container and kill the client on timeout', async () => {
      runtime.script = (proc) => proc.writeStdout('partial');

      const result = await launcher.run(sandbox, request({ timeoutMs: 20 }));

      expect(result).toMatchObject({
        stdout: 'partial',
        exitCode: 124,
        timedOut: true,
        status: 'timeout',
      });
      expect(runtime.removed).toEqual([runtime.spawned[0].name]);
      expect(runtime.spawned[0].killSignals).toEqual(['SIGKILL']);
    });

    it('should give up waiting for a killed client after the grace period', async () => {
      runtime.script = (proc) => {
        proc.exitOnKill = false;
      };

      const result = await launcher.run(sandbox, request({ timeoutMs: 10 }));

      expect(result.status).toBe('timeout');
      expect(result.exitCode).toBe(124);
    });

    it('should report cancellation when the signal aborts', async () => {
      const controller = new AbortController();
      runtime.script = () => {
        setTimeout(() => controller.abort(), 5);
      };

      const result = await launcher.run(sandbox, request(), controller.signal);

      expect(result).toMatchObject({ status: 'cancelled', exitCode: 130, timedOut: false });
      expect(runtime.removed).toHaveLength(1);
    });

    it('should cancel at once when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      runtime.script = () => undefined;

      const result = await launcher.run(sandbox, request(), controller.signal);

      expect(result.status).toBe('cancelled');
    });

    it('should classify exit code 137 as a memory kill', async () => {
      runtime.script = (proc) => proc.exit(137);

      const result = await launcher.run(sandbox, request());

      expect(result).toMatchObject({
        status: 'resource_exceeded',
        resource: 'memory',
        exitCode: 137,
      });
    });

    it('should classify fork failures as a process limit', async () => {
      runtime.script = (proc) => {
        proc.writeStderr('BlockingIOError: [Errno 11] Resource temporarily unavailable\n');
        proc.exit(1);
      };

      const result = await launcher.run(sandbox, request());

      expect(result).toMatchObject({ status: 'resource_exceeded', resource: 'processes' });
    });

    it('should truncate output beyond the byte cap', async () => {
      runtime.script = (proc) => {
        proc.writeStdout('x'.repeat(40));
        proc.exit(0);
      };

      const result = await launcher.run(sandbox, request());

      expect(result.stdout).toBe('x'.repeat(16));
      expect(result.truncated).toBe(true);
    });

    it('should raise an infrastructure error when docker fails before the code runs', async () => {
      runtime.script = (proc) => {
        proc.writeStderr(
          "docker: Error response from daemon: Unable to find image 'python:3.11-alpine' locally.\n",
        );
        proc.exit(125);
      };

      const failure = launcher.run(sandbox, request());

      await expect(failure).rejects.toBeInstanceOf(InfrastructureError);
      await expect(failure).rejects.toMatchObject({
        message:
          "Container runtime failed to start the sandbox: docker: Error response from daemon: Unable to find image 'python:3.11-alpine' locally.",
        hint: 'image not pulled: run docker pull python:3.11-alpine',
      });
    });

    it('should treat exit code 125 from user code as an ordinary exit', async () => {
      runtime.script = (proc) => proc.exit(125);

      const result = await launcher.run(sandbox, request());

      expect(result).toMatchObject({ status: 'completed', exitCode: 125 });
    });

    it('should raise an infrastructure error when the client is missing', async () => {
      runtime.spawnError = Object.assign(new Error('spawn docker ENOENT'), { code: 'ENOENT' });

      await expect(launcher.run(sandbox, request())).rejects.toMatchObject({
        code: 'INFRASTRUCTURE',
        message: 'Docker client not found',
      });
    });

    it('should raise an infrastructure error when the client emits an error', async () => {
      runtime.script = (proc) => {
        setImmediate(() => proc.emit('error', new Error('spawn EACCES')));
      };

      await expect(launcher.run(sandbox, request())).rejects.toMatchObject({
        code: 'INFRASTRUCTURE',
        message: 'Failed to launch container: spawn EACCES',
      });
    });
  });

  describe('image preparation', () => {
    it('should ensure the image once', async () => {
      await launcher.run(sandbox, request());
      await launcher.run(sandbox, request());

      expect(runtime.ensureCalls).toEqual([{ image: 'python:3.11-alpine', pull: true }]);
    });

    it('should skip the check once the image is marked ready', async () => {
      launcher.markImageReady();

      await launcher.run(sandbox, request());

      expect(runtime.ensureCalls).toEqual([]);
    });

    it('should not launch when the image cannot be made available', async () => {
      runtime.ensureError = new InfrastructureError('pull failed', 'check the registry');

      await expect(launcher.run(sandbox, request())).rejects.toThrow('pull failed');
      expect(runtime.spawned).toEqual([]);
    });
  });
});
