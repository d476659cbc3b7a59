import { describe, it, expect, beforeEach } from 'vitest';
import { ProcessSupervisorService } from '../../../src/supervisor/process-supervisor.service';
import { ServiceSpec } from '../../../src/domain/value-objects/service-spec.vo';
import { LaunchError } from '../../../src/domain/errors/harness.errors';
import {
  asLogger,
  createConfigService,
  createMockLogger,
  createMockProcessHandle,
  createMockProcessLauncher,
  createTestConfig,
  MockLogger,
  MockProcessHandle,
  waitForAsync,
} from '../helpers/mock-factories';

describe('ProcessSupervisorService', () => {
  let supervisor: ProcessSupervisorService;
  let mockLauncher: ReturnType<typeof createMockProcessLauncher>;
  let mockLogger: MockLogger;
  let handles: Map<string, MockProcessHandle>;

  const spec = (name: string) =>
    ServiceSpec.create({
      name,
      executable: 'python3',
      args: ['-m', name],
      output: { stdout: `/tmp/${name}.log`, stderr: `/tmp/${name}.log` },
    });

  const specs = [spec('api'), spec('coordinator'), spec('worker')];

  beforeEach(() => {
    mockLauncher = createMockProcessLauncher();
    mockLogger = createMockLogger();
    handles = new Map();

    let nextPid = 100;
    mockLauncher.launch.mockImplementation(async (serviceSpec) => {
      const handle = createMockProcessHandle(serviceSpec, nextPid++);
      handles.set(serviceSpec.name, handle);
      return handle;
    });

    supervisor = new ProcessSupervisorService(
      mockLauncher,
      createConfigService(
        createTestConfig({ SHUTDOWN_GRACE_MS: '8000', SHUTDOWN_KILL_TIMEOUT_MS: '5000' }),
      ),
      asLogger(mockLogger),
    );
  });

  const terminationOrder = (): string[] =>
    [...handles.values()]
      .filter((handle) => handle.terminate.mock.calls.length > 0)
      .sort(
        (a, b) =>
          a.terminate.mock.invocationCallOrder[0] - b.terminate.mock.invocationCallOrder[0],
      )
      .map((handle) => handle.spec.name);

  describe('runWithServices', () => {
    it('should start services in order and terminate them in reverse after success', async () => {
      const result = await supervisor.runWithServices(specs, async () => {
        expect(supervisor.getProcesses().map((process) => process.name)).toEqual([
          'api',
          'coordinator',
          'worker',
        ]);
        return 'done';
      });

      expect(result).toBe('done');
      expect(mockLauncher.launch.mock.calls.map(([launched]) => launched.name)).toEqual([
        'api',
        'coordinator',
        'worker',
      ]);
      expect(terminationOrder()).toEqual(['worker', 'coordinator', 'api']);
      for (const handle of handles.values()) {
        expect(handle.terminate).toHaveBeenCalledTimes(1);
        expect(handle.terminate).toHaveBeenCalledWith({ graceMs: 8000, killTimeoutMs: 5000 });
      }
    });

    it('should terminate every service when the work fails and rethrow its error', async () => {
      const failure = new Error('submission rejected');

      await expect(
        supervisor.runWithServices(specs, async () => {
          throw failure;
        }),
      ).rejects.toBe(failure);

      expect(terminationOrder()).toEqual(['worker', 'coordinator', 'api']);
    });

    it('should terminate already started services when a later launch fails', async () => {
      const launchError = new LaunchError('coordinator', 'spawn python3 ENOENT');
      mockLauncher.launch
        .mockImplementationOnce(async (serviceSpec) => {
          const handle = createMockProcessHandle(serviceSpec, 200);
          handles.set(serviceSpec.name, handle);
          return handle;
        })
        .mockRejectedValueOnce(launchError);

      let workRan = false;
      await expect(
        supervisor.runWithServices(specs, async () => {
          workRan = true;
        }),
      ).rejects.toBe(launchError);

      expect(workRan).toBe(false);
      expect(mockLauncher.launch).toHaveBeenCalledTimes(2);
      expect(handles.get('api')?.terminate).toHaveBeenCalledTimes(1);
    });

    it('should keep tearing down when one service fails to stop', async () => {
      await supervisor.runWithServices(specs, async () => {
        handles.get('coordinator')?.terminate.mockRejectedValueOnce(new Error('EPERM'));
      });

      expect(handles.get('api')?.terminate).toHaveBeenCalledTimes(1);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { service: 'coordinator', pid: 101, error: 'EPERM' },
        'Failed to terminate service cleanly, continuing teardown',
      );
    });
  });

  describe('ensureTerminated', () => {
    it('should signal a process only once', async () => {
      const process = await supervisor.start(spec('api'));

      await supervisor.ensureTerminated(process);
      await supervisor.ensureTerminated(process);
      await supervisor.terminateAll();

      expect(handles.get('api')?.terminate).toHaveBeenCalledTimes(1);
    });

    it('should not signal again on module destroy after a completed run', async () => {
      await supervisor.runWithServices(specs, async () => undefined);
      await supervisor.onModuleDestroy();

      for (const handle of handles.values()) {
        expect(handle.terminate).toHaveBeenCalledTimes(1);
      }
    });

    it('should tear down on module destroy when the run was interrupted', async () => {
      await supervisor.start(spec('api'));
      await supervisor.start(spec('worker'));

      await supervisor.onModuleDestroy();

      expect(terminationOrder()).toEqual(['worker', 'api']);
    });
  });

  describe('start', () => {
    it('should refuse a second running process with the same name', async () => {
      await supervisor.start(spec('api'));

      await expect(supervisor.start(spec('api'))).rejects.toThrow(
        'Failed to launch service api: already running with pid 100',
      );
    });
  });

  describe('shutdown while launching', () => {
    it('should stop a service whose launch completes after teardown began', async () => {
      let releaseCoordinator: () => void = () => undefined;
      const coordinatorGate = new Promise<void>((resolve) => {
        releaseCoordinator = resolve;
      });
      let nextPid = 300;
      mockLauncher.launch.mockImplementation(async (serviceSpec) => {
        if (serviceSpec.name === 'coordinator') {
          await coordinatorGate;
        }
        const handle = createMockProcessHandle(serviceSpec, nextPid++);
        handles.set(serviceSpec.name, handle);
        return handle;
      });

      const outcome = supervisor
        .runWithServices(specs, async () => 'done')
        .catch((error: unknown) => error);
      await waitForAsync();
      expect(mockLauncher.launch).toHaveBeenCalledTimes(2);

      const destroyed = supervisor.onModuleDestroy();
      releaseCoordinator();
      await destroyed;

      expect(handles.get('api')?.terminate).toHaveBeenCalledTimes(1);
      expect(handles.get('coordinator')?.terminate).toHaveBeenCalledTimes(1);
      expect(handles.get('coordinator')?.isRunning()).toBe(false);
      expect(mockLauncher.launch).toHaveBeenCalledTimes(2);
      expect(handles.has('worker')).toBe(false);

      const error = await outcome;
      expect(error).toBeInstanceOf(LaunchError);
      expect(error).toHaveProperty(
        'message',
        'Failed to launch service coordinator: supervisor shut down while it was starting',
      );
    });

    it('should refuse to launch once teardown has begun', async () => {
      await supervisor.terminateAll();

      await expect(supervisor.start(spec('api'))).rejects.toThrow(
        'Failed to launch service api: supervisor is shutting down',
      );
      expect(mockLauncher.launch).not.toHaveBeenCalled();
    });
  });

  describe('unexpectedExits', () => {
    it('should list services that exited before teardown asked them to', async () => {
      await supervisor.start(spec('api'));
      await supervisor.start(spec('worker'));

      handles.get('worker')?.exit({ code: 1, signal: null });
      await waitForAsync();

      expect(supervisor.unexpectedExits()).toEqual([
        { name: 'worker', pid: 101, code: 1, signal: null },
      ]);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { service: 'worker', pid: 101, code: 1, signal: null },
        'Service exited unexpectedly',
      );
    });

    it('should not count services stopped by teardown', async () => {
      await supervisor.runWithServices(specs, async () => undefined);
      await waitForAsync();

      expect(supervisor.unexpectedExits()).toEqual([]);
      expect(supervisor.getProcesses().every((process) => process.state === 'exited')).toBe(true);
    });
  });
});
