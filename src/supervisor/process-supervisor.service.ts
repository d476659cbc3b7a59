import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HarnessConfig } from '../config/configuration';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import { ServiceSpec } from '../domain/value-objects/service-spec.vo';
import { LaunchError } from '../domain/errors/harness.errors';
import { describeError } from '../shared/utils/error.utils';
import { PROCESS_LAUNCHER_PORT } from '../application/ports/output/injection-tokens';
import {
  ProcessExit,
  ProcessHandle,
  ProcessLauncherPort,
  TerminateOptions,
} from '../application/ports/output/process-launcher.port';
import {
  ManagedProcess,
  ProcessLifecycleState,
  UnexpectedExit,
} from './interfaces/managed-process.interface';

class SupervisedProcess implements ManagedProcess {
  state: ProcessLifecycleState = 'running';
  exit?: ProcessExit;
  terminationRequested = false;
  termination?: Promise<void>;
  readonly startedAt = new Date();

  constructor(readonly handle: ProcessHandle) {}

  get name(): string {
    return this.handle.spec.name;
  }

  get spec(): ServiceSpec {
    return this.handle.spec;
  }

  get pid(): number {
    return this.handle.pid;
  }
}

/**
 * Process Supervisor Service
 *
 * Owns every service process the harness starts and guarantees each one is
 * terminated exactly once, whatever path the run leaves by.
 *
 * ## Guarantees:
 *
 * - `runWithServices` is a scoped acquisition: services started inside it are torn
 *   down in its `finally`, including when a later launch fails part-way through.
 * - `ensureTerminated` is idempotent. The first call signals the process; every
 *   later call (from the scope, from `onModuleDestroy` on SIGINT/SIGTERM, or twice
 *   by mistake) is a no-op.
 * - Once teardown of the whole supervisor has begun, no new service starts. A
 *   launch already in flight is waited for, then stopped along with the rest.
 * - Teardown never throws. A failure to stop a process is logged and dropped so it
 *   cannot replace the error that ended the run.
 *
 * Shutdown order is reverse start order.
 */
@Injectable()
export class ProcessSupervisorService implements OnModuleDestroy {
  private readonly processes: SupervisedProcess[] = [];
  private readonly pendingLaunches = new Set<Promise<SupervisedProcess>>();
  private shuttingDown = false;
  private readonly terminateOptions: TerminateOptions;

  constructor(
    @Inject(PROCESS_LAUNCHER_PORT) private readonly launcher: ProcessLauncherPort,
    private readonly configService: ConfigService<HarnessConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const shutdown = this.configService.get('shutdown', { infer: true });
    this.terminateOptions = {
      graceMs: shutdown.graceMs,
      killTimeoutMs: shutdown.killTimeoutMs,
    };

    this.logger.setContext(ProcessSupervisorService.name);
  }

  async start(spec: ServiceSpec): Promise<ManagedProcess> {
    const existing = this.processes.find(
      (process) => process.name === spec.name && process.state === 'running',
    );
    if (existing) {
      throw new LaunchError(spec.name, `already running with pid ${existing.pid}`);
    }

    if (this.shuttingDown) {
      throw new LaunchError(spec.name, 'supervisor is shutting down');
    }

    this.logger.info(
      { service: spec.name, command: ServiceSpec.describe(spec), cwd: spec.cwd },
      'Starting service',
    );

    const launching = this.launcher.launch(spec).then((handle) => this.register(handle));
    this.pendingLaunches.add(launching);
    let managed: SupervisedProcess;
    try {
      managed = await launching;
    } finally {
      this.pendingLaunches.delete(launching);
    }

    if (this.shuttingDown) {
      this.logger.warn(
        { service: spec.name, pid: managed.pid },
        'Service came up during shutdown, stopping it',
      );
      await this.ensureTerminated(managed);
      throw new LaunchError(spec.name, 'supervisor shut down while it was starting');
    }

    this.logger.info(
      { service: spec.name, pid: managed.pid, stdout: spec.output.stdout },
      'Service started',
    );

    return managed;
  }

  /**
   * Stop a process started by this supervisor. Safe to call any number of times,
   * on running or already-exited processes; never throws.
   */
  async ensureTerminated(process: ManagedProcess): Promise<void> {
    const supervised = this.processes.find((candidate) => candidate === process);
    if (!supervised) {
      this.logger.warn({ service: process.name }, 'Process is not owned by this supervisor');
      return;
    }

    if (!supervised.termination) {
      supervised.terminationRequested = true;
      supervised.termination = this.stop(supervised);
    }
    return supervised.termination;
  }

  /**
   * Terminate every process this supervisor started, newest first. Refuses new
   * launches from here on and waits for any launch still in flight.
   */
  async terminateAll(): Promise<void> {
    this.shuttingDown = true;
    await Promise.allSettled([...this.pendingLaunches]);

    for (const process of [...this.processes].reverse()) {
      await this.ensureTerminated(process);
    }
  }

  /**
   * Start every spec in order, run work, then tear down all services started
   * here, on success and on every failure path. The error from a launch or from
   * work is the one that propagates.
   */
  async runWithServices<T>(specs: readonly ServiceSpec[], work: () => Promise<T>): Promise<T> {
    const started: ManagedProcess[] = [];

    try {
      for (const spec of specs) {
        started.push(await this.start(spec));
      }
      return await work();
    } finally {
      this.logger.info({ services: started.length }, 'Tearing down services');
      for (const process of [...started].reverse()) {
        await this.ensureTerminated(process);
      }
    }
  }

  /**
   * Services that exited on their own, before teardown asked them to.
   */
  unexpectedExits(): UnexpectedExit[] {
    return this.processes
      .filter((process) => process.state === 'exited' && !process.terminationRequested)
      .map((process) => ({
        name: process.name,
        pid: process.pid,
        code: process.exit?.code ?? null,
        signal: process.exit?.signal ?? null,
      }));
  }

  getProcesses(): readonly ManagedProcess[] {
    return [...this.processes];
  }

  async onModuleDestroy(): Promise<void> {
    await this.terminateAll();
  }

  private register(handle: ProcessHandle): SupervisedProcess {
    const managed = new SupervisedProcess(handle);
    this.processes.push(managed);

    void handle.exited.then(
      (exit) => this.recordExit(managed, exit),
      (error: unknown) =>
        this.logger.warn(
          { service: managed.name, error: describeError(error) },
          'Lost track of service exit',
        ),
    );

    return managed;
  }

  private async stop(supervised: SupervisedProcess): Promise<void> {
    try {
      const wasRunning = supervised.handle.isRunning();
      await supervised.handle.terminate(this.terminateOptions);
      this.logger.info(
        { service: supervised.name, pid: supervised.pid, wasRunning },
        'Service terminated',
      );
    } catch (error) {
      this.logger.warn(
        { service: supervised.name, pid: supervised.pid, error: describeError(error) },
        'Failed to terminate service cleanly, continuing teardown',
      );
    }
  }

  private recordExit(process: SupervisedProcess, exit: ProcessExit): void {
    process.state = 'exited';
    process.exit = exit;

    if (!process.terminationRequested) {
      this.logger.warn(
        { service: process.name, pid: process.pid, code: exit.code, signal: exit.signal },
        'Service exited unexpectedly',
      );
    }
  }
}

