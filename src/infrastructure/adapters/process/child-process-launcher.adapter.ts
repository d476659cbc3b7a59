import { Injectable } from '@nestjs/common';
import { spawn, type ChildProcess } from 'child_process';
import { once } from 'events';
import { createWriteStream, type WriteStream } from 'fs';
import { mkdir } from 'fs/promises';
import * as path from 'path';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { ServiceSpec, OutputSinks } from '../../../domain/value-objects/service-spec.vo';
import { LaunchError } from '../../../domain/errors/harness.errors';
import { describeError } from '../../../shared/utils/error.utils';
import {
  ProcessExit,
  ProcessHandle,
  ProcessLauncherPort,
  TerminateOptions,
} from '../../../application/ports/output/process-launcher.port';

/**
 * Open log files for one service. When stdout and stderr name the same file the
 * two streams share a single sink. Write failures after opening go to `onError`.
 */
export class OutputSinkSet {
  private closing?: Promise<void>;

  private constructor(
    readonly stdout: WriteStream,
    readonly stderr: WriteStream,
  ) {}

  static async open(
    output: OutputSinks,
    onError: (error: Error) => void,
  ): Promise<OutputSinkSet> {
    const stdout = await openSink(output.stdout, onError);
    if (path.resolve(output.stderr) === path.resolve(output.stdout)) {
      return new OutputSinkSet(stdout, stdout);
    }

    try {
      return new OutputSinkSet(stdout, await openSink(output.stderr, onError));
    } catch (error) {
      await endSink(stdout);
      throw error;
    }
  }

  close(): Promise<void> {
    if (!this.closing) {
      const sinks = this.stdout === this.stderr ? [this.stdout] : [this.stdout, this.stderr];
      this.closing = Promise.all(sinks.map((sink) => endSink(sink))).then(() => undefined);
    }
    return this.closing;
  }
}

async function openSink(
  filePath: string,
  onError: (error: Error) => void,
): Promise<WriteStream> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const stream = createWriteStream(filePath, { flags: 'w' });
  await once(stream, 'open');
  stream.on('error', onError);
  return stream;
}

function endSink(stream: WriteStream): Promise<void> {
  if (stream.writableEnded) {
    return Promise.resolve();
  }
  return new Promise((resolve) => stream.end(() => resolve()));
}

/**
 * ProcessHandle over a Node child process.
 */
export class ChildProcessHandle implements ProcessHandle {
  readonly exited: Promise<ProcessExit>;
  private termination?: Promise<void>;

  constructor(
    readonly spec: ServiceSpec,
    readonly pid: number,
    private readonly child: ChildProcess,
    exited: Promise<ProcessExit>,
    private readonly sinks: OutputSinkSet,
    private readonly logger: PinoLoggerService,
  ) {
    this.exited = exited;
  }

  isRunning(): boolean {
    return this.child.exitCode === null && this.child.signalCode === null;
  }

  /**
   * SIGTERM, wait graceMs, then SIGKILL and wait killTimeoutMs. Repeated calls share
   * the first call's outcome and never signal again.
   */
  terminate(options: TerminateOptions): Promise<void> {
    if (!this.termination) {
      this.termination = this.stop(options);
    }
    return this.termination;
  }

  private async stop(options: TerminateOptions): Promise<void> {
    try {
      if (!this.isRunning()) {
        return;
      }

      this.child.kill('SIGTERM');
      if (await this.waitForExit(options.graceMs)) {
        return;
      }

      this.logger.warn(
        { service: this.spec.name, pid: this.pid, graceMs: options.graceMs },
        'Service ignored SIGTERM, sending SIGKILL',
      );
      this.child.kill('SIGKILL');
      if (!(await this.waitForExit(options.killTimeoutMs))) {
        throw new Error(
          `Process ${this.pid} (${this.spec.name}) still running ${options.killTimeoutMs}ms after SIGKILL`,
        );
      }
    } finally {
      this.child.stdout?.unpipe();
      this.child.stderr?.unpipe();
      await this.sinks.close();
    }
  }

  private waitForExit(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    return Promise.race([this.exited.then(() => true), timeout]).finally(() =>
      clearTimeout(timer),
    );
  }
}

/**
 * Child Process Launcher Adapter
 * Implements ProcessLauncherPort with child_process.spawn
 *
 * A launch counts as successful once Node emits `spawn`; an `error` before that
 * (missing executable, bad cwd, permissions) becomes a LaunchError.
 */
@Injectable()
export class ChildProcessLauncherAdapter implements ProcessLauncherPort {
  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(ChildProcessLauncherAdapter.name);
  }

  async launch(spec: ServiceSpec): Promise<ProcessHandle> {
    let sinks: OutputSinkSet;
    try {
      sinks = await OutputSinkSet.open(spec.output, (error) =>
        this.logger.warn(
          { service: spec.name, error: describeError(error) },
          'Failed to write service log',
        ),
      );
    } catch (error) {
      throw new LaunchError(spec.name, `cannot open log output: ${describeError(error)}`, error);
    }

    let child: ChildProcess;
    let exited: Promise<ProcessExit>;
    try {
      child = spawn(spec.executable, [...spec.args], {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      const spawned = child;
      exited = new Promise<ProcessExit>((resolve) => {
        spawned.once('exit', (code, signal) => resolve({ code, signal }));
      });
      await once(child, 'spawn');
    } catch (error) {
      await sinks.close();
      throw new LaunchError(spec.name, describeError(error), error);
    }

    const pid = child.pid;
    if (pid === undefined) {
      await sinks.close();
      throw new LaunchError(spec.name, 'no process id was assigned');
    }

    child.on('error', (error) =>
      this.logger.warn(
        { service: spec.name, pid, error: describeError(error) },
        'Service process error',
      ),
    );
    child.stdout?.pipe(sinks.stdout, { end: false });
    child.stderr?.pipe(sinks.stderr, { end: false });

    this.logger.debug({ service: spec.name, pid }, 'Process spawned');

    return new ChildProcessHandle(spec, pid, child, exited, sinks, this.logger);
  }
}
