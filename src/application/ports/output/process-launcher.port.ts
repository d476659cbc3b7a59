import { ServiceSpec } from '../../../domain/value-objects/service-spec.vo';

/**
 * How a process ended. Exactly one of code and signal is set.
 */
export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface TerminateOptions {
  /** How long to wait after the polite stop signal before forcing */
  graceMs: number;
  /** How long to wait for the process to go away after forcing */
  killTimeoutMs: number;
}

/**
 * Capability over one running OS process.
 */
export interface ProcessHandle {
  readonly spec: ServiceSpec;
  readonly pid: number;
  /** Settles once the process has exited, however that happened */
  readonly exited: Promise<ProcessExit>;
  isRunning(): boolean;
  /**
   * Stop the process (polite signal, then forced) and release its output sinks.
   * Resolves once the process is gone or the kill timeout has passed.
   */
  terminate(options: TerminateOptions): Promise<void>;
}

/**
 * Process Launcher Port (Driven Port)
 * Starts service processes on the host
 */
export interface ProcessLauncherPort {
  /**
   * Start the process declared by spec. Resolves once the OS has spawned it.
   * @throws LaunchError when the executable cannot be started
   */
  launch(spec: ServiceSpec): Promise<ProcessHandle>;
}
