import { freeze } from 'immer';

/**
 * Where a service's output streams are written. Both may name the same file.
 */
export interface OutputSinks {
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Declaration of one service process the harness launches.
 */
export interface ServiceSpec {
  readonly name: string;
  readonly executable: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string>>;
  readonly output: OutputSinks;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ServiceSpec {
  export interface CreateProps {
    name: string;
    executable: string;
    args?: string[];
    cwd?: string;
    env?: Record<string, string>;
    output: OutputSinks;
  }

  /**
   * Validate and deep-freeze a service declaration.
   */
  export function create(props: CreateProps): ServiceSpec {
    if (!props.name || props.name.trim().length === 0) {
      throw new Error('Service name is required');
    }
    if (!props.executable || props.executable.trim().length === 0) {
      throw new Error(`Executable is required for service ${props.name}`);
    }
    if (!props.output.stdout || !props.output.stderr) {
      throw new Error(`Output sinks are required for service ${props.name}`);
    }

    const spec: ServiceSpec = {
      name: props.name,
      executable: props.executable,
      args: [...(props.args ?? [])],
      cwd: props.cwd,
      env: props.env ? { ...props.env } : undefined,
      output: { stdout: props.output.stdout, stderr: props.output.stderr },
    };

    return freeze(spec, true);
  }

  export function describe(spec: ServiceSpec): string {
    return [spec.executable, ...spec.args].join(' ');
  }
}
