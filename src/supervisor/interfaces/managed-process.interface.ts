import { ServiceSpec } from '../../domain/value-objects/service-spec.vo';
import { ProcessExit } from '../../application/ports/output/process-launcher.port';

export type ProcessLifecycleState = 'running' | 'exited';

/**
 * Read-only view of a service process started by the supervisor.
 *
 * Only ProcessSupervisorService creates these and changes their state; callers get
 * them back from `start` solely to hand them to `ensureTerminated`.
 */
export interface ManagedProcess {
  readonly name: string;
  readonly spec: ServiceSpec;
  readonly pid: number;
  readonly startedAt: Date;
  readonly state: ProcessLifecycleState;
  /** Set once the process has exited */
  readonly exit?: ProcessExit;
}

/**
 * A service that exited without the supervisor asking it to
 */
export interface UnexpectedExit {
  name: string;
  pid: number;
  code: number | null;
  signal: string | null;
}
