import { TaskStatusSnapshot } from '../../../domain/entities/task-status-snapshot.entity';

/**
 * Poll Task Status Command
 */
export interface PollTaskStatusCommand {
  taskId: string;
  maxIterations: number;
  /** Sleep before every request, including the first */
  intervalMs: number;
  requestTimeoutMs: number;
}

/**
 * Poll Task Status Port (Driving Port / Use Case Interface)
 * Polls a task until it reaches a terminal status
 */
export interface PollTaskStatusPort {
  /**
   * Resolves with the first terminal snapshot.
   * @throws PollTimeoutError when maxIterations polls saw no terminal status
   */
  execute(command: PollTaskStatusCommand): Promise<TaskStatusSnapshot>;
}
