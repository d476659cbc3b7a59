import { ResultLocationVO } from '../../../domain/value-objects/result-location.vo';

/**
 * Resolve Result Command
 */
export interface ResolveResultCommand {
  taskId: string;
  requestTimeoutMs: number;
}

/**
 * Resolve Result Port (Driving Port / Use Case Interface)
 * Fetches the download location of a completed task, without retrying
 */
export interface ResolveResultPort {
  execute(command: ResolveResultCommand): Promise<ResultLocationVO>;
}
