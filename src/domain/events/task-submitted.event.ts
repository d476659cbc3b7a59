import { DomainEvent } from './base.event';
import { TaskHandle } from '../entities/task-handle.entity';

/**
 * Task Submitted Event
 * Emitted once the service has acknowledged the upload with a task id
 */
export class TaskSubmittedEvent extends DomainEvent {
  constructor(public readonly handle: TaskHandle) {
    super();
  }

  get eventName(): string {
    return 'task.submitted';
  }

  get taskId(): string {
    return this.handle.taskId;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      taskId: this.handle.taskId,
      initialStatus: this.handle.initialStatus,
    };
  }
}
