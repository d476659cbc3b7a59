import { DomainEvent } from './base.event';
import { TaskStatusSnapshot } from '../entities/task-status-snapshot.entity';

/**
 * Task Finished Event
 * Emitted when polling has observed a terminal status
 */
export class TaskFinishedEvent extends DomainEvent {
  constructor(public readonly snapshot: TaskStatusSnapshot) {
    super();
  }

  get eventName(): string {
    return 'task.finished';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      snapshot: this.snapshot.toJSON(),
    };
  }
}
