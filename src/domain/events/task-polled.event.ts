import { DomainEvent } from './base.event';
import { TaskStatusSnapshot } from '../entities/task-status-snapshot.entity';

export interface TaskPolledEventPayload {
  taskId: string;
  /** 1-based poll iteration */
  iteration: number;
  /** Absent when the service did not know the task yet */
  snapshot?: TaskStatusSnapshot;
}

/**
 * Task Polled Event
 * Emitted for every status observation made by the poller
 */
export class TaskPolledEvent extends DomainEvent {
  constructor(public readonly payload: TaskPolledEventPayload) {
    super();
  }

  get eventName(): string {
    return 'task.polled';
  }

  get iteration(): number {
    return this.payload.iteration;
  }

  get snapshot(): TaskStatusSnapshot | undefined {
    return this.payload.snapshot;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      taskId: this.payload.taskId,
      iteration: this.payload.iteration,
      snapshot: this.payload.snapshot?.toJSON(),
    };
  }
}
