import { DomainEvent } from './base.event';
import { ResultLocationVO } from '../value-objects/result-location.vo';

/**
 * Result Resolved Event
 * Emitted when the download location of a completed task is known
 */
export class ResultResolvedEvent extends DomainEvent {
  constructor(
    public readonly taskId: string,
    public readonly location: ResultLocationVO,
  ) {
    super();
  }

  get eventName(): string {
    return 'result.resolved';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      taskId: this.taskId,
      location: this.location.toJSON(),
    };
  }
}
