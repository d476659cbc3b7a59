import { v4 as uuidv4 } from 'uuid';

/**
 * Base Domain Event
 * Every observable fact of a harness run is published as one of these.
 */
export abstract class DomainEvent {
  public readonly occurredAt: Date;
  public readonly eventId: string;

  protected constructor() {
    this.occurredAt = new Date();
    this.eventId = uuidv4();
  }

  abstract get eventName(): string;

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventName: this.eventName,
      occurredAt: this.occurredAt.toISOString(),
    };
  }
}
