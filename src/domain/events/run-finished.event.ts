import { DomainEvent } from './base.event';

export interface RunFinishedEventPayload {
  runId: string;
  passed: boolean;
  taskId?: string;
  finalStatus?: string;
  errorCode?: string;
  errorMessage?: string;
}

/**
 * Run Finished Event
 * Last event of every run, whether it passed, failed, or aborted on an error
 */
export class RunFinishedEvent extends DomainEvent {
  constructor(public readonly payload: RunFinishedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'run.finished';
  }

  get passed(): boolean {
    return this.payload.passed;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
