/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export { TaskSubmittedEvent } from './task-submitted.event';
export { TaskPolledEvent, type TaskPolledEventPayload } from './task-polled.event';
export { TaskFinishedEvent } from './task-finished.event';
export { ResultResolvedEvent } from './result-resolved.event';
export { RunFinishedEvent, type RunFinishedEventPayload } from './run-finished.event';
