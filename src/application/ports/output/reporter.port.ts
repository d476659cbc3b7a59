import { DomainEvent } from '../../../domain/events/base.event';

/**
 * Reporter Port (Driven Port)
 * Publishes the run's observable facts. Never read back for control decisions.
 */
export interface ReporterPort {
  publish(event: DomainEvent): Promise<void>;
}
