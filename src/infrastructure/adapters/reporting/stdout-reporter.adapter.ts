import { Inject, Injectable } from '@nestjs/common';
import { Writable } from 'stream';
import { ReporterPort } from '../../../application/ports/output/reporter.port';
import { DomainEvent } from '../../../domain/events/base.event';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { formatReportLines } from './report-line.formatter';

export const REPORT_OUTPUT = 'ReportOutput';

/**
 * Stdout Reporter Adapter
 * Implements ReporterPort by writing report lines to the report output (stdout
 * in production). Events are also logged at debug level with their JSON payload.
 */
@Injectable()
export class StdoutReporterAdapter implements ReporterPort {
  constructor(
    @Inject(REPORT_OUTPUT) private readonly output: Writable,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(StdoutReporterAdapter.name);
  }

  async publish(event: DomainEvent): Promise<void> {
    this.logger.debug({ event: event.toJSON() }, `[EVENT] ${event.eventName}`);

    for (const line of formatReportLines(event)) {
      this.output.write(`${line}\n`);
    }
  }
}
