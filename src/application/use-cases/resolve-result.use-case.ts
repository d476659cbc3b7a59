import { Inject, Injectable } from '@nestjs/common';
import { ResolveResultCommand, ResolveResultPort } from '../ports/input';
import {
  REPORTER_PORT,
  ReporterPort,
  TRANSLATION_API_PORT,
  TranslationApiPort,
} from '../ports/output';
import { ResultLocationVO } from '../../domain/value-objects/result-location.vo';
import { ResultResolvedEvent } from '../../domain/events/result-resolved.event';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Resolve Result Use Case
 * One request for the download location of a completed task. No retries: a
 * failure here fails the run.
 */
@Injectable()
export class ResolveResultUseCase implements ResolveResultPort {
  constructor(
    @Inject(TRANSLATION_API_PORT) private readonly translationApi: TranslationApiPort,
    @Inject(REPORTER_PORT) private readonly reporter: ReporterPort,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(ResolveResultUseCase.name);
  }

  async execute(command: ResolveResultCommand): Promise<ResultLocationVO> {
    const location = await this.translationApi.getResultLocation(
      command.taskId,
      command.requestTimeoutMs,
    );

    this.logger.info(
      { taskId: command.taskId, expiresIn: location.expiresIn },
      'Result location resolved',
    );
    await this.reporter.publish(new ResultResolvedEvent(command.taskId, location));

    return location;
  }
}
