import { Inject, Injectable } from '@nestjs/common';
import { SubmitTaskCommand, SubmitTaskPort } from '../ports/input';
import {
  REPORTER_PORT,
  ReporterPort,
  TRANSLATION_API_PORT,
  TranslationApiPort,
} from '../ports/output';
import { TaskHandle } from '../../domain/entities/task-handle.entity';
import { TaskSubmittedEvent } from '../../domain/events/task-submitted.event';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Submit Task Use Case
 * Uploads the input file once and reports the acknowledged task
 */
@Injectable()
export class SubmitTaskUseCase implements SubmitTaskPort {
  constructor(
    @Inject(TRANSLATION_API_PORT) private readonly translationApi: TranslationApiPort,
    @Inject(REPORTER_PORT) private readonly reporter: ReporterPort,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(SubmitTaskUseCase.name);
  }

  async execute(command: SubmitTaskCommand): Promise<TaskHandle> {
    this.logger.info(
      {
        file: command.filePath,
        targetLanguage: command.targetLanguage,
        translateStyle: command.translateStyle,
      },
      'Submitting translation task',
    );

    const handle = await this.translationApi.submitTask(
      {
        filePath: command.filePath,
        targetLanguage: command.targetLanguage,
        translateStyle: command.translateStyle,
      },
      command.requestTimeoutMs,
    );

    this.logger.info(
      { taskId: handle.taskId, initialStatus: handle.initialStatus },
      'Task accepted',
    );
    await this.reporter.publish(new TaskSubmittedEvent(handle));

    return handle;
  }
}
