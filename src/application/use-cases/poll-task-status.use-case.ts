import { Inject, Injectable } from '@nestjs/common';
import { PollTaskStatusCommand, PollTaskStatusPort } from '../ports/input';
import {
  REPORTER_PORT,
  ReporterPort,
  TRANSLATION_API_PORT,
  TranslationApiPort,
} from '../ports/output';
import { TaskStatusSnapshot } from '../../domain/entities/task-status-snapshot.entity';
import { TaskPolledEvent } from '../../domain/events/task-polled.event';
import { PollTimeoutError } from '../../domain/errors/harness.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { delay } from '../../shared/utils/delay';
import { describeError } from '../../shared/utils/error.utils';

/**
 * Poll Task Status Use Case
 * Handles watching one task until the service reports completed or failed
 *
 * Each iteration sleeps first, then makes one bounded request. A task the service
 * does not know yet (404) and a failed request both use up the iteration without
 * ending the loop; the first terminal snapshot is returned immediately.
 */
@Injectable()
export class PollTaskStatusUseCase implements PollTaskStatusPort {
  constructor(
    @Inject(TRANSLATION_API_PORT) private readonly translationApi: TranslationApiPort,
    @Inject(REPORTER_PORT) private readonly reporter: ReporterPort,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(PollTaskStatusUseCase.name);
  }

  async execute(command: PollTaskStatusCommand): Promise<TaskStatusSnapshot> {
    const { taskId, maxIterations, intervalMs, requestTimeoutMs } = command;
    const logger = this.logger.withTaskId(taskId);
    let lastSnapshot: TaskStatusSnapshot | undefined;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      await delay(intervalMs);

      let snapshot: TaskStatusSnapshot | null;
      try {
        snapshot = await this.translationApi.getTaskStatus(taskId, requestTimeoutMs);
      } catch (error) {
        logger.warn(
          { iteration, maxIterations, error: describeError(error) },
          'Status request failed, will retry',
        );
        continue;
      }

      if (!snapshot) {
        logger.debug({ iteration }, 'Task not found yet');
        await this.reporter.publish(new TaskPolledEvent({ taskId, iteration }));
        continue;
      }

      lastSnapshot = snapshot;
      await this.reporter.publish(new TaskPolledEvent({ taskId, iteration, snapshot }));

      if (snapshot.isTerminal()) {
        logger.info(
          { iteration, status: snapshot.status.toString(), progress: snapshot.progress },
          'Task reached terminal status',
        );
        return snapshot;
      }
    }

    logger.error(
      { maxIterations, lastStatus: lastSnapshot?.status.toString() },
      'Max polling iterations exceeded',
    );
    throw new PollTimeoutError(taskId, maxIterations, lastSnapshot?.status.toString());
  }
}
