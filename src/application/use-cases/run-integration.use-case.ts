import { Inject, Injectable } from '@nestjs/common';
import { stat } from 'fs/promises';
import {
  IntegrationExitCode,
  RunIntegrationCommand,
  RunIntegrationPort,
  RunIntegrationResult,
} from '../ports/input';
import { REPORTER_PORT, ReporterPort } from '../ports/output';
import { WaitUntilHealthyUseCase } from './wait-until-healthy.use-case';
import { SubmitTaskUseCase } from './submit-task.use-case';
import { PollTaskStatusUseCase } from './poll-task-status.use-case';
import { ResolveResultUseCase } from './resolve-result.use-case';
import { ProcessSupervisorService } from '../../supervisor/process-supervisor.service';
import { TaskHandle } from '../../domain/entities/task-handle.entity';
import { TaskStatusSnapshot } from '../../domain/entities/task-status-snapshot.entity';
import { ResultLocationVO } from '../../domain/value-objects/result-location.vo';
import { TaskFinishedEvent } from '../../domain/events/task-finished.event';
import { RunFinishedEvent } from '../../domain/events/run-finished.event';
import {
  HarnessError,
  HealthTimeoutError,
  InputFileNotFoundError,
} from '../../domain/errors/harness.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { describeError } from '../../shared/utils/error.utils';

/**
 * Run Integration Use Case
 * Drives one translation task through the whole pipeline
 *
 * Flow:
 * 1. Check the input file before anything is started
 * 2. Start every service, wait for the API health check
 * 3. Submit the file, poll the task to a terminal status
 * 4. Resolve the download location if the task completed
 * 5. Tear every service down, whichever step ended the run
 */
@Injectable()
export class RunIntegrationUseCase implements RunIntegrationPort {
  constructor(
    private readonly supervisor: ProcessSupervisorService,
    private readonly waitUntilHealthy: WaitUntilHealthyUseCase,
    private readonly submitTask: SubmitTaskUseCase,
    private readonly pollTaskStatus: PollTaskStatusUseCase,
    private readonly resolveResult: ResolveResultUseCase,
    @Inject(REPORTER_PORT) private readonly reporter: ReporterPort,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(RunIntegrationUseCase.name);
  }

  async execute(command: RunIntegrationCommand): Promise<RunIntegrationResult> {
    const logger = this.logger.withRunId(command.runId);
    let taskHandle: TaskHandle | undefined;

    try {
      await this.assertInputFile(command.job.filePath);

      logger.info(
        { services: command.services.map((spec) => spec.name), file: command.job.filePath },
        'Starting integration run',
      );

      const result = await this.supervisor.runWithServices(command.services, async () => {
        await this.awaitHealthy(command);

        const handle = await this.submitTask.execute(command.job);
        taskHandle = handle;

        const finalSnapshot = await this.pollTaskStatus.execute({
          ...command.polling,
          taskId: handle.taskId,
        });
        await this.reporter.publish(new TaskFinishedEvent(finalSnapshot));

        let resultLocation: ResultLocationVO | undefined;
        if (finalSnapshot.isCompleted()) {
          resultLocation = await this.resolveResult.execute({
            taskId: handle.taskId,
            requestTimeoutMs: command.result.requestTimeoutMs,
          });
        }

        return this.buildResult(handle, finalSnapshot, resultLocation);
      });

      logger.info(
        {
          taskId: result.taskHandle.taskId,
          finalStatus: result.finalSnapshot.status.toString(),
          passed: result.passed,
        },
        'Integration run finished',
      );
      await this.reporter.publish(
        new RunFinishedEvent({
          runId: command.runId,
          passed: result.passed,
          taskId: result.taskHandle.taskId,
          finalStatus: result.finalSnapshot.status.toString(),
          errorMessage: result.finalSnapshot.errorMessage,
        }),
      );

      return result;
    } catch (error) {
      logger.error(
        {
          error: describeError(error),
          code: error instanceof HarnessError ? error.code : undefined,
          taskId: taskHandle?.taskId,
        },
        'Integration run aborted',
      );
      await this.reporter.publish(
        new RunFinishedEvent({
          runId: command.runId,
          passed: false,
          taskId: taskHandle?.taskId,
          errorCode: error instanceof HarnessError ? error.code : undefined,
          errorMessage: describeError(error),
        }),
      );
      throw error;
    }
  }

  private async assertInputFile(filePath: string): Promise<void> {
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) {
        throw new InputFileNotFoundError(filePath);
      }
    } catch (error) {
      if (error instanceof InputFileNotFoundError) {
        throw error;
      }
      throw new InputFileNotFoundError(filePath, error);
    }
  }

  private async awaitHealthy(command: RunIntegrationCommand): Promise<void> {
    try {
      await this.waitUntilHealthy.execute(command.health);
    } catch (error) {
      if (error instanceof HealthTimeoutError) {
        const exited = this.supervisor.unexpectedExits().map((exit) => exit.name);
        throw exited.length > 0 ? error.withExitedServices(exited) : error;
      }
      throw error;
    }
  }

  private buildResult(
    taskHandle: TaskHandle,
    finalSnapshot: TaskStatusSnapshot,
    resultLocation: ResultLocationVO | undefined,
  ): RunIntegrationResult {
    const passed = finalSnapshot.isCompleted();
    const exitCode: IntegrationExitCode = passed ? 0 : 2;
    return { taskHandle, finalSnapshot, resultLocation, passed, exitCode };
  }
}
