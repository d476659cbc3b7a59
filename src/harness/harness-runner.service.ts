import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { HarnessConfig } from '../config/configuration';
import { RunIntegrationCommand } from '../application/ports/input/run-integration.port';
import { RunIntegrationUseCase } from '../application/use-cases/run-integration.use-case';
import { buildServiceSpecs } from '../supervisor/service-catalog';
import { HarnessError } from '../domain/errors/harness.errors';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';

/** Exit status of a harness process that finished normally. */
export enum HarnessExitCode {
  PASSED = 0,
  ERROR = 1,
  TASK_FAILED = 2,
}

/**
 * Harness Runner
 * Driving adapter that turns configuration into one integration run and its exit code
 */
@Injectable()
export class HarnessRunnerService {
  constructor(
    private readonly runIntegration: RunIntegrationUseCase,
    private readonly configService: ConfigService<HarnessConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(HarnessRunnerService.name);
  }

  buildCommand(runId: string = uuidv4()): RunIntegrationCommand {
    const job = this.configService.get('job', { infer: true });
    const submit = this.configService.get('submit', { infer: true });

    return {
      runId,
      services: buildServiceSpecs({
        api: this.configService.get('api', { infer: true }),
        services: this.configService.get('services', { infer: true }),
      }),
      health: { ...this.configService.get('health', { infer: true }) },
      job: {
        filePath: job.inputFile,
        targetLanguage: job.targetLanguage,
        translateStyle: job.translateStyle,
        requestTimeoutMs: submit.requestTimeoutMs,
      },
      polling: { ...this.configService.get('polling', { infer: true }) },
      result: { ...this.configService.get('result', { infer: true }) },
    };
  }

  async run(): Promise<HarnessExitCode> {
    const command = this.buildCommand();
    const logger = this.logger.withRunId(command.runId);

    try {
      const outcome = await this.runIntegration.execute(command);
      return outcome.passed ? HarnessExitCode.PASSED : HarnessExitCode.TASK_FAILED;
    } catch (error) {
      if (error instanceof HarnessError) {
        logger.error({ code: error.code, error: error.message }, 'Integration run failed');
        return HarnessExitCode.ERROR;
      }
      throw error;
    }
  }
}
