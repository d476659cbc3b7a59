import { TaskHandle } from '../../../domain/entities/task-handle.entity';
import { TaskStatusSnapshot } from '../../../domain/entities/task-status-snapshot.entity';
import { ResultLocationVO } from '../../../domain/value-objects/result-location.vo';
import { ServiceSpec } from '../../../domain/value-objects/service-spec.vo';
import { WaitUntilHealthyCommand } from './wait-until-healthy.port';
import { PollTaskStatusCommand } from './poll-task-status.port';

/**
 * Run Integration Command
 * Everything one end-to-end run needs, resolved from configuration up front
 */
export interface RunIntegrationCommand {
  runId: string;
  services: readonly ServiceSpec[];
  health: WaitUntilHealthyCommand;
  job: {
    filePath: string;
    targetLanguage: string;
    translateStyle: string;
    requestTimeoutMs: number;
  };
  polling: Omit<PollTaskStatusCommand, 'taskId'>;
  result: {
    requestTimeoutMs: number;
  };
}

/**
 * Run Integration Result
 */
export interface RunIntegrationResult {
  taskHandle: TaskHandle;
  finalSnapshot: TaskStatusSnapshot;
  /** Present only when the task completed */
  resultLocation?: ResultLocationVO;
  passed: boolean;
  /** 0 when the task completed, 2 when the pipeline reported it failed */
  exitCode: IntegrationExitCode;
}

export type IntegrationExitCode = 0 | 2;

/**
 * Run Integration Port (Driving Port / Use Case Interface)
 * Starts the services, drives one task through the pipeline, tears everything down
 */
export interface RunIntegrationPort {
  execute(command: RunIntegrationCommand): Promise<RunIntegrationResult>;
}
