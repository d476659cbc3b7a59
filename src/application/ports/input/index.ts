/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 * These are the interfaces that define the application's use cases
 */
export type {
  WaitUntilHealthyPort,
  WaitUntilHealthyCommand,
  WaitUntilHealthyResult,
} from './wait-until-healthy.port';
export type { SubmitTaskPort, SubmitTaskCommand } from './submit-task.port';
export type { PollTaskStatusPort, PollTaskStatusCommand } from './poll-task-status.port';
export type { ResolveResultPort, ResolveResultCommand } from './resolve-result.port';
export type {
  RunIntegrationPort,
  RunIntegrationCommand,
  RunIntegrationResult,
  IntegrationExitCode,
} from './run-integration.port';
