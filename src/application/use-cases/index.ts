export { WaitUntilHealthyUseCase } from './wait-until-healthy.use-case';
export { SubmitTaskUseCase } from './submit-task.use-case';
export { PollTaskStatusUseCase } from './poll-task-status.use-case';
export { ResolveResultUseCase } from './resolve-result.use-case';
export { RunIntegrationUseCase } from './run-integration.use-case';
