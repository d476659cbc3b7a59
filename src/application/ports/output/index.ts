/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export type {
  TranslationApiPort,
  HealthProbe,
  SubmitTaskRequest,
} from './translation-api.port';
export type {
  ProcessLauncherPort,
  ProcessHandle,
  ProcessExit,
  TerminateOptions,
} from './process-launcher.port';
export type { ReporterPort } from './reporter.port';
export { TRANSLATION_API_PORT, PROCESS_LAUNCHER_PORT, REPORTER_PORT } from './injection-tokens';
