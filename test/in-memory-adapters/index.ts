// Export all in-memory adapters for easy import
export { InMemoryTranslationApiAdapter } from './in-memory-translation-api.adapter';
export type { ScriptedHealth, ScriptedStatus, SimulatedStatus } from './in-memory-translation-api.adapter';
export {
  InMemoryProcessLauncherAdapter,
  InMemoryProcessHandle,
} from './in-memory-process-launcher.adapter';
export { InMemoryReporterAdapter } from './in-memory-reporter.adapter';
