/**
 * Injection tokens for the driven ports (string tokens for DI)
 */
export const TRANSLATION_API_PORT = 'TranslationApiPort';
export const PROCESS_LAUNCHER_PORT = 'ProcessLauncherPort';
export const REPORTER_PORT = 'ReporterPort';
