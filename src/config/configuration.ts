/**
 * Harness Configuration Module
 *
 * Loads and validates environment variables and turns them into the typed
 * HarnessConfig consumed by the supervisor, the use cases and the runner.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file or system environment)
 * 2. Validated by the Zod schema in `validation.schema.ts`
 * 3. Transformed into a typed HarnessConfig object
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<HarnessConfig, true>) {}
 *
 * const health = this.configService.get('health', { infer: true });
 * ```
 *
 * @module Configuration
 */

import * as path from 'path';
import { validateEnv, EnvConfig } from './validation.schema';

/**
 * Typed harness settings, grouped by the phase of the run that reads them.
 */
export interface HarnessConfig {
  nodeEnv: string;
  logLevel: string;
  job: {
    inputFile: string;
    targetLanguage: string;
    translateStyle: string;
  };
  api: {
    host: string;
    port: number;
    baseUrl: string;
  };
  /**
   * How the pipeline's services are launched.
   *
   * ### executable (Environment: SERVICE_EXECUTABLE)
   * - Interpreter used for every service (`python3 -m <module>`)
   *
   * ### workdir (Environment: SERVICE_WORKDIR)
   * - Working directory of the spawned services, i.e. the pipeline's project root
   * - Defaults to the harness's own working directory
   *
   * ### logDir (Environment: LOG_DIR)
   * - Each service writes stdout and stderr to `<logDir>/<service>.log`
   * - Relative paths resolve against `workdir`
   *
   * ### fileWorkerCount (Environment: FILE_WORKER_COUNT)
   * - Number of file-translation worker processes; 1 gives the three-service layout
   */
  services: {
    executable: string;
    workdir: string;
    logDir: string;
    fileWorkerCount: number;
  };
  health: {
    maxAttempts: number;
    intervalMs: number;
    requestTimeoutMs: number;
    readyValue: string;
  };
  submit: {
    requestTimeoutMs: number;
  };
  polling: {
    maxIterations: number;
    intervalMs: number;
    requestTimeoutMs: number;
  };
  result: {
    requestTimeoutMs: number;
  };
  shutdown: {
    graceMs: number;
    killTimeoutMs: number;
  };
}

export function buildConfig(env: EnvConfig, cwd: string = process.cwd()): HarnessConfig {
  const workdir = path.resolve(cwd, env.SERVICE_WORKDIR ?? '.');

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    job: {
      inputFile: path.resolve(cwd, env.INPUT_FILE),
      targetLanguage: env.TARGET_LANGUAGE,
      translateStyle: env.TRANSLATE_STYLE,
    },
    api: {
      host: env.API_HOST,
      port: env.API_PORT,
      baseUrl: `http://${env.API_HOST}:${env.API_PORT}`,
    },
    services: {
      executable: env.SERVICE_EXECUTABLE,
      workdir,
      logDir: path.resolve(workdir, env.LOG_DIR),
      fileWorkerCount: env.FILE_WORKER_COUNT,
    },
    health: {
      maxAttempts: env.HEALTH_MAX_ATTEMPTS,
      intervalMs: env.HEALTH_INTERVAL_MS,
      requestTimeoutMs: env.HEALTH_REQUEST_TIMEOUT_MS,
      readyValue: env.HEALTH_READY_VALUE,
    },
    submit: {
      requestTimeoutMs: env.SUBMIT_REQUEST_TIMEOUT_MS,
    },
    polling: {
      maxIterations: env.POLL_MAX_ITERATIONS,
      intervalMs: env.POLL_INTERVAL_MS,
      requestTimeoutMs: env.POLL_REQUEST_TIMEOUT_MS,
    },
    result: {
      requestTimeoutMs: env.RESULT_REQUEST_TIMEOUT_MS,
    },
    shutdown: {
      graceMs: env.SHUTDOWN_GRACE_MS,
      killTimeoutMs: env.SHUTDOWN_KILL_TIMEOUT_MS,
    },
  };
}

export default (): HarnessConfig => buildConfig(validateEnv(process.env));
