import * as path from 'path';
import { HarnessConfig } from '../config/configuration';
import { ServiceSpec } from '../domain/value-objects/service-spec.vo';

export const API_SERVICE_NAME = 'translation-api';
export const COORDINATOR_SERVICE_NAME = 'coordinator-worker';
export const FILE_WORKER_SERVICE_PREFIX = 'file-translation-worker';

/**
 * Declares the pipeline's services: the HTTP API, the coordinator that splits a
 * task into files, and one or more file-translation workers. Each service logs
 * both streams to `<logDir>/<name>.log`.
 */
export function buildServiceSpecs(config: Pick<HarnessConfig, 'api' | 'services'>): ServiceSpec[] {
  const { executable, workdir, logDir, fileWorkerCount } = config.services;
  const env = { PYTHONUNBUFFERED: '1' };

  const declare = (name: string, args: string[]): ServiceSpec => {
    const logFile = path.join(logDir, `${name}.log`);
    return ServiceSpec.create({
      name,
      executable,
      args,
      cwd: workdir,
      env,
      output: { stdout: logFile, stderr: logFile },
    });
  };

  const specs = [
    declare(API_SERVICE_NAME, [
      '-m',
      'uvicorn',
      'api.main:app',
      '--host',
      config.api.host,
      '--port',
      String(config.api.port),
    ]),
    declare(COORDINATOR_SERVICE_NAME, ['-m', 'workers.coordinator_worker']),
  ];

  for (let index = 1; index <= fileWorkerCount; index++) {
    specs.push(
      declare(`${FILE_WORKER_SERVICE_PREFIX}-${index}`, ['-m', 'workers.file_translation_worker']),
    );
  }

  return specs;
}
