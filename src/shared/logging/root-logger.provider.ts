import { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { DestinationStream, Logger, LoggerOptions } from 'pino';
import { HarnessConfig } from '../../config/configuration';

export const ROOT_LOGGER = 'ROOT_LOGGER';

/**
 * Build the process-wide pino instance. Output goes to stderr: stdout is reserved
 * for the report lines scraped by downstream tooling.
 */
export function createRootLogger(
  config: Pick<HarnessConfig, 'logLevel' | 'nodeEnv'>,
  destination?: DestinationStream,
): Logger {
  const options: LoggerOptions = {
    level: config.logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: 'translation-harness',
      env: config.nodeEnv,
    },
  };

  if (config.nodeEnv === 'development' && !destination) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, destination ?? pino.destination(2));
}

export const rootLoggerProvider: FactoryProvider<Logger> = {
  provide: ROOT_LOGGER,
  useFactory: (configService: ConfigService<HarnessConfig>) =>
    createRootLogger({
      logLevel: configService.get('logLevel', { infer: true }) || 'info',
      nodeEnv: configService.get('nodeEnv', { infer: true }) ?? 'production',
    }),
  inject: [ConfigService],
};
