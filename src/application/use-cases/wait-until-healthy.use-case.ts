import { Inject, Injectable } from '@nestjs/common';
import {
  WaitUntilHealthyCommand,
  WaitUntilHealthyPort,
  WaitUntilHealthyResult,
} from '../ports/input';
import { TRANSLATION_API_PORT, TranslationApiPort } from '../ports/output';
import { HealthTimeoutError } from '../../domain/errors/harness.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { delay } from '../../shared/utils/delay';
import { describeError } from '../../shared/utils/error.utils';

/**
 * Wait Until Healthy Use Case
 * Probes the API's health endpoint until it reports ready
 *
 * Nothing a single probe does is fatal: refused connections, timeouts, error
 * statuses and unexpected bodies all mean "not yet". Only running out of attempts
 * ends the run.
 */
@Injectable()
export class WaitUntilHealthyUseCase implements WaitUntilHealthyPort {
  constructor(
    @Inject(TRANSLATION_API_PORT) private readonly translationApi: TranslationApiPort,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(WaitUntilHealthyUseCase.name);
  }

  async execute(command: WaitUntilHealthyCommand): Promise<WaitUntilHealthyResult> {
    const { maxAttempts, intervalMs, requestTimeoutMs, readyValue } = command;
    let lastObservation = 'no attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const probe = await this.translationApi.probeHealth(requestTimeoutMs);
        const ok = probe.statusCode >= 200 && probe.statusCode < 300;

        if (ok && probe.status === readyValue) {
          this.logger.info({ attempt }, 'Translation API is healthy');
          return { attempts: attempt };
        }

        lastObservation = ok
          ? `status=${probe.status ?? '<missing>'}`
          : `HTTP ${probe.statusCode}`;
      } catch (error) {
        lastObservation = describeError(error);
      }

      this.logger.debug(
        { attempt, maxAttempts, observation: lastObservation },
        'Translation API not ready yet',
      );

      if (attempt < maxAttempts) {
        await delay(intervalMs);
      }
    }

    throw new HealthTimeoutError(maxAttempts, lastObservation);
  }
}
