import { Inject, Injectable, LoggerService, Scope } from '@nestjs/common';
import { Logger } from 'pino';
import { ROOT_LOGGER } from './root-logger.provider';

/**
 * Pino-backed Nest logger.
 *
 * Transient scope gives every consumer its own instance, so `setContext` in one
 * service never renames another's log lines. All instances write through the one
 * root pino logger.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(@Inject(ROOT_LOGGER) rootLogger: Logger) {
    this.logger = rootLogger;
  }

  setContext(context: string): void {
    this.context = context;
  }

  private formatMessage(
    message: string,
    context?: string,
  ): { msg: string; context?: string } {
    return {
      msg: message,
      context: context || this.context,
    };
  }

  log(message: string, context?: string): void {
    this.logger.info(this.formatMessage(message, context));
  }

  info(message: string): void;
  info(obj: Record<string, unknown>, message: string): void;
  info(objOrMessage: Record<string, unknown> | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.info(this.formatMessage(objOrMessage));
    } else {
      this.logger.info({ ...objOrMessage, context: this.context }, message || '');
    }
  }

  error(message: string): void;
  error(obj: Record<string, unknown>, message: string): void;
  error(objOrMessage: Record<string, unknown> | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.error(this.formatMessage(objOrMessage));
    } else {
      this.logger.error({ ...objOrMessage, context: this.context }, message || '');
    }
  }

  warn(message: string): void;
  warn(obj: Record<string, unknown>, message: string): void;
  warn(objOrMessage: Record<string, unknown> | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.warn(this.formatMessage(objOrMessage));
    } else {
      this.logger.warn({ ...objOrMessage, context: this.context }, message || '');
    }
  }

  debug(message: string): void;
  debug(obj: Record<string, unknown>, message: string): void;
  debug(objOrMessage: Record<string, unknown> | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.debug(this.formatMessage(objOrMessage));
    } else {
      this.logger.debug({ ...objOrMessage, context: this.context }, message || '');
    }
  }

  verbose(message: string, context?: string): void {
    this.logger.trace(this.formatMessage(message, context));
  }

  child(bindings: Record<string, unknown>): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }

  withRunId(runId: string): PinoLoggerService {
    return this.child({ runId });
  }

  withTaskId(taskId: string): PinoLoggerService {
    return this.child({ taskId });
  }
}
