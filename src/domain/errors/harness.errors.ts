/**
 * Harness error taxonomy.
 *
 * Every fatal failure of a run is one of these. Transient request failures inside
 * the health gate and the status poller never become HarnessErrors; they are
 * retried until the phase's budget runs out.
 */
export type HarnessErrorCode =
  | 'INPUT_FILE_NOT_FOUND'
  | 'LAUNCH_FAILED'
  | 'HEALTH_TIMEOUT'
  | 'REQUEST_FAILED'
  | 'UNEXPECTED_STATUS'
  | 'EMPTY_RESPONSE'
  | 'MISSING_FIELD'
  | 'MALFORMED_RESPONSE'
  | 'POLL_TIMEOUT';

export abstract class HarnessError extends Error {
  abstract readonly code: HarnessErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputFileNotFoundError extends HarnessError {
  readonly code = 'INPUT_FILE_NOT_FOUND';

  constructor(
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(`Input file not found: ${filePath}`, { cause });
  }
}

export class LaunchError extends HarnessError {
  readonly code = 'LAUNCH_FAILED';

  constructor(
    public readonly serviceName: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Failed to launch service ${serviceName}: ${reason}`, { cause });
  }
}

export class HealthTimeoutError extends HarnessError {
  readonly code = 'HEALTH_TIMEOUT';

  constructor(
    public readonly attempts: number,
    public readonly lastObservation: string,
    public readonly exitedServices: readonly string[] = [],
  ) {
    const exited =
      exitedServices.length > 0 ? `; services already exited: ${exitedServices.join(', ')}` : '';
    super(
      `Service did not become healthy after ${attempts} attempts (last: ${lastObservation})${exited}`,
    );
  }

  withExitedServices(exitedServices: readonly string[]): HealthTimeoutError {
    return new HealthTimeoutError(this.attempts, this.lastObservation, exitedServices);
  }
}

export class RequestFailedError extends HarnessError {
  readonly code = 'REQUEST_FAILED';

  constructor(
    public readonly operation: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`${operation} request failed: ${reason}`, { cause });
  }
}

export class UnexpectedStatusError extends HarnessError {
  readonly code = 'UNEXPECTED_STATUS';

  constructor(
    public readonly operation: string,
    public readonly statusCode: number,
    public readonly responseText: string,
  ) {
    super(`${operation} returned HTTP ${statusCode}${responseText ? `: ${truncate(responseText)}` : ''}`);
  }
}

export class EmptyResponseError extends HarnessError {
  readonly code = 'EMPTY_RESPONSE';

  constructor(public readonly operation: string) {
    super(`${operation} returned an empty response body`);
  }
}

export class MissingFieldError extends HarnessError {
  readonly code = 'MISSING_FIELD';

  constructor(
    public readonly operation: string,
    public readonly field: string,
  ) {
    super(`${operation} response is missing required field "${field}"`);
  }
}

export class MalformedResponseError extends HarnessError {
  readonly code = 'MALFORMED_RESPONSE';

  constructor(
    public readonly operation: string,
    detail: string,
  ) {
    super(`${operation} returned a malformed response: ${detail}`);
  }
}

export class PollTimeoutError extends HarnessError {
  readonly code = 'POLL_TIMEOUT';

  constructor(
    public readonly taskId: string,
    public readonly iterations: number,
    public readonly lastStatus: string | undefined,
  ) {
    super(
      `Task ${taskId} did not reach a terminal status after ${iterations} polls. ` +
        `Last status: ${lastStatus ?? 'unknown'}`,
    );
  }
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
