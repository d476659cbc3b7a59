import {
  DomainEvent,
  ResultResolvedEvent,
  RunFinishedEvent,
  TaskFinishedEvent,
  TaskPolledEvent,
  TaskSubmittedEvent,
} from '../../../domain/events';

/**
 * Field-prefixed report lines, one fact per line. Downstream log scraping matches
 * these prefixes, so the formats are a contract:
 *
 *   TASK_ID=<id>
 *   INITIAL_STATUS=<status>
 *   POLL <n>: status=<status>, progress=<0.00>, processed=<a>/<b>
 *   FINAL_STATUS=<status>
 *   FINAL_PROGRESS=<0.00>
 *   FINAL_ERROR=<message>
 *   RESULT_URL=<url>
 *   RESULT_EXPIRES_IN=<seconds>
 *   INTEGRATION_RESULT=PASSED|FAILED
 */
export function formatReportLines(event: DomainEvent): string[] {
  if (event instanceof TaskSubmittedEvent) {
    return [`TASK_ID=${event.handle.taskId}`, `INITIAL_STATUS=${event.handle.initialStatus}`];
  }

  if (event instanceof TaskPolledEvent) {
    const snapshot = event.snapshot;
    if (!snapshot) {
      return [`POLL ${event.iteration}: task not found yet`];
    }
    return [
      `POLL ${event.iteration}: status=${snapshot.status.toString()}, ` +
        `progress=${formatProgress(snapshot.progress)}, ` +
        `processed=${formatCount(snapshot.processedFiles)}/${formatCount(snapshot.totalFiles)}`,
    ];
  }

  if (event instanceof TaskFinishedEvent) {
    return [
      `FINAL_STATUS=${event.snapshot.status.toString()}`,
      `FINAL_PROGRESS=${formatProgress(event.snapshot.progress)}`,
      `FINAL_ERROR=${event.snapshot.errorMessage ?? ''}`,
    ];
  }

  if (event instanceof ResultResolvedEvent) {
    return [
      `RESULT_URL=${event.location.downloadUrl}`,
      `RESULT_EXPIRES_IN=${event.location.expiresIn}`,
    ];
  }

  if (event instanceof RunFinishedEvent) {
    return [`INTEGRATION_RESULT=${event.passed ? 'PASSED' : 'FAILED'}`];
  }

  return [];
}

function formatProgress(progress: number): string {
  return progress.toFixed(2);
}

function formatCount(count: number | undefined): string {
  return count === undefined ? '?' : String(count);
}
