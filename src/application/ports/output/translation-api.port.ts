import { TaskHandle } from '../../../domain/entities/task-handle.entity';
import { TaskStatusSnapshot } from '../../../domain/entities/task-status-snapshot.entity';
import { ResultLocationVO } from '../../../domain/value-objects/result-location.vo';

/**
 * Outcome of one health probe that got an HTTP response
 */
export interface HealthProbe {
  statusCode: number;
  /** The body's `status` field when the body is an object carrying a string there */
  status?: string;
}

/**
 * Submit Task Request
 */
export interface SubmitTaskRequest {
  filePath: string;
  targetLanguage: string;
  translateStyle: string;
}

/**
 * Translation API Port (Driven Port)
 * Interface for the front-facing translation service under test
 */
export interface TranslationApiPort {
  /**
   * GET /health. Rejects on network errors and timeouts; any HTTP response resolves
   */
  probeHealth(timeoutMs: number): Promise<HealthProbe>;

  /**
   * POST /v1/tasks with the file and translation parameters
   * @throws EmptyResponseError, MissingFieldError, MalformedResponseError, UnexpectedStatusError
   */
  submitTask(request: SubmitTaskRequest, timeoutMs: number): Promise<TaskHandle>;

  /**
   * GET /v1/tasks/{id}. Resolves null when the service does not know the task (404)
   */
  getTaskStatus(taskId: string, timeoutMs: number): Promise<TaskStatusSnapshot | null>;

  /**
   * GET /v1/tasks/{id}/result-url
   */
  getResultLocation(taskId: string, timeoutMs: number): Promise<ResultLocationVO>;
}
