import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { FormData } from 'undici';
import { HarnessConfig } from '../../../config/configuration';
import { HttpClientService, HttpResponse } from '../../../shared/http/http-client.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { TaskHandle } from '../../../domain/entities/task-handle.entity';
import { TaskStatusSnapshot } from '../../../domain/entities/task-status-snapshot.entity';
import { ResultLocationVO } from '../../../domain/value-objects/result-location.vo';
import {
  EmptyResponseError,
  MalformedResponseError,
  MissingFieldError,
  RequestFailedError,
  UnexpectedStatusError,
} from '../../../domain/errors';
import { describeError } from '../../../shared/utils/error.utils';
import {
  HealthProbe,
  SubmitTaskRequest,
  TranslationApiPort,
} from '../../../application/ports/output/translation-api.port';
import {
  describeIssues,
  healthResponseSchema,
  resultUrlResponseSchema,
  submitTaskResponseSchema,
  taskStatusResponseSchema,
} from './translation-api.schemas';

const HEALTH_OPERATION = 'GET /health';
const SUBMIT_OPERATION = 'POST /v1/tasks';
const STATUS_OPERATION = 'GET /v1/tasks/{id}';
const RESULT_OPERATION = 'GET /v1/tasks/{id}/result-url';

/**
 * Translation API HTTP Adapter
 * Implements TranslationApiPort over undici. Every call is a single attempt:
 * retrying is the calling use case's decision. Transport failures surface as
 * RequestFailedError.
 */
@Injectable()
export class TranslationApiHttpAdapter implements TranslationApiPort {
  private readonly baseUrl: string;

  constructor(
    private readonly httpClient: HttpClientService,
    private readonly configService: ConfigService<HarnessConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    this.baseUrl = this.configService.get('api', { infer: true }).baseUrl;
    this.logger.setContext(TranslationApiHttpAdapter.name);
  }

  async probeHealth(timeoutMs: number): Promise<HealthProbe> {
    const response = await this.send(HEALTH_OPERATION, () =>
      this.httpClient.get(`${this.baseUrl}/health`, { timeout: timeoutMs }),
    );

    const parsed = healthResponseSchema.safeParse(response.body);
    return {
      statusCode: response.statusCode,
      status: parsed.success ? parsed.data.status : undefined,
    };
  }

  async submitTask(request: SubmitTaskRequest, timeoutMs: number): Promise<TaskHandle> {
    const content = await readFile(request.filePath);

    const form = new FormData();
    form.append('file', new Blob([content]), path.basename(request.filePath));
    form.append('target_language', request.targetLanguage);
    form.append('translate_style', request.translateStyle);

    this.logger.debug(
      { file: request.filePath, bytes: content.length },
      'Uploading file for translation',
    );

    const response = await this.send(SUBMIT_OPERATION, () =>
      this.httpClient.postForm(`${this.baseUrl}/v1/tasks`, form, { timeout: timeoutMs }),
    );
    this.assertSuccess(SUBMIT_OPERATION, response);

    if (response.text.trim().length === 0) {
      throw new EmptyResponseError(SUBMIT_OPERATION);
    }

    const parsed = submitTaskResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new MalformedResponseError(SUBMIT_OPERATION, describeIssues(parsed.error));
    }

    const taskId = parsed.data.task_id == null ? '' : String(parsed.data.task_id).trim();
    if (taskId.length === 0) {
      throw new MissingFieldError(SUBMIT_OPERATION, 'task_id');
    }

    return TaskHandle.create({
      taskId,
      initialStatus: parsed.data.status ?? '',
    });
  }

  async getTaskStatus(taskId: string, timeoutMs: number): Promise<TaskStatusSnapshot | null> {
    const response = await this.send(STATUS_OPERATION, () =>
      this.httpClient.get(this.taskUrl(taskId), { timeout: timeoutMs }),
    );

    if (response.statusCode === 404) {
      return null;
    }
    this.assertSuccess(STATUS_OPERATION, response);

    const parsed = taskStatusResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new MalformedResponseError(STATUS_OPERATION, describeIssues(parsed.error));
    }

    return TaskStatusSnapshot.create({
      taskId,
      status: parsed.data.status,
      progress: parsed.data.progress ?? undefined,
      processedFiles: parsed.data.processed_files ?? undefined,
      totalFiles: parsed.data.total_files ?? undefined,
      errorMessage: parsed.data.error_message ?? undefined,
    });
  }

  async getResultLocation(taskId: string, timeoutMs: number): Promise<ResultLocationVO> {
    const response = await this.send(RESULT_OPERATION, () =>
      this.httpClient.get(`${this.taskUrl(taskId)}/result-url`, { timeout: timeoutMs }),
    );
    this.assertSuccess(RESULT_OPERATION, response);

    const parsed = resultUrlResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new MalformedResponseError(RESULT_OPERATION, describeIssues(parsed.error));
    }

    return ResultLocationVO.create({
      downloadUrl: parsed.data.download_url,
      expiresIn: parsed.data.expires_in,
    });
  }

  private taskUrl(taskId: string): string {
    return `${this.baseUrl}/v1/tasks/${encodeURIComponent(taskId)}`;
  }

  private async send(
    operation: string,
    call: () => Promise<HttpResponse>,
  ): Promise<HttpResponse> {
    try {
      return await call();
    } catch (error) {
      throw new RequestFailedError(operation, describeError(error), error);
    }
  }

  private assertSuccess(operation: string, response: HttpResponse): void {
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new UnexpectedStatusError(operation, response.statusCode, response.text);
    }
  }
}
