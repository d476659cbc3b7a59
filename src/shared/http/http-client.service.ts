import { Inject, Injectable, OnModuleDestroy, Optional } from '@nestjs/common';
import { Pool, Dispatcher, FormData } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';
import { describeError } from '../utils/error.utils';

export const HTTP_DISPATCHER_FACTORY = 'HttpDispatcherFactory';

/**
 * Builds the dispatcher used for one origin. Defaults to a keep-alive undici Pool;
 * tests hand in `(origin) => mockAgent.get(origin)`.
 */
export type DispatcherFactory = (origin: string) => Dispatcher;

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string | Buffer | FormData;
  timeout?: number;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  /** Raw response text, exactly as received */
  text: string;
  /** Parsed JSON when the text is JSON, the text itself otherwise, undefined when blank */
  body: unknown;
}

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly dispatchers: Map<string, Dispatcher> = new Map();
  private readonly defaultTimeout = 30000;
  private readonly dispatcherFactory: DispatcherFactory;

  constructor(
    private readonly logger: PinoLoggerService,
    @Optional()
    @Inject(HTTP_DISPATCHER_FACTORY)
    dispatcherFactory?: DispatcherFactory,
  ) {
    this.logger.setContext(HttpClientService.name);
    this.dispatcherFactory =
      dispatcherFactory ??
      ((origin) =>
        new Pool(origin, {
          connections: 4,
          pipelining: 1,
          keepAliveTimeout: 30000,
          keepAliveMaxTimeout: 60000,
        }));
  }

  private getDispatcher(origin: string): Dispatcher {
    let dispatcher = this.dispatchers.get(origin);
    if (!dispatcher) {
      dispatcher = this.dispatcherFactory(origin);
      this.dispatchers.set(origin, dispatcher);
    }
    return dispatcher;
  }

  /**
   * Send one request. Failures propagate to the caller, which decides whether to retry.
   */
  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const parsedUrl = new URL(url);
    const timeout = options.timeout ?? this.defaultTimeout;

    try {
      const response = await this.getDispatcher(parsedUrl.origin).request({
        origin: parsedUrl.origin,
        path: parsedUrl.pathname + parsedUrl.search,
        method: options.method || 'GET',
        headers: options.headers,
        body: options.body,
        headersTimeout: timeout,
        bodyTimeout: timeout,
      });

      const text = await response.body.text();

      return {
        statusCode: response.statusCode,
        headers: response.headers,
        text,
        body: parseBody(text),
      };
    } catch (error) {
      this.logger.debug({ url, error: describeError(error) }, 'HTTP request failed');
      throw error;
    }
  }

  async get(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  /**
   * POST a multipart/form-data body. undici derives the boundary and content type.
   */
  async postForm(
    url: string,
    form: FormData,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'POST', body: form });
  }

  async destroy(): Promise<void> {
    const closePromises = Array.from(this.dispatchers.values()).map((dispatcher) =>
      dispatcher.close(),
    );
    await Promise.all(closePromises);
    this.dispatchers.clear();
  }

  async onModuleDestroy(): Promise<void> {
    await this.destroy();
  }
}

function parseBody(text: string): unknown {
  if (text.trim().length === 0) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
