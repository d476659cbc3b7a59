import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FormData, MockAgent } from 'undici';
import { HttpClientService } from '../../../src/shared/http/http-client.service';
import { asLogger, createMockLogger, MockLogger } from '../helpers/mock-factories';

const ORIGIN = 'http://127.0.0.1:8001';

describe('HttpClientService', () => {
  let mockAgent: MockAgent;
  let mockLogger: MockLogger;
  let client: HttpClientService;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    mockLogger = createMockLogger();
    client = new HttpClientService(asLogger(mockLogger), (origin) => mockAgent.get(origin));
  });

  afterEach(async () => {
    await client.destroy();
    await mockAgent.close();
  });

  it('should parse JSON bodies and keep the raw text', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/health', method: 'GET' })
      .reply(200, { status: 'ok' });

    const response = await client.get(`${ORIGIN}/health`);

    expect(response.statusCode).toBe(200);
    expect(response.body).toEqual({ status: 'ok' });
    expect(response.text).toBe('{"status":"ok"}');
  });

  it('should return non-JSON text as is and blank bodies as undefined', async () => {
    const pool = mockAgent.get(ORIGIN);
    pool.intercept({ path: '/v1/tasks/abc123', method: 'GET' }).reply(502, 'Bad Gateway');
    pool.intercept({ path: '/v1/tasks', method: 'POST' }).reply(200, '');

    const text = await client.get(`${ORIGIN}/v1/tasks/abc123`);
    const form = new FormData();
    form.append('target_language', 'zh-CN');
    const blank = await client.postForm(`${ORIGIN}/v1/tasks`, form);

    expect(text.statusCode).toBe(502);
    expect(text.body).toBe('Bad Gateway');
    expect(blank.text).toBe('');
    expect(blank.body).toBeUndefined();
  });

  it('should keep the query string in the request path', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/v1/tasks?limit=1', method: 'GET' })
      .reply(200, []);

    const response = await client.get(`${ORIGIN}/v1/tasks?limit=1`);

    expect(response.body).toEqual([]);
  });

  it('should make a single attempt and rethrow the failure', async () => {
    const pool = mockAgent.get(ORIGIN);
    pool
      .intercept({ path: '/health', method: 'GET' })
      .replyWithError(new Error('socket hang up'));
    pool.intercept({ path: '/health', method: 'GET' }).reply(200, { status: 'ok' });

    await expect(client.get(`${ORIGIN}/health`)).rejects.toThrow('socket hang up');
    expect(mockLogger.debug).toHaveBeenCalledWith(
      { url: `${ORIGIN}/health`, error: 'socket hang up' },
      'HTTP request failed',
    );
    expect(mockAgent.pendingInterceptors()).toHaveLength(1);
  });
});
