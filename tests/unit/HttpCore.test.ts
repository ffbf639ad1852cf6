// tests/unit/HttpCore.test.ts

import { describe, it, expect, beforeEach, afterAll, beforeAll } from 'vitest';
import nock from 'nock';
import { HttpCore } from '../../src/core/http/HttpCore';
import {
  ApiClientError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
} from '../../src/utils/errors';
import { createSilentLogger } from '../fixtures/reddit';

describe('HttpCore', () => {
  let httpCore: HttpCore;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    nock.cleanAll();
    httpCore = new HttpCore(createSilentLogger(), { userAgent: 'test-agent/1.0' });
  });

  it('should send the user agent, a request id, and query parameters', async () => {
    const scope = nock('https://api.example.com')
      .get('/items')
      .query({ limit: '5', sort: 'new' })
      .matchHeader('user-agent', 'test-agent/1.0')
      .matchHeader('x-request-id', /^req_\d+_/)
      .reply(200, { ok: true }, { 'Content-Type': 'application/json' });

    const response = await httpCore.get<{ ok: boolean }>('https://api.example.com/items', {
      query: { limit: 5, sort: 'new' },
    });

    expect(scope.isDone()).toBe(true);
    expect(response.status).toBe(200);
    expect(response.data).toEqual({ ok: true });
    expect(response.headers['content-type']).toBe('application/json');
  });

  it('should let request headers override the defaults', async () => {
    const scope = nock('https://api.example.com')
      .get('/items')
      .matchHeader('user-agent', 'override/2.0')
      .reply(200, {});

    await httpCore.get('https://api.example.com/items', { headers: { 'User-Agent': 'override/2.0' } });

    expect(scope.isDone()).toBe(true);
  });

  it('should send form bodies url-encoded with basic auth', async () => {
    const scope = nock('https://auth.example.com')
      .post('/token', 'grant_type=client_credentials&scope=read')
      .matchHeader('content-type', 'application/x-www-form-urlencoded')
      .basicAuth({ user: 'test-client', pass: 'test-secret' })
      .reply(200, { access_token: 'test-token' });

    const response = await httpCore.request<{ access_token: string }>({
      url: 'https://auth.example.com/token',
      method: 'POST',
      auth: { username: 'test-client', password: 'test-secret' },
      form: { grant_type: 'client_credentials', scope: 'read' },
    });

    expect(scope.isDone()).toBe(true);
    expect(response.data.access_token).toBe('test-token');
  });

  it('should map 4xx responses to ApiClientError with the status', async () => {
    nock('https://api.example.com').get('/missing').reply(404, { message: 'Not Found' });

    const error = await httpCore.get('https://api.example.com/missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiClientError);
    expect(error).toMatchObject({ status: 404, message: 'Client error: 404' });
  });

  it('should map 5xx responses to ApiServerError', async () => {
    nock('https://api.example.com').get('/broken').reply(503);

    const error = await httpCore.get('https://api.example.com/broken').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiServerError);
    expect(error).toMatchObject({ status: 503, message: 'Server error: 503' });
  });

  it('should make exactly one attempt per request', async () => {
    const scope = nock('https://api.example.com').get('/flaky').reply(500).get('/flaky').reply(200, {});

    await expect(httpCore.get('https://api.example.com/flaky')).rejects.toThrow(ApiServerError);
    expect(scope.isDone()).toBe(false);
  });

  it('should map connection failures to NetworkError', async () => {
    nock('https://api.example.com')
      .get('/down')
      .replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });

    const error = await httpCore.get('https://api.example.com/down').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).not.toBeInstanceOf(NetworkTimeoutError);
  });

  it('should map timeouts to NetworkTimeoutError', async () => {
    nock('https://api.example.com').get('/slow').delay(500).reply(200, {});

    const impatient = new HttpCore(createSilentLogger(), { timeout: 50 });

    await expect(impatient.get('https://api.example.com/slow')).rejects.toThrow(NetworkTimeoutError);
  });
});
