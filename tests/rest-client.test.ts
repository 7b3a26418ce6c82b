import { Headers, Response } from 'undici';
import { describe, expect, it, vi } from 'vitest';
import { fail, httpFailure, ok } from '../src/lib/errors/failure';
import { fetchSafe, type FetchLike } from '../src/lib/http/fetchSafe';
import { buildUrl, withoutHostHeader } from '../src/lib/http/httpUtils';
import { RestClient, type AuthTokenSource } from '../src/lib/http/restClient';
import { jsonResponse, stubFetch, textResponse } from './helpers';

function authWith(token: string): AuthTokenSource & { markExpired: ReturnType<typeof vi.fn> } {
  return {
    getAuthToken: async () => ok(token),
    markExpired: vi.fn(),
  };
}

function refused() {
  return new TypeError('fetch failed', { cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }) });
}

/** Answers with headers at once, then never finishes the body until the request is aborted. */
const stalledBodyFetch = () =>
  vi.fn<FetchLike>(async (_url, init) => {
    const signal = init?.signal;

    async function* body() {
      yield new TextEncoder().encode('[');
      await new Promise<never>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' })));
      });
    }

    return new Response(body(), { status: 200 });
  });

describe('fetchSafe', () => {
  it('sets the request id header', async () => {
    const fetchImpl = stubFetch(textResponse('ok', 200));

    await fetchSafe('https://api.test/ping', { requestId: 'req_1', fetchImpl });

    const init = fetchImpl.mock.calls[0][1];
    expect(new Headers(init?.headers).get('x-request-id')).toBe('req_1');
  });

  it('retries thrown errors up to the retry count', async () => {
    const fetchImpl = stubFetch(refused(), refused(), textResponse('ok', 200));

    const response = await fetchSafe('https://api.test/ping', { retries: 2, retryDelayMs: 0, fetchImpl });

    expect(response.status).toBe(200);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last error once retries are exhausted', async () => {
    const fetchImpl = stubFetch(refused(), refused());

    await expect(fetchSafe('https://api.test/ping', { retries: 1, retryDelayMs: 0, fetchImpl })).rejects.toThrow(
      'fetch failed'
    );
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('does not retry error statuses', async () => {
    const fetchImpl = stubFetch(textResponse('down', 503));

    const response = await fetchSafe('https://api.test/ping', { retries: 2, retryDelayMs: 0, fetchImpl });

    expect(response.status).toBe(503);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});

describe('httpUtils', () => {
  it('appends defined query parameters only', () => {
    expect(buildUrl('https://api.test/api/v1', '/jobs', { limit: 20, status: undefined })).toBe(
      'https://api.test/api/v1/jobs?limit=20'
    );
  });

  it('removes the Host header in any casing', () => {
    expect(withoutHostHeader({ Host: 'bucket.test', host: 'bucket.test', 'Content-Type': 'video/mp4' })).toEqual({
      'Content-Type': 'video/mp4',
    });
  });
});

describe('RestClient', () => {
  it('sends JSON with the bearer token under /api/v1', async () => {
    const fetchImpl = stubFetch(jsonResponse({ upload_id: 'up-1' }, 201));
    const client = new RestClient({ baseUrl: 'https://api.test/', auth: authWith('test-token'), fetchImpl });

    const result = await client.post('/uploads/presign', { filename: 'clip.mp4' });

    expect(result).toEqual(ok({ upload_id: 'up-1' }));
    const [url, init] = fetchImpl.mock.calls[0];
    const headers = new Headers(init?.headers);
    expect(url).toBe('https://api.test/api/v1/uploads/presign');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"filename":"clip.mp4"}');
    expect(headers.get('authorization')).toBe('Bearer test-token');
    expect(headers.get('content-type')).toBe('application/json');
    expect(headers.get('x-request-id')).toMatch(/^req_/);
  });

  it('omits the authorization header when the token is empty', async () => {
    const fetchImpl = stubFetch(jsonResponse([]));
    const client = new RestClient({ baseUrl: 'https://api.test', auth: authWith(''), fetchImpl });

    await client.get('/jobs');

    expect(new Headers(fetchImpl.mock.calls[0][1]?.headers).has('authorization')).toBe(false);
  });

  it('returns null for an empty body', async () => {
    const fetchImpl = stubFetch(textResponse(null, 204));
    const client = new RestClient({ baseUrl: 'https://api.test', auth: authWith('test-token'), fetchImpl });

    expect(await client.delete('/jobs/job-1')).toEqual(ok(null));
  });

  it('classifies error statuses', async () => {
    const fetchImpl = stubFetch(jsonResponse({ error: 'Job not found' }, 404));
    const client = new RestClient({ baseUrl: 'https://api.test', auth: authWith('test-token'), fetchImpl });

    expect(await client.get('/jobs/missing')).toEqual(fail(httpFailure(404, 'Job not found')));
  });

  it('marks the session expired on 401', async () => {
    const auth = authWith('test-token');
    const fetchImpl = stubFetch(textResponse('', 401));
    const client = new RestClient({ baseUrl: 'https://api.test', auth, fetchImpl });

    expect(await client.get('/jobs')).toEqual(fail(httpFailure(401, 'Unauthorized')));
    expect(auth.markExpired).toHaveBeenCalledTimes(1);
  });

  it('does not call the server when no token is available', async () => {
    const fetchImpl = stubFetch();
    const failure = httpFailure(401, 'Authentication failed', 'AUTH_REQUIRED');
    const client = new RestClient({
      baseUrl: 'https://api.test',
      auth: { getAuthToken: async () => fail(failure), markExpired: vi.fn() },
      fetchImpl,
    });

    expect(await client.get('/jobs')).toEqual(fail(failure));
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('retries reads but not writes', async () => {
    const reads = stubFetch(refused(), jsonResponse([]));
    const reader = new RestClient({
      baseUrl: 'https://api.test',
      auth: authWith('test-token'),
      fetchImpl: reads,
      readRetries: 1,
      retryDelayMs: 0,
    });
    expect(await reader.get('/jobs')).toEqual(ok([]));
    expect(reads).toHaveBeenCalledTimes(2);

    const writes = stubFetch(refused(), jsonResponse({}));
    const writer = new RestClient({
      baseUrl: 'https://api.test',
      auth: authWith('test-token'),
      fetchImpl: writes,
      readRetries: 1,
      retryDelayMs: 0,
    });
    expect(await writer.post('/jobs/job-1/pause')).toEqual(
      fail({ kind: 'network', message: 'Unable to connect to server: connect ECONNREFUSED' })
    );
    expect(writes).toHaveBeenCalledTimes(1);
  });

  it('times out a response whose body stalls after the headers', async () => {
    const client = new RestClient({
      baseUrl: 'https://api.test',
      auth: authWith('test-token'),
      fetchImpl: stalledBodyFetch(),
      timeoutMs: 20,
      readRetries: 0,
    });

    const result = await client.get('/jobs');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('network');
      expect(result.error.message).toMatch(/^Request timed out: /);
    }
  });

  it('reports malformed JSON as a data format error', async () => {
    const fetchImpl = stubFetch(textResponse('{"job_id":', 200));
    const client = new RestClient({ baseUrl: 'https://api.test', auth: authWith('test-token'), fetchImpl });

    const result = await client.get('/jobs/job-1');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('generic');
      expect(result.error.message).toMatch(/^Data format error: /);
    }
  });
});
