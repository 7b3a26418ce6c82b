import { z } from 'zod';
import { describe, expect, it } from 'vitest';
import { classifyException, classifyResponse, guard, parseWith } from '../src/lib/errors/classify';
import { ok, validationFailureFromZod } from '../src/lib/errors/failure';

function connectionError(code: string, message: string) {
  return Object.assign(new Error(message), { code });
}

describe('classifyResponse', () => {
  it('uses a string error field as the message', () => {
    expect(classifyResponse(400, '{"error":"Title is too long"}')).toEqual({
      kind: 'http',
      statusCode: 400,
      message: 'Title is too long',
    });
  });

  it('keeps the code of a structured error', () => {
    expect(classifyResponse(409, '{"error":{"code":"JOB_BUSY","message":"Job is processing"}}')).toEqual({
      kind: 'http',
      statusCode: 409,
      message: 'Job is processing',
      code: 'JOB_BUSY',
    });
  });

  it('fills in a structured error missing its fields', () => {
    expect(classifyResponse(422, '{"error":{}}')).toEqual({
      kind: 'http',
      statusCode: 422,
      message: 'An error occurred',
      code: 'UNKNOWN',
    });
  });

  it('falls back to a message field', () => {
    expect(classifyResponse(403, '{"message":"Not your job"}')).toEqual({
      kind: 'http',
      statusCode: 403,
      message: 'Not your job',
    });
  });

  it('uses a bare JSON string body as the message', () => {
    expect(classifyResponse(500, '"worker crashed"')).toEqual({
      kind: 'http',
      statusCode: 500,
      message: 'worker crashed',
    });
  });

  it.each([
    [400, 'Bad request'],
    [401, 'Unauthorized'],
    [403, 'Forbidden'],
    [404, 'Not found'],
    [500, 'Internal server error'],
    [502, 'Bad gateway'],
    [503, 'Service unavailable'],
    [418, 'HTTP error 418'],
  ])('uses the default copy for %i when the body is empty', (status, message) => {
    expect(classifyResponse(status, '')).toEqual({ kind: 'http', statusCode: status, message });
  });

  it('uses the default copy when the body is not JSON', () => {
    expect(classifyResponse(502, '<html>gateway</html>')).toEqual({
      kind: 'http',
      statusCode: 502,
      message: 'Bad gateway',
    });
  });
});

describe('classifyException', () => {
  it('treats refused connections as network failures', () => {
    expect(classifyException(connectionError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:8081'))).toEqual({
      kind: 'network',
      message: 'Unable to connect to server: connect ECONNREFUSED 127.0.0.1:8081',
    });
  });

  it('looks through the cause undici attaches to fetch failures', () => {
    const error = new TypeError('fetch failed', { cause: connectionError('ENOTFOUND', 'getaddrinfo ENOTFOUND api.test') });

    expect(classifyException(error)).toEqual({
      kind: 'network',
      message: 'Unable to connect to server: getaddrinfo ENOTFOUND api.test',
    });
  });

  it('reports fetch failures without a known code', () => {
    const error = new TypeError('fetch failed', { cause: new Error('other side closed') });

    expect(classifyException(error)).toEqual({
      kind: 'network',
      message: 'Network request failed: other side closed',
    });
  });

  it('reports aborted requests as timeouts', () => {
    const error = new Error('This operation was aborted');
    error.name = 'AbortError';

    expect(classifyException(error)).toEqual({ kind: 'network', message: 'Request timed out: This operation was aborted' });
  });

  it('treats JSON syntax errors as data format errors', () => {
    expect(classifyException(new SyntaxError('Unexpected token <'))).toEqual({
      kind: 'generic',
      message: 'Data format error: Unexpected token <',
    });
  });

  it('treats schema mismatches as data format errors', () => {
    const result = z.object({ job_id: z.string() }).safeParse({});
    if (result.success) throw new Error('expected a parse failure');

    expect(classifyException(result.error)).toEqual({
      kind: 'generic',
      message: 'Data format error: job_id: Required',
    });
  });

  it('passes other errors through as generic', () => {
    expect(classifyException(new Error('boom'))).toEqual({ kind: 'generic', message: 'boom' });
  });

  it('describes thrown non-errors', () => {
    expect(classifyException(42)).toEqual({ kind: 'generic', message: 'Unexpected error: 42' });
  });
});

describe('parseWith', () => {
  const schema = z.object({ upload_id: z.string() });

  it('returns the parsed value', () => {
    expect(parseWith(schema, { upload_id: 'up-1' })).toEqual(ok({ upload_id: 'up-1' }));
  });

  it('reports a generic failure on mismatch', () => {
    expect(parseWith(schema, { upload_id: 7 })).toEqual({
      success: false,
      error: { kind: 'generic', message: 'Data format error: upload_id: Expected string, received number' },
    });
  });
});

describe('guard', () => {
  it('turns a thrown error into a failure', async () => {
    const result = await guard(async () => {
      throw connectionError('ECONNRESET', 'socket hang up');
    });

    expect(result).toEqual({
      success: false,
      error: { kind: 'network', message: 'Unable to connect to server: socket hang up' },
    });
  });
});

describe('validationFailureFromZod', () => {
  it('keeps the first message for each field', () => {
    const result = z
      .object({ title: z.string().min(3, 'too short').regex(/^[a-z]+$/, 'lowercase only') })
      .safeParse({ title: 'A' });
    if (result.success) throw new Error('expected a parse failure');

    expect(validationFailureFromZod('Invalid job metadata', result.error)).toEqual({
      kind: 'validation',
      message: 'Invalid job metadata',
      fieldErrors: { title: 'too short' },
    });
  });
});
