import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import {
  defaultMessageForStatus,
  fail,
  genericFailure,
  httpFailure,
  networkFailure,
  ok,
  type ApiResult,
  type Failure,
} from './failure';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorCode(error: unknown): string | undefined {
  if (isRecord(error) && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
}

function isConnectionCode(code: string): boolean {
  return CONNECTION_ERROR_CODES.has(code) || code.startsWith('UND_ERR_');
}

export function summarizeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
}

/**
 * Maps a thrown value to a failure. Connection-level problems become `network`
 * with the underlying message appended; decoding problems and everything else
 * become `generic`.
 */
export function classifyException(error: unknown): Failure {
  if (error instanceof ZodError) {
    return genericFailure(`Data format error: ${summarizeIssues(error)}`);
  }

  if (error instanceof SyntaxError) {
    return genericFailure(`Data format error: ${error.message}`);
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return networkFailure(`Request timed out: ${error.message}`);
    }

    const cause = error.cause instanceof Error ? error.cause : undefined;
    const code = errorCode(error) ?? errorCode(cause);

    if (code && isConnectionCode(code)) {
      return networkFailure(`Unable to connect to server: ${(cause ?? error).message}`);
    }

    // undici reports every transport failure as `TypeError: fetch failed`
    if (error instanceof TypeError && error.message === 'fetch failed') {
      return networkFailure(`Network request failed: ${cause?.message ?? error.message}`);
    }

    return genericFailure(error.message || error.name);
  }

  return genericFailure(`Unexpected error: ${String(error)}`);
}

function decodeBody(body: string): unknown {
  if (!body.trim()) {
    return undefined;
  }

  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/** Maps a non-2xx response to an `http` failure, preferring the server's own wording. */
export function classifyResponse(statusCode: number, body: string): Failure {
  const decoded = decodeBody(body);

  if (typeof decoded === 'string') {
    return httpFailure(statusCode, decoded);
  }

  if (isRecord(decoded)) {
    const errorField = decoded.error;

    if (typeof errorField === 'string') {
      return httpFailure(statusCode, errorField);
    }

    if (isRecord(errorField)) {
      return httpFailure(
        statusCode,
        typeof errorField.message === 'string' ? errorField.message : 'An error occurred',
        typeof errorField.code === 'string' ? errorField.code : 'UNKNOWN'
      );
    }

    if (typeof decoded.message === 'string') {
      return httpFailure(statusCode, decoded.message);
    }
  }

  return httpFailure(statusCode, defaultMessageForStatus(statusCode));
}

export function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown): ApiResult<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    return fail(genericFailure(`Data format error: ${summarizeIssues(result.error)}`));
  }

  return ok(result.data);
}

/** Runs a client operation so that nothing it throws escapes as an exception. */
export async function guard<T>(action: () => Promise<ApiResult<T>>): Promise<ApiResult<T>> {
  try {
    return await action();
  } catch (error) {
    return fail(classifyException(error));
  }
}
