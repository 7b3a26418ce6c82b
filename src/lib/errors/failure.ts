import type { ZodError } from 'zod';

/**
 * Every fallible operation resolves to exactly one of these.
 *
 * - `network`: the request never produced a response (DNS, refused connection, timeout).
 * - `http`: the server answered with a non-2xx status. `code` is present when the
 *   body carried a structured `{ error: { code, message } }` payload.
 * - `validation`: a client-side precondition failed before any call was made.
 * - `generic`: anything else, including undecodable response bodies.
 */
export type Failure =
  | { kind: 'network'; message: string }
  | { kind: 'http'; statusCode: number; message: string; code?: string }
  | { kind: 'validation'; message: string; fieldErrors?: Record<string, string> }
  | { kind: 'generic'; message: string };

export type ApiResult<T> = { success: true; data: T } | { success: false; error: Failure };

export function ok<T>(data: T): ApiResult<T> {
  return { success: true, data };
}

export function fail(error: Failure): ApiResult<never> {
  return { success: false, error };
}

export function networkFailure(message: string): Failure {
  return { kind: 'network', message };
}

export function httpFailure(statusCode: number, message: string, code?: string): Failure {
  return code === undefined ? { kind: 'http', statusCode, message } : { kind: 'http', statusCode, message, code };
}

export function validationFailure(message: string, fieldErrors?: Record<string, string>): Failure {
  return fieldErrors === undefined ? { kind: 'validation', message } : { kind: 'validation', message, fieldErrors };
}

export function genericFailure(message: string): Failure {
  return { kind: 'generic', message };
}

/** Collapses zod's per-field message lists to the first message for each field. */
export function validationFailureFromZod(message: string, error: ZodError): Failure {
  const fieldErrors: Record<string, string> = {};

  for (const [field, messages] of Object.entries(error.flatten().fieldErrors)) {
    const first = Array.isArray(messages) ? messages[0] : undefined;
    if (typeof first === 'string') {
      fieldErrors[field] = first;
    }
  }

  return validationFailure(message, fieldErrors);
}

export function defaultMessageForStatus(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Bad request';
    case 401:
      return 'Unauthorized';
    case 403:
      return 'Forbidden';
    case 404:
      return 'Not found';
    case 500:
      return 'Internal server error';
    case 502:
      return 'Bad gateway';
    case 503:
      return 'Service unavailable';
    default:
      return `HTTP error ${statusCode}`;
  }
}

export function isHttpStatus(failure: Failure, statusCode: number): boolean {
  return failure.kind === 'http' && failure.statusCode === statusCode;
}
