import { setTimeout as delay } from 'node:timers/promises';
import { fetch, Headers, type RequestInit, type Response } from 'undici';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type FetchSafeOptions = RequestInit & {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  requestId?: string;
  fetchImpl?: FetchLike;
};

const DEFAULT_TIMEOUT = 15000;
const DEFAULT_RETRY_DELAY = 300;

export interface FetchedText {
  response: Response;
  body: string;
}

/**
 * fetch with a per-attempt timeout and exponential backoff on thrown transport
 * errors. HTTP error statuses are returned, never retried. Retries default to
 * zero; only idempotent reads should ask for them.
 *
 * The timeout only covers the response headers. Use `fetchSafeText` when the
 * body has to arrive within the same deadline.
 */
export function fetchSafe(url: string, opts: FetchSafeOptions = {}): Promise<Response> {
  return fetchWithDeadline(url, opts, async (response) => response);
}

/** Like `fetchSafe`, but the body is read before the attempt's timer is cleared. */
export function fetchSafeText(url: string, opts: FetchSafeOptions = {}): Promise<FetchedText> {
  return fetchWithDeadline(url, opts, async (response) => ({ response, body: await response.text() }));
}

async function fetchWithDeadline<T>(
  url: string,
  opts: FetchSafeOptions,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const {
    timeoutMs = DEFAULT_TIMEOUT,
    retries = 0,
    retryDelayMs = DEFAULT_RETRY_DELAY,
    requestId,
    fetchImpl = fetch,
    headers,
    ...rest
  } = opts;

  const hdrs = new Headers(headers);
  if (requestId) hdrs.set('x-request-id', requestId);

  for (let attempt = 0; ; attempt++) {
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetchImpl(url, { ...rest, headers: hdrs, signal: controller.signal });
      return await read(response);
    } catch (err) {
      if (attempt >= retries) throw err;
      await delay(retryDelayMs * Math.pow(2, attempt));
    } finally {
      clearTimeout(id);
    }
  }
}
