import { randomUUID } from 'node:crypto';

export type QueryParams = Record<string, string | number | undefined>;

export function createRequestId(): string {
  return `req_${randomUUID()}`;
}

export function buildUrl(baseUrl: string, endPoint: string, query: QueryParams = {}): string {
  const url = new URL(`${baseUrl}${endPoint}`);

  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }

  return url.toString();
}

export function bearerHeaders(token: string): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {};
}

/**
 * Presign responses echo every signed header, including `Host`, which the
 * transport derives from the URL and must not be sent twice.
 */
export function withoutHostHeader(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).filter(([key]) => key.toLowerCase() !== 'host'));
}
