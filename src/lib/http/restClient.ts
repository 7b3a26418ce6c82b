import { env } from '../../config/env';
import { classifyResponse, guard } from '../errors/classify';
import { fail, ok, type ApiResult } from '../errors/failure';
import { createLogger, type Logger } from '../log';
import { fetchSafeText, type FetchLike } from './fetchSafe';
import { bearerHeaders, buildUrl, createRequestId, type QueryParams } from './httpUtils';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface AuthTokenSource {
  getAuthToken(): Promise<ApiResult<string>>;
  markExpired(): void;
}

export interface RestClientOptions {
  baseUrl?: string;
  auth: AuthTokenSource;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  readRetries?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

interface RequestOptions {
  query?: QueryParams;
  body?: unknown;
}

/**
 * JSON client for the job API. Successful responses resolve to the decoded
 * body (`null` when empty); failures are classified and never thrown.
 */
export class RestClient {
  readonly baseUrl: string;
  private readonly auth: AuthTokenSource;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly timeoutMs: number;
  private readonly readRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: RestClientOptions) {
    this.baseUrl = `${(options.baseUrl ?? env.API_BASE_URL).replace(/\/+$/, '')}/api/v1`;
    this.auth = options.auth;
    this.fetchImpl = options.fetchImpl;
    this.timeoutMs = options.timeoutMs ?? env.REQUEST_TIMEOUT_MS;
    this.readRetries = options.readRetries ?? env.READ_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? env.RETRY_DELAY_MS;
    this.logger = options.logger ?? createLogger('RestClient');
  }

  get(endPoint: string, query?: QueryParams) {
    return this.request('GET', endPoint, { query });
  }

  post(endPoint: string, body?: unknown) {
    return this.request('POST', endPoint, { body });
  }

  patch(endPoint: string, body?: unknown) {
    return this.request('PATCH', endPoint, { body });
  }

  delete(endPoint: string) {
    return this.request('DELETE', endPoint);
  }

  request(method: HttpMethod, endPoint: string, options: RequestOptions = {}): Promise<ApiResult<unknown>> {
    return guard<unknown>(async () => {
      const token = await this.auth.getAuthToken();
      if (!token.success) {
        return token;
      }

      const requestId = createRequestId();
      const headers: Record<string, string> = {
        Accept: 'application/json',
        ...bearerHeaders(token.data),
      };
      if (options.body !== undefined) {
        headers['Content-Type'] = 'application/json';
      }

      const { response, body: text } = await fetchSafeText(buildUrl(this.baseUrl, endPoint, options.query), {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        requestId,
        timeoutMs: this.timeoutMs,
        retries: method === 'GET' ? this.readRetries : 0,
        retryDelayMs: this.retryDelayMs,
        fetchImpl: this.fetchImpl,
      });

      this.logger.debug(`${method} ${endPoint} -> ${response.status} (request ${requestId})`);

      if (!response.ok) {
        if (response.status === 401) {
          this.auth.markExpired();
        }
        return fail(classifyResponse(response.status, text));
      }

      const trimmed = text.trim();
      if (!trimmed || trimmed === 'null') {
        return ok(null);
      }

      const decoded: unknown = JSON.parse(trimmed);
      return ok(decoded);
    });
  }
}
