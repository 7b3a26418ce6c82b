import { env } from '../../config/env';
import { fail, genericFailure, httpFailure, ok, type ApiResult } from '../errors/failure';
import { TypedEventEmitter } from '../events';
import { createLogger, type Logger } from '../log';
import type { AuthTokenSource } from '../http/restClient';
import type { TokenStore } from './tokenStore';

export type SessionStatus = 'initial' | 'authenticated' | 'unauthenticated' | 'expired';

export type SessionEvents = {
  'session:changed': { status: SessionStatus; previous: SessionStatus };
};

export interface SessionOptions {
  tokenStore: TokenStore;
  authRequired?: boolean;
  logger?: Logger;
}

/**
 * Holds the bearer token for one client lifetime. Constructed explicitly and
 * handed to the REST client; `init()` and `teardown()` bracket its use.
 */
export class SessionContext implements AuthTokenSource {
  readonly events = new TypedEventEmitter<SessionEvents>();

  private readonly tokenStore: TokenStore;
  private readonly authRequired: boolean;
  private readonly logger: Logger;
  private token: string | null = null;
  private currentStatus: SessionStatus = 'initial';
  private tornDown = false;

  constructor(options: SessionOptions) {
    this.tokenStore = options.tokenStore;
    this.authRequired = options.authRequired ?? env.AUTH_REQUIRED;
    this.logger = options.logger ?? createLogger('Session');
  }

  get status(): SessionStatus {
    return this.currentStatus;
  }

  get isAuthenticated(): boolean {
    return this.currentStatus === 'authenticated';
  }

  async init(): Promise<SessionStatus> {
    const stored = await this.tokenStore.read();
    if (this.tornDown) return this.currentStatus;

    this.token = stored || null;
    this.transition(this.token ? 'authenticated' : 'unauthenticated');
    return this.currentStatus;
  }

  async login(token: string): Promise<void> {
    if (!token) {
      throw new Error('Cannot log in with an empty token');
    }

    await this.tokenStore.write(token);
    if (this.tornDown) return;

    this.token = token;
    this.transition('authenticated');
  }

  async logout(): Promise<void> {
    await this.tokenStore.delete();
    if (this.tornDown) return;

    this.token = null;
    this.transition('unauthenticated');
  }

  /** Called by the transport on a 401. The stored token is left for the host to replace. */
  markExpired(): void {
    if (this.tornDown || this.currentStatus !== 'authenticated') return;

    this.token = null;
    this.logger.warn('Session expired');
    this.transition('expired');
  }

  async getAuthToken(): Promise<ApiResult<string>> {
    if (this.tornDown) {
      return fail(genericFailure('Session has been torn down'));
    }

    if (this.token) {
      return ok(this.token);
    }

    if (!this.authRequired) {
      return ok('');
    }

    if (this.currentStatus === 'expired') {
      return fail(httpFailure(401, 'Session expired, please login again', 'SESSION_EXPIRED'));
    }

    return fail(httpFailure(401, 'Authentication failed', 'AUTH_REQUIRED'));
  }

  teardown(): void {
    if (this.tornDown) return;

    this.tornDown = true;
    this.token = null;
    this.events.removeAllListeners();
  }

  private transition(status: SessionStatus) {
    const previous = this.currentStatus;
    if (previous === status) return;

    this.currentStatus = status;
    this.logger.debug(`Session ${previous} -> ${status}`);
    this.events.emit('session:changed', { status, previous });
  }
}
