import { env, type Env } from './config/env';
import type { FetchLike } from './lib/http/fetchSafe';
import { RestClient } from './lib/http/restClient';
import { HttpJobDirectoryClient, type JobDirectoryClient } from './lib/jobs/directoryClient';
import { JobPoller } from './lib/jobs/poller';
import { JobActionTracker } from './lib/jobs/tracker';
import { createLogger } from './lib/log';
import { SessionContext, type SessionStatus } from './lib/session/session';
import type { TokenStore } from './lib/session/tokenStore';
import { UploadOrchestrator } from './lib/uploads/orchestrator';
import { HttpUploadTransportClient, type UploadTransportClient } from './lib/uploads/transportClient';

export { env, loadEnv, type Env, type LogLevel } from './config/env';
export * from './lib/errors/failure';
export { classifyException, classifyResponse, guard, parseWith } from './lib/errors/classify';
export { createLogger, type Logger } from './lib/log';
export { TypedEventEmitter } from './lib/events';
export { fetchSafe, fetchSafeText, type FetchedText, type FetchLike, type FetchSafeOptions } from './lib/http/fetchSafe';
export { RestClient, type AuthTokenSource, type RestClientOptions } from './lib/http/restClient';
export * from './lib/session/tokenStore';
export * from './lib/session/session';
export * from './lib/jobs/model';
export * from './lib/jobs/metadata';
export * from './lib/jobs/directoryClient';
export * from './lib/jobs/inFlight';
export * from './lib/jobs/search';
export * from './lib/jobs/tracker';
export * from './lib/jobs/poller';
export * from './lib/uploads/contentType';
export * from './lib/uploads/transportClient';
export * from './lib/uploads/orchestrator';

export interface VideoJobsClientOptions {
  tokenStore: TokenStore;
  fetchImpl?: FetchLike;
  config?: Partial<Env>;
}

export interface VideoJobsClient {
  readonly session: SessionContext;
  readonly directory: JobDirectoryClient;
  readonly transport: UploadTransportClient;
  start(): Promise<SessionStatus>;
  createUploadOrchestrator(): UploadOrchestrator;
  createJobActionTracker(): JobActionTracker;
  createJobPoller(jobId: string): JobPoller;
  stop(): void;
}

/**
 * Wires session, transport and the core components together. Everything
 * created through the returned client and not yet disposed is disposed by
 * `stop()`.
 */
export function createVideoJobsClient({ tokenStore, fetchImpl, config = {} }: VideoJobsClientOptions): VideoJobsClient {
  const settings: Env = { ...env, ...config };
  const logger = createLogger('VideoJobsClient', settings.LOG_LEVEL);

  const session = new SessionContext({
    tokenStore,
    authRequired: settings.AUTH_REQUIRED,
    logger: createLogger('Session', settings.LOG_LEVEL),
  });
  const rest = new RestClient({
    baseUrl: settings.API_BASE_URL,
    auth: session,
    fetchImpl,
    timeoutMs: settings.REQUEST_TIMEOUT_MS,
    readRetries: settings.READ_RETRIES,
    retryDelayMs: settings.RETRY_DELAY_MS,
    logger: createLogger('RestClient', settings.LOG_LEVEL),
  });
  const directory = new HttpJobDirectoryClient(rest);
  const transport = new HttpUploadTransportClient(rest, {
    fetchImpl,
    uploadTimeoutMs: settings.UPLOAD_TIMEOUT_MS,
    logger: createLogger('UploadTransport', settings.LOG_LEVEL),
  });

  const components = new Set<{ dispose(): void }>();
  let stopped = false;

  const ensureRunning = () => {
    if (stopped) {
      throw new Error('Video jobs client has been stopped');
    }
  };

  return {
    session,
    directory,
    transport,

    async start() {
      ensureRunning();
      const status = await session.init();
      logger.info(`Client started against ${settings.API_BASE_URL} (session ${status})`);
      return status;
    },

    createUploadOrchestrator() {
      ensureRunning();
      const orchestrator: UploadOrchestrator = new UploadOrchestrator(transport, directory, {
        logger: createLogger('UploadOrchestrator', settings.LOG_LEVEL),
        onDispose: () => components.delete(orchestrator),
      });
      components.add(orchestrator);
      return orchestrator;
    },

    createJobActionTracker() {
      ensureRunning();
      const tracker: JobActionTracker = new JobActionTracker(directory, {
        pageLimit: settings.JOBS_PAGE_LIMIT,
        refreshLimit: settings.JOBS_REFRESH_LIMIT,
        logger: createLogger('JobActionTracker', settings.LOG_LEVEL),
        onDispose: () => components.delete(tracker),
      });
      components.add(tracker);
      return tracker;
    },

    createJobPoller(jobId) {
      ensureRunning();
      const poller: JobPoller = new JobPoller(directory, jobId, {
        intervalMs: settings.JOB_POLL_INTERVAL_MS,
        maxBackoffMs: settings.JOB_POLL_MAX_BACKOFF_MS,
        logger: createLogger('JobPoller', settings.LOG_LEVEL),
        onDispose: () => components.delete(poller),
      });
      components.add(poller);
      return poller;
    },

    stop() {
      if (stopped) return;
      stopped = true;

      for (const component of [...components]) {
        component.dispose();
      }
      components.clear();
      session.teardown();
      logger.info('Client stopped');
    },
  };
}
