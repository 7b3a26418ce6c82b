import { createStore, type StoreApi } from 'zustand/vanilla';
import { env } from '../../config/env';
import { guard } from '../errors/classify';
import type { Failure } from '../errors/failure';
import { createLogger, type Logger } from '../log';
import type { JobDirectoryClient } from './directoryClient';
import { isTerminal, type Job } from './model';

export type JobPollStatus = 'idle' | 'loading' | 'polling' | 'stopped' | 'error';

export interface JobPollState {
  status: JobPollStatus;
  job: Job | null;
  consecutiveErrors: number;
  /** Set once polling has failed `warnAfterErrors` times in a row. */
  pollError: string | null;
  loadError: Failure | null;
}

export type PollOutcome = 'applied' | 'failed' | 'discarded';

export interface JobPollerOptions {
  intervalMs?: number;
  maxBackoffMs?: number;
  maxJitterMs?: number;
  warnAfterErrors?: number;
  random?: () => number;
  logger?: Logger;
  onDispose?: () => void;
}

const DEFAULT_MAX_JITTER_MS = 500;
const DEFAULT_WARN_AFTER_ERRORS = 5;

const initialState: JobPollState = {
  status: 'idle',
  job: null,
  consecutiveErrors: 0,
  pollError: null,
  loadError: null,
};

/**
 * Follows one job until it reaches a terminal status.
 *
 * Reads are chained, never overlapping: the next one is scheduled only after
 * the previous one settles. Consecutive failures back off exponentially from
 * the base interval up to `maxBackoffMs`, plus jitter; one success resets it.
 */
export class JobPoller {
  private readonly store: StoreApi<JobPollState>;
  private readonly intervalMs: number;
  private readonly maxBackoffMs: number;
  private readonly maxJitterMs: number;
  private readonly warnAfterErrors: number;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly onDispose: (() => void) | undefined;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private generation = 0;
  private disposed = false;

  constructor(
    private readonly directory: JobDirectoryClient,
    readonly jobId: string,
    options: JobPollerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? env.JOB_POLL_INTERVAL_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? env.JOB_POLL_MAX_BACKOFF_MS;
    this.maxJitterMs = options.maxJitterMs ?? DEFAULT_MAX_JITTER_MS;
    this.warnAfterErrors = options.warnAfterErrors ?? DEFAULT_WARN_AFTER_ERRORS;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger('JobPoller');
    this.onDispose = options.onDispose;
    this.store = createStore<JobPollState>()(() => initialState);
  }

  getState(): JobPollState {
    return this.store.getState();
  }

  subscribe(listener: (state: JobPollState, previous: JobPollState) => void): () => void {
    return this.store.subscribe(listener);
  }

  /** Loads the job and polls it while it is active. Restarts from scratch if already polling. */
  async start(): Promise<PollOutcome> {
    if (this.disposed) return 'discarded';

    this.clearTimer();
    const generation = ++this.generation;
    this.store.setState({ status: 'loading', consecutiveErrors: 0, pollError: null, loadError: null });

    const result = await guard(() => this.directory.get(this.jobId));
    if (this.disposed || generation !== this.generation) return 'discarded';

    if (!result.success) {
      this.logger.warn(`Loading job ${this.jobId} failed: ${result.error.message}`);
      this.store.setState({ status: 'error', loadError: result.error });
      return 'failed';
    }

    this.follow(result.data, generation);
    return 'applied';
  }

  stop(): void {
    if (this.disposed) return;

    this.clearTimer();
    this.generation++;
    if (this.store.getState().status !== 'idle') {
      this.store.setState({ status: 'stopped' });
    }
  }

  dispose(): void {
    if (this.disposed) return;

    this.disposed = true;
    this.clearTimer();
    this.onDispose?.();
  }

  /** Delay before the next read after `errors` consecutive failures. */
  backoffDelay(errors: number): number {
    const backoff = Math.min(this.maxBackoffMs, this.intervalMs * Math.pow(2, errors));
    return backoff + Math.floor(this.random() * this.maxJitterMs);
  }

  private follow(job: Job, generation: number) {
    if (isTerminal(job)) {
      this.logger.info(`Job ${this.jobId} is ${job.status}; polling stopped`);
      this.store.setState({ status: 'stopped', job, consecutiveErrors: 0, pollError: null });
      return;
    }

    this.store.setState({ status: 'polling', job, consecutiveErrors: 0, pollError: null });
    this.schedule(this.intervalMs, generation);
  }

  private schedule(delayMs: number, generation: number) {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.poll(generation).catch((error: unknown) => {
        this.logger.error(`Polling job ${this.jobId} crashed`, error);
      });
    }, delayMs);
  }

  private async poll(generation: number) {
    const result = await guard(() => this.directory.get(this.jobId));
    if (this.disposed || generation !== this.generation) return;

    if (result.success) {
      this.follow(result.data, generation);
      return;
    }

    const consecutiveErrors = this.store.getState().consecutiveErrors + 1;
    const delayMs = this.backoffDelay(consecutiveErrors);
    this.logger.debug(`Poll error #${consecutiveErrors} for job ${this.jobId}, next read in ${delayMs}ms`);

    this.store.setState({
      consecutiveErrors,
      pollError:
        consecutiveErrors >= this.warnAfterErrors
          ? `Connection issues - retrying every ${Math.floor(delayMs / 1000)}s`
          : null,
    });
    this.schedule(delayMs, generation);
  }

  private clearTimer() {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
