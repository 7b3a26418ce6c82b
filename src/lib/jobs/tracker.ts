import { createStore, type StoreApi } from 'zustand/vanilla';
import { env } from '../../config/env';
import { guard } from '../errors/classify';
import { isHttpStatus, type ApiResult, type Failure } from '../errors/failure';
import { createLogger, type Logger } from '../log';
import type { JobDirectoryClient } from './directoryClient';
import { beginAction, emptyInFlight, endAction, retainListed, type InFlightActions } from './inFlight';
import type { Job, JobActionKind, JobStatus } from './model';
import { filterJobs } from './search';

export type JobListStatus = 'idle' | 'loading' | 'refreshing' | 'loaded' | 'error';

export interface JobListState {
  status: JobListStatus;
  jobs: readonly Job[];
  filteredJobs: readonly Job[];
  searchQuery: string;
  statusFilter: JobStatus | null;
  inFlightActions: InFlightActions;
  actionError: string | null;
  actionSuccess: string | null;
  loadError: Failure | null;
}

/**
 * - `applied`: the server result was written to the list
 * - `failed`: the call failed and `actionError` was set
 * - `rejected`: the job already had an action outstanding; nothing was sent
 * - `discarded`: the result arrived after disposal or was superseded
 */
export type ActionOutcome = 'applied' | 'failed' | 'rejected' | 'discarded';
export type LoadOutcome = Exclude<ActionOutcome, 'rejected'>;

export interface LoadOptions {
  limit?: number;
  statusFilter?: JobStatus | null;
  searchQuery?: string;
}

export interface JobActionTrackerOptions {
  pageLimit?: number;
  refreshLimit?: number;
  logger?: Logger;
  onDispose?: () => void;
}

export interface Notifications {
  actionError: string | null;
  actionSuccess: string | null;
}

const CONFLICT_MESSAGES: Record<JobActionKind, string> = {
  delete: 'Cannot delete while job is processing or flagged',
  flag: 'Cannot flag this job right now',
  pause: 'Cannot change state in the current job status',
  resume: 'Cannot change state in the current job status',
  cancel: 'Cannot cancel a job in this status',
};

const initialState: JobListState = {
  status: 'idle',
  jobs: [],
  filteredJobs: [],
  searchQuery: '',
  statusFilter: null,
  inFlightActions: emptyInFlight,
  actionError: null,
  actionSuccess: null,
  loadError: null,
};

function withoutJob(state: JobListState, jobId: string): Partial<JobListState> {
  const jobs = state.jobs.filter((job) => job.jobId !== jobId);
  return { jobs, filteredJobs: filterJobs(jobs, state.searchQuery) };
}

function withJob(state: JobListState, updated: Job): Partial<JobListState> {
  const jobs = state.jobs.map((job) => (job.jobId === updated.jobId ? updated : job));
  return { jobs, filteredJobs: filterJobs(jobs, state.searchQuery) };
}

/**
 * Materialized job list plus the per-job in-flight action map.
 *
 * Each job may have at most one command outstanding. Results are applied to
 * whatever the list looks like when they arrive, so commands for different
 * jobs can overlap freely. Every in-flight entry carries a private ticket and a
 * completion only clears the entry it created.
 */
export class JobActionTracker {
  private readonly store: StoreApi<JobListState>;
  private readonly tickets = new Map<string, number>();
  private readonly pageLimit: number;
  private readonly refreshLimit: number;
  private readonly logger: Logger;
  private readonly onDispose: (() => void) | undefined;
  private nextTicket = 1;
  private loadSequence = 0;
  private limit: number;
  private disposed = false;

  constructor(
    private readonly directory: JobDirectoryClient,
    options: JobActionTrackerOptions = {}
  ) {
    this.pageLimit = options.pageLimit ?? env.JOBS_PAGE_LIMIT;
    this.refreshLimit = options.refreshLimit ?? env.JOBS_REFRESH_LIMIT;
    this.logger = options.logger ?? createLogger('JobActionTracker');
    this.onDispose = options.onDispose;
    this.limit = this.pageLimit;
    this.store = createStore<JobListState>()(() => initialState);
  }

  getState(): JobListState {
    return this.store.getState();
  }

  subscribe(listener: (state: JobListState, previous: JobListState) => void): () => void {
    return this.store.subscribe(listener);
  }

  isBusy(jobId: string): boolean {
    return this.store.getState().inFlightActions.has(jobId);
  }

  /** Replaces the list wholesale. Only the most recently issued read is applied. */
  async load(options: LoadOptions = {}): Promise<LoadOutcome> {
    if (this.disposed) return 'discarded';

    const current = this.store.getState();
    const limit = options.limit ?? this.pageLimit;
    const statusFilter = options.statusFilter === undefined ? current.statusFilter : options.statusFilter;
    const searchQuery = options.searchQuery ?? current.searchQuery;
    const sequence = ++this.loadSequence;

    this.limit = limit;
    this.store.setState((state) => ({
      status: state.jobs.length > 0 ? 'refreshing' : 'loading',
      statusFilter,
      searchQuery,
      filteredJobs: filterJobs(state.jobs, searchQuery),
      loadError: null,
    }));

    const result = await guard(() => this.directory.list(limit, statusFilter ?? undefined));

    if (this.disposed || sequence !== this.loadSequence) {
      return 'discarded';
    }

    if (!result.success) {
      this.logger.warn(`Job list read failed: ${result.error.message}`);
      this.store.setState({ status: 'error', loadError: result.error });
      return 'failed';
    }

    const listed = new Set(result.data.map((job) => job.jobId));
    for (const jobId of [...this.tickets.keys()]) {
      if (!listed.has(jobId)) {
        this.logger.debug(`Dropping stale in-flight action for job ${jobId}`);
        this.tickets.delete(jobId);
      }
    }

    this.store.setState((state) => ({
      status: 'loaded',
      jobs: result.data,
      filteredJobs: filterJobs(result.data, state.searchQuery),
      inFlightActions: retainListed(state.inFlightActions, listed),
      loadError: null,
    }));
    return 'applied';
  }

  refresh(): Promise<LoadOutcome> {
    return this.load({ limit: this.refreshLimit });
  }

  setStatusFilter(statusFilter: JobStatus | null): Promise<LoadOutcome> {
    return this.load({ statusFilter, limit: this.limit });
  }

  setSearchQuery(searchQuery: string): void {
    if (this.disposed) return;

    this.store.setState((state) => ({
      searchQuery,
      filteredJobs: filterJobs(state.jobs, searchQuery),
    }));
  }

  deleteJob(jobId: string): Promise<ActionOutcome> {
    return this.run(jobId, 'delete', () => this.directory.delete(jobId), (state) => withoutJob(state, jobId), 'Job deleted');
  }

  setFlag(jobId: string, isFlagged: boolean, note?: string): Promise<ActionOutcome> {
    return this.run(
      jobId,
      'flag',
      () => this.directory.updateFlag(jobId, isFlagged, note),
      withJob,
      isFlagged ? 'Job flagged' : 'Job unflagged'
    );
  }

  pause(jobId: string): Promise<ActionOutcome> {
    return this.run(jobId, 'pause', () => this.directory.pause(jobId), withJob, 'Pause requested');
  }

  resume(jobId: string): Promise<ActionOutcome> {
    return this.run(jobId, 'resume', () => this.directory.resume(jobId), withJob, 'Job resumed');
  }

  cancel(jobId: string): Promise<ActionOutcome> {
    return this.run(jobId, 'cancel', () => this.directory.cancel(jobId), withJob, 'Job cancelled');
  }

  /** Returns the one-shot action notifications and clears them. */
  consumeNotifications(): Notifications {
    const { actionError, actionSuccess } = this.store.getState();

    if (!this.disposed && (actionError !== null || actionSuccess !== null)) {
      this.store.setState({ actionError: null, actionSuccess: null });
    }

    return { actionError, actionSuccess };
  }

  dispose(): void {
    if (this.disposed) return;

    this.disposed = true;
    this.tickets.clear();
    this.onDispose?.();
  }

  private async run<T>(
    jobId: string,
    kind: JobActionKind,
    call: () => Promise<ApiResult<T>>,
    apply: (state: JobListState, data: T) => Partial<JobListState>,
    successMessage: string
  ): Promise<ActionOutcome> {
    if (this.disposed) return 'discarded';

    const inFlightActions = beginAction(this.store.getState().inFlightActions, jobId, kind);
    if (!inFlightActions) {
      this.logger.debug(`Rejected ${kind} for job ${jobId}: another action is in flight`);
      return 'rejected';
    }

    const ticket = this.nextTicket++;
    this.tickets.set(jobId, ticket);
    this.store.setState({ inFlightActions, actionError: null, actionSuccess: null });

    const result = await guard(call);

    if (this.disposed || this.tickets.get(jobId) !== ticket) {
      return 'discarded';
    }
    this.tickets.delete(jobId);

    if (!result.success) {
      const message = isHttpStatus(result.error, 409) ? CONFLICT_MESSAGES[kind] : result.error.message;
      this.logger.info(`${kind} failed for job ${jobId}: ${result.error.message}`);
      this.store.setState((state) => ({
        inFlightActions: endAction(state.inFlightActions, jobId),
        actionError: message,
      }));
      return 'failed';
    }

    this.store.setState((state) => ({
      ...apply(state, result.data),
      inFlightActions: endAction(state.inFlightActions, jobId),
      actionSuccess: successMessage,
    }));
    return 'applied';
  }
}
