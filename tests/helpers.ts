import { Response } from 'undici';
import { vi } from 'vitest';
import { fail, genericFailure, ok, type ApiResult } from '../src/lib/errors/failure';
import type { FetchLike } from '../src/lib/http/fetchSafe';
import type { JobDirectoryClient } from '../src/lib/jobs/directoryClient';
import type { Job } from '../src/lib/jobs/model';
import type { UploadTransportClient } from '../src/lib/uploads/transportClient';

export const baseEnv = {
  API_BASE_URL: 'https://api.test',
  NODE_ENV: 'test',
  AUTH_REQUIRED: 'true',
  REQUEST_TIMEOUT_MS: '15000',
  UPLOAD_TIMEOUT_MS: '120000',
  READ_RETRIES: '2',
  RETRY_DELAY_MS: '300',
  JOBS_PAGE_LIMIT: '20',
  JOBS_REFRESH_LIMIT: '300',
  JOB_POLL_INTERVAL_MS: '2000',
  JOB_POLL_MAX_BACKOFF_MS: '30000',
  LOG_LEVEL: 'silent',
} as const;

type EnvOverrides = Partial<Record<keyof typeof baseEnv, string | undefined>>;

export async function loadModule<T>(path: string, overrides: EnvOverrides = {}): Promise<T> {
  vi.resetModules();
  const nextEnv: NodeJS.ProcessEnv = { ...baseEnv };

  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value === 'undefined') {
      delete nextEnv[key];
    } else {
      nextEnv[key] = value;
    }
  }

  process.env = nextEnv;
  const module: T = await import(path);
  return module;
}

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    jobId: 'job-1',
    status: 'queued',
    progressPct: 0,
    isFlagged: false,
    flagNote: null,
    pauseRequested: false,
    source: 'file',
    sourceUrl: null,
    filename: 'clip.mp4',
    filePath: null,
    title: null,
    description: null,
    errorMessage: null,
    createdAt: '2024-05-01T10:00:00.000Z',
    ...overrides,
  };
}

export function jobDto(overrides: Record<string, unknown> = {}) {
  return {
    job_id: 'job-1',
    status: 'queued',
    progress_pct: 0,
    is_flagged: false,
    flag_note: null,
    pause_requested: false,
    source: 'upload',
    source_url: null,
    filename: 'clip.mp4',
    file_path: null,
    title: null,
    description: null,
    error_message: null,
    created_at: '2024-05-01T10:00:00.000Z',
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function textResponse(body: string | null, status: number): Response {
  return new Response(body, { status });
}

/** Fetch stub that answers each call with the next queued response. */
export function stubFetch(...responses: Array<Response | Error>) {
  const queue = [...responses];

  return vi.fn<FetchLike>(async () => {
    const next = queue.shift();
    if (!next) {
      throw new Error('Unexpected fetch call');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export function flushPromises(): Promise<void> {
  return new Promise((done) => setImmediate(done));
}

const notStubbed = async (): Promise<ApiResult<never>> => fail(genericFailure('not stubbed'));

export function fakeDirectory() {
  return {
    list: vi.fn<JobDirectoryClient['list']>(async () => ok([])),
    get: vi.fn<JobDirectoryClient['get']>(notStubbed),
    delete: vi.fn<JobDirectoryClient['delete']>(async () => ok(undefined)),
    updateFlag: vi.fn<JobDirectoryClient['updateFlag']>(notStubbed),
    pause: vi.fn<JobDirectoryClient['pause']>(notStubbed),
    resume: vi.fn<JobDirectoryClient['resume']>(notStubbed),
    cancel: vi.fn<JobDirectoryClient['cancel']>(notStubbed),
    createFromUrl: vi.fn<JobDirectoryClient['createFromUrl']>(notStubbed),
  } satisfies JobDirectoryClient;
}

export function fakeTransport() {
  return {
    requestPresign: vi.fn<UploadTransportClient['requestPresign']>(notStubbed),
    transfer: vi.fn<UploadTransportClient['transfer']>(async () => ok(undefined)),
    finalize: vi.fn<UploadTransportClient['finalize']>(notStubbed),
  } satisfies UploadTransportClient;
}
