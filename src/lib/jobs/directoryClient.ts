import { parseWith } from '../errors/classify';
import { ok, type ApiResult } from '../errors/failure';
import type { RestClient } from '../http/restClient';
import { toMetadataDto, type UrlJobMetadata } from './metadata';
import { jobListSchema, jobResponseSchema, type Job, type JobStatus } from './model';

/** Remote job store. Every call resolves to a result and never throws. */
export interface JobDirectoryClient {
  list(limit: number, statusFilter?: JobStatus): Promise<ApiResult<Job[]>>;
  get(jobId: string): Promise<ApiResult<Job>>;
  delete(jobId: string): Promise<ApiResult<void>>;
  updateFlag(jobId: string, isFlagged: boolean, note?: string): Promise<ApiResult<Job>>;
  pause(jobId: string): Promise<ApiResult<Job>>;
  resume(jobId: string): Promise<ApiResult<Job>>;
  cancel(jobId: string): Promise<ApiResult<Job>>;
  createFromUrl(url: string, metadata: UrlJobMetadata): Promise<ApiResult<Job>>;
}

const jobPath = (jobId: string) => `/jobs/${encodeURIComponent(jobId)}`;

export class HttpJobDirectoryClient implements JobDirectoryClient {
  constructor(private readonly rest: RestClient) {}

  async list(limit: number, statusFilter?: JobStatus): Promise<ApiResult<Job[]>> {
    const result = await this.rest.get('/jobs', { limit, status: statusFilter });
    if (!result.success) return result;

    // the service answers an empty collection with `null` or an empty body
    if (result.data === null) {
      return ok([]);
    }

    return parseWith(jobListSchema, result.data);
  }

  get(jobId: string) {
    return this.readJob(this.rest.get(jobPath(jobId)));
  }

  async delete(jobId: string): Promise<ApiResult<void>> {
    const result = await this.rest.delete(jobPath(jobId));
    if (!result.success) return result;

    return ok(undefined);
  }

  updateFlag(jobId: string, isFlagged: boolean, note?: string) {
    const body = note === undefined ? { is_flagged: isFlagged } : { is_flagged: isFlagged, flag_note: note };
    return this.readJob(this.rest.patch(`${jobPath(jobId)}/flag`, body));
  }

  pause(jobId: string) {
    return this.readJob(this.rest.post(`${jobPath(jobId)}/pause`));
  }

  resume(jobId: string) {
    return this.readJob(this.rest.post(`${jobPath(jobId)}/resume`));
  }

  cancel(jobId: string) {
    return this.readJob(this.rest.post(`${jobPath(jobId)}/cancel`));
  }

  createFromUrl(url: string, metadata: UrlJobMetadata) {
    const body: Record<string, string | number | boolean> = {
      source: 'url',
      source_url: url,
      ...toMetadataDto(metadata),
    };

    if (metadata.isLive) {
      body.is_live = true;
      if (metadata.captureSeconds !== undefined) {
        body.capture_seconds = metadata.captureSeconds;
      }
    }

    return this.readJob(this.rest.post('/jobs', body));
  }

  private async readJob(pending: Promise<ApiResult<unknown>>): Promise<ApiResult<Job>> {
    const result = await pending;
    if (!result.success) return result;

    return parseWith(jobResponseSchema, result.data);
  }
}
