import { z } from 'zod';
import { env } from '../../config/env';
import { classifyException, guard, parseWith } from '../errors/classify';
import { fail, httpFailure, networkFailure, ok, type ApiResult } from '../errors/failure';
import { fetchSafeText, type FetchLike } from '../http/fetchSafe';
import { withoutHostHeader } from '../http/httpUtils';
import type { RestClient } from '../http/restClient';
import { createLogger, type Logger } from '../log';
import { toMetadataDto, type JobMetadata } from '../jobs/metadata';
import { jobResponseSchema, type Job } from '../jobs/model';

export interface PresignedUpload {
  uploadId: string;
  url: string;
  headers: Record<string, string>;
  contentLength: number;
  key: string;
  expiresAt: string;
}

export type TransferProgress = (bytesSent: number, totalBytes: number) => void;

/** Presigned upload protocol: presign, direct transfer, then finalize. */
export interface UploadTransportClient {
  requestPresign(
    filename: string,
    contentType: string,
    byteLength: number,
    metadata: JobMetadata
  ): Promise<ApiResult<PresignedUpload>>;
  transfer(upload: PresignedUpload, bytes: Uint8Array, onProgress?: TransferProgress): Promise<ApiResult<void>>;
  finalize(uploadId: string): Promise<ApiResult<Job>>;
}

const presignResponseSchema = z.object({
  upload_id: z.string().min(1),
  key: z.string(),
  url: z.string().url(),
  headers: z.record(z.union([z.string(), z.number(), z.boolean()])).nullish(),
  expires_at: z.string(),
});

const completeResponseSchema = z.object({
  job_id: z.string().min(1),
  key: z.string().nullish(),
});

export interface HttpUploadTransportOptions {
  fetchImpl?: FetchLike;
  uploadTimeoutMs?: number;
  logger?: Logger;
}

/** The completion response only names the job; enough to stand in when the follow-up read fails. */
function minimalUploadedJob(jobId: string, key: string | null | undefined): Job {
  const filename = key ? key.split('/').pop() || null : null;

  return {
    jobId,
    status: 'queued',
    progressPct: 0,
    isFlagged: false,
    flagNote: null,
    pauseRequested: false,
    source: 'file',
    sourceUrl: null,
    filename,
    filePath: null,
    title: null,
    description: null,
    errorMessage: null,
    createdAt: new Date().toISOString(),
  };
}

export class HttpUploadTransportClient implements UploadTransportClient {
  private readonly fetchImpl: FetchLike | undefined;
  private readonly uploadTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly rest: RestClient,
    options: HttpUploadTransportOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl;
    this.uploadTimeoutMs = options.uploadTimeoutMs ?? env.UPLOAD_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('UploadTransport');
  }

  async requestPresign(
    filename: string,
    contentType: string,
    byteLength: number,
    metadata: JobMetadata
  ): Promise<ApiResult<PresignedUpload>> {
    this.logger.info(`Requesting presigned upload for ${filename} (${byteLength} bytes)`);

    const result = await this.rest.post('/uploads/presign', {
      filename,
      content_type: contentType,
      bytes: byteLength,
      ...toMetadataDto(metadata),
    });
    if (!result.success) return result;

    const parsed = parseWith(presignResponseSchema, result.data);
    if (!parsed.success) return parsed;

    const { upload_id, key, url, headers, expires_at } = parsed.data;
    this.logger.info(`Presigned upload ${upload_id} issued`);

    return ok({
      uploadId: upload_id,
      url,
      headers: Object.fromEntries(Object.entries(headers ?? {}).map(([name, value]) => [name, String(value)])),
      contentLength: byteLength,
      key,
      expiresAt: expires_at,
    });
  }

  async transfer(upload: PresignedUpload, bytes: Uint8Array, onProgress?: TransferProgress): Promise<ApiResult<void>> {
    const total = bytes.byteLength;
    this.logger.info(`Uploading ${total} bytes for upload ${upload.uploadId}`);
    onProgress?.(0, total);

    try {
      // the body is drained inside the deadline so the connection can be reused
      const { response } = await fetchSafeText(upload.url, {
        method: 'PUT',
        headers: withoutHostHeader(upload.headers),
        body: bytes,
        timeoutMs: this.uploadTimeoutMs,
        fetchImpl: this.fetchImpl,
      });

      if (!response.ok) {
        this.logger.warn(`Blob store rejected upload ${upload.uploadId} with ${response.status}`);
        return fail(httpFailure(response.status, `Blob store upload failed: ${response.status}`));
      }
    } catch (error) {
      const failure = classifyException(error);
      this.logger.warn(`Blob store upload ${upload.uploadId} failed: ${failure.message}`);
      return fail(networkFailure(`Blob store upload failed: ${failure.message}`));
    }

    onProgress?.(total, total);
    this.logger.info(`Upload ${upload.uploadId} transferred`);
    return ok(undefined);
  }

  finalize(uploadId: string): Promise<ApiResult<Job>> {
    return guard<Job>(async () => {
      this.logger.info(`Completing upload ${uploadId}`);

      const result = await this.rest.post('/uploads/complete', { upload_id: uploadId });
      if (!result.success) return result;

      const completed = parseWith(completeResponseSchema, result.data);
      if (!completed.success) return completed;

      const { job_id: jobId, key } = completed.data;
      this.logger.info(`Upload ${uploadId} created job ${jobId}`);

      const read = await this.rest.get(`/jobs/${encodeURIComponent(jobId)}`);
      const job = read.success ? parseWith(jobResponseSchema, read.data) : read;
      if (job.success) return job;

      this.logger.warn(`Could not read job ${jobId} after upload: ${job.error.message}`);
      return ok(minimalUploadedJob(jobId, key));
    });
  }
}
