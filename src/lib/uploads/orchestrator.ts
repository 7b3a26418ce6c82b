import { z } from 'zod';
import { createStore, type StoreApi } from 'zustand/vanilla';
import { guard } from '../errors/classify';
import { genericFailure, validationFailure, validationFailureFromZod, type Failure } from '../errors/failure';
import type { JobDirectoryClient } from '../jobs/directoryClient';
import { jobMetadataSchema, urlJobMetadataSchema, type JobMetadata, type UrlJobMetadata } from '../jobs/metadata';
import type { Job } from '../jobs/model';
import { createLogger, type Logger } from '../log';
import { resolveContentType } from './contentType';
import type { UploadTransportClient } from './transportClient';

export type UploadState =
  | { status: 'idle' }
  | { status: 'submittingUrl'; url: string }
  | { status: 'requestingPresign'; filename: string; totalBytes: number }
  | { status: 'uploadingToBlobStore'; uploadId: string; bytesUploaded: number; totalBytes: number }
  | { status: 'finalizing'; uploadId: string; bytesUploaded: number; totalBytes: number }
  | { status: 'succeeded'; job: Job }
  | { status: 'failed'; failure: Failure; canRetry: boolean; uploadId: string | null };

export type UploadStatus = UploadState['status'];

export type UploadOutcome =
  | { success: true; data: Job }
  | { success: false; error: Failure; canRetry: boolean; uploadId: string | null };

export interface UploadOrchestratorOptions {
  logger?: Logger;
  onDispose?: () => void;
}

export interface FileSubmission {
  bytes: Uint8Array | null | undefined;
  filename: string;
  metadata?: JobMetadata;
}

const ACTIVE_STATUSES: ReadonlySet<UploadStatus> = new Set<UploadStatus>([
  'submittingUrl',
  'requestingPresign',
  'uploadingToBlobStore',
  'finalizing',
]);

const sourceUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value));

export function isUploadActive(state: UploadState): boolean {
  return ACTIVE_STATUSES.has(state.status);
}

export function describeUploadState(state: UploadState): string {
  switch (state.status) {
    case 'idle':
      return 'Ready';
    case 'submittingUrl':
      return 'Submitting URL...';
    case 'requestingPresign':
      return 'Preparing upload...';
    case 'uploadingToBlobStore': {
      const pct = state.totalBytes > 0 ? Math.round((state.bytesUploaded / state.totalBytes) * 100) : 0;
      return `Uploading... ${pct}%`;
    }
    case 'finalizing':
      return 'Creating job...';
    case 'succeeded':
      return 'Job created';
    case 'failed':
      return state.failure.message;
  }
}

/**
 * Drives one submission at a time through presign, transfer and finalize.
 *
 * Failure before a presigned upload exists can be retried from scratch. Once
 * the bytes are in the blob store a finalize failure is terminal for the
 * attempt and reports the `uploadId` so it can be followed up by hand.
 */
export class UploadOrchestrator {
  private readonly store: StoreApi<UploadState>;
  private readonly logger: Logger;
  private readonly onDispose: (() => void) | undefined;
  private disposed = false;

  constructor(
    private readonly transport: UploadTransportClient,
    private readonly directory: JobDirectoryClient,
    options: UploadOrchestratorOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('UploadOrchestrator');
    this.onDispose = options.onDispose;
    this.store = createStore<UploadState>()(() => ({ status: 'idle' }));
  }

  getState(): UploadState {
    return this.store.getState();
  }

  subscribe(listener: (state: UploadState, previous: UploadState) => void): () => void {
    return this.store.subscribe(listener);
  }

  async submitFile({ bytes, filename, metadata = {} }: FileSubmission): Promise<UploadOutcome> {
    const busy = this.rejectIfBusy();
    if (busy) return busy;

    if (!bytes || bytes.byteLength === 0) {
      return this.fail(validationFailure('No file data provided'), true, null);
    }

    const parsedMetadata = jobMetadataSchema.safeParse(metadata);
    if (!parsedMetadata.success) {
      return this.fail(validationFailureFromZod('Invalid job metadata', parsedMetadata.error), true, null);
    }

    const contentType = resolveContentType(filename);
    if (!contentType) {
      return this.fail(validationFailure(`Unsupported file type: ${filename}`), true, null);
    }

    const totalBytes = bytes.byteLength;
    this.transition({ status: 'requestingPresign', filename, totalBytes });

    const presigned = await guard(() =>
      this.transport.requestPresign(filename, contentType, totalBytes, parsedMetadata.data)
    );
    if (this.disposed) return this.discarded(null);
    if (!presigned.success) {
      return this.fail(presigned.error, true, null);
    }

    const upload = presigned.data;
    this.transition({ status: 'uploadingToBlobStore', uploadId: upload.uploadId, bytesUploaded: 0, totalBytes });

    const transferred = await guard(() =>
      this.transport.transfer(upload, bytes, (bytesSent) => this.reportProgress(upload.uploadId, bytesSent))
    );
    if (this.disposed) return this.discarded(upload.uploadId);
    if (!transferred.success) {
      return this.fail(transferred.error, true, upload.uploadId);
    }

    this.transition({ status: 'finalizing', uploadId: upload.uploadId, bytesUploaded: totalBytes, totalBytes });

    const finalized = await guard(() => this.transport.finalize(upload.uploadId));
    if (this.disposed) return this.discarded(upload.uploadId);
    if (!finalized.success) {
      this.logger.error(`Finalize failed for upload ${upload.uploadId}: ${finalized.error.message}`);
      return this.fail(finalized.error, false, upload.uploadId);
    }

    return this.succeed(finalized.data);
  }

  async submitUrl(url: string, metadata: UrlJobMetadata = {}): Promise<UploadOutcome> {
    const busy = this.rejectIfBusy();
    if (busy) return busy;

    if (!sourceUrlSchema.safeParse(url).success) {
      return this.fail(validationFailure('Enter a valid http or https URL', { url: 'Invalid URL' }), true, null);
    }

    const parsedMetadata = urlJobMetadataSchema.safeParse(metadata);
    if (!parsedMetadata.success) {
      return this.fail(validationFailureFromZod('Invalid job metadata', parsedMetadata.error), true, null);
    }

    this.transition({ status: 'submittingUrl', url });

    const created = await guard(() => this.directory.createFromUrl(url, parsedMetadata.data));
    if (this.disposed) return this.discarded(null);
    if (!created.success) {
      return this.fail(created.error, true, null);
    }

    return this.succeed(created.data);
  }

  /** `failed` or `succeeded` back to `idle`. Returns false while a submission is active. */
  reset(): boolean {
    const state = this.store.getState();

    if (isUploadActive(state)) {
      this.logger.warn(`Ignoring reset while ${state.status}`);
      return false;
    }

    if (state.status !== 'idle') {
      this.transition({ status: 'idle' });
    }
    return true;
  }

  dispose(): void {
    if (this.disposed) return;

    this.disposed = true;
    this.onDispose?.();
  }

  private discarded(uploadId: string | null): UploadOutcome {
    this.logger.debug('Discarding upload result after dispose');
    return { success: false, error: genericFailure('Upload orchestrator has been disposed'), canRetry: false, uploadId };
  }

  private rejectIfBusy(): UploadOutcome | null {
    if (this.disposed) {
      return this.discarded(null);
    }

    if (isUploadActive(this.store.getState())) {
      return {
        success: false,
        error: validationFailure('An upload is already in progress'),
        canRetry: false,
        uploadId: null,
      };
    }

    return null;
  }

  private reportProgress(uploadId: string, bytesSent: number) {
    const state = this.store.getState();
    if (state.status !== 'uploadingToBlobStore' || state.uploadId !== uploadId) return;

    this.transition({ ...state, bytesUploaded: Math.min(bytesSent, state.totalBytes) });
  }

  private fail(failure: Failure, canRetry: boolean, uploadId: string | null): UploadOutcome {
    this.transition({ status: 'failed', failure, canRetry, uploadId });
    return { success: false, error: failure, canRetry, uploadId };
  }

  private succeed(job: Job): UploadOutcome {
    this.logger.info(`Job ${job.jobId} created`);
    this.transition({ status: 'succeeded', job });
    return { success: true, data: job };
  }

  private transition(next: UploadState) {
    if (this.disposed) return;
    this.store.setState(next, true);
  }
}
