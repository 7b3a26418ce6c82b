import { z } from 'zod';

export const JOB_STATUSES = ['queued', 'processing', 'paused', 'completed', 'failed', 'cancelled'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];
export type JobSource = 'url' | 'file';
export type JobActionKind = 'delete' | 'flag' | 'pause' | 'resume' | 'cancel';

export interface Job {
  jobId: string;
  status: JobStatus;
  progressPct: number;
  isFlagged: boolean;
  flagNote: string | null;
  pauseRequested: boolean;
  source: JobSource;
  sourceUrl: string | null;
  filename: string | null;
  filePath: string | null;
  title: string | null;
  description: string | null;
  errorMessage: string | null;
  createdAt: string;
}

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const jobDtoSchema = z.object({
  job_id: z.string().min(1, 'job_id is required'),
  status: z.enum(JOB_STATUSES),
  progress_pct: z.number().min(0).max(100).nullish(),
  is_flagged: z.boolean().nullish(),
  flag_note: optionalText,
  pause_requested: z.boolean().nullish(),
  source: z.string().nullish(),
  source_url: optionalText,
  filename: optionalText,
  file_path: optionalText,
  title: optionalText,
  description: optionalText,
  error_message: optionalText,
  created_at: z.string().min(1).nullish(),
});

function toJob(dto: z.output<typeof jobDtoSchema>): Job {
  return {
    jobId: dto.job_id,
    status: dto.status,
    progressPct: dto.progress_pct ?? 0,
    isFlagged: dto.is_flagged ?? false,
    flagNote: dto.flag_note,
    pauseRequested: dto.pause_requested ?? false,
    source: dto.source === 'url' ? 'url' : 'file',
    sourceUrl: dto.source_url,
    filename: dto.filename,
    filePath: dto.file_path,
    title: dto.title,
    description: dto.description,
    errorMessage: dto.error_message,
    createdAt: dto.created_at ?? new Date().toISOString(),
  };
}

export const jobSchema = jobDtoSchema.transform(toJob);

/** Single-job endpoints answer with either the job itself or `{ "job": {...} }`. */
export const jobResponseSchema = z.union([z.object({ job: jobSchema }).transform(({ job }) => job), jobSchema]);

export const jobListSchema = z.array(jobSchema);

export const canPause = (job: Job) => job.status === 'queued' || job.status === 'processing';

export const canResume = (job: Job) => job.status === 'paused' || job.pauseRequested;

export const canDelete = (job: Job) => !job.isFlagged && job.status !== 'processing';

export const canCancel = (job: Job) => job.status === 'queued' || job.status === 'processing';

/** No further server-side transitions are expected. */
export const isTerminal = (job: Job) =>
  job.status === 'completed' || job.status === 'failed' || job.status === 'cancelled';

export const isPausing = (job: Job) => job.pauseRequested && job.status !== 'paused';
