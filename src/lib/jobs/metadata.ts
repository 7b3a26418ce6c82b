import { z } from 'zod';

/** Segment lengths, in seconds, the processing service accepts. */
export const SEGMENT_DURATIONS = [60, 180, 300, 600, 900, 1800, 3600] as const;

const allowedSegmentDurations = new Set<number>(SEGMENT_DURATIONS);

export const jobMetadataSchema = z.object({
  title: z.string().max(200, 'Title must be at most 200 characters').optional(),
  description: z.string().max(5000, 'Description must be at most 5000 characters').optional(),
  transcriptionEngine: z.string().min(1, 'Transcription engine cannot be empty').optional(),
  segmentDuration: z
    .number()
    .int()
    .refine((value) => allowedSegmentDurations.has(value), {
      message: `Segment duration must be one of ${SEGMENT_DURATIONS.join(', ')} seconds`,
    })
    .optional(),
});

export const urlJobMetadataSchema = jobMetadataSchema
  .extend({
    isLive: z.boolean().optional(),
    captureSeconds: z
      .number()
      .int()
      .min(60, 'Capture duration must be at least 60 seconds')
      .max(3600, 'Capture duration must be at most 3600 seconds')
      .optional(),
  })
  .superRefine((data, ctx) => {
    if (data.captureSeconds !== undefined && !data.isLive) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Capture duration only applies to live streams',
        path: ['captureSeconds'],
      });
    }
  });

export type JobMetadata = z.infer<typeof jobMetadataSchema>;
export type UrlJobMetadata = z.infer<typeof urlJobMetadataSchema>;

export function toMetadataDto(metadata: JobMetadata): Record<string, string | number> {
  const dto: Record<string, string | number> = {};

  if (metadata.title !== undefined) dto.title = metadata.title;
  if (metadata.description !== undefined) dto.description = metadata.description;
  if (metadata.transcriptionEngine !== undefined) dto.transcription_engine = metadata.transcriptionEngine;
  if (metadata.segmentDuration !== undefined) dto.segment_duration = metadata.segmentDuration;

  return dto;
}
