import type { Job } from './model';

const searchableFields = (job: Job) => [job.title, job.description, job.sourceUrl, job.filename];

/**
 * Case-insensitive substring match over title, description, source URL and
 * filename. An empty query returns `jobs` itself, not a copy. Whitespace is
 * part of the needle.
 */
export function filterJobs(jobs: readonly Job[], query: string): readonly Job[] {
  if (query === '') {
    return jobs;
  }

  const needle = query.toLowerCase();

  return jobs.filter((job) =>
    searchableFields(job).some((field) => field !== null && field.toLowerCase().includes(needle))
  );
}
