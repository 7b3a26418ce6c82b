import type { JobActionKind } from './model';

export type InFlightActions = ReadonlyMap<string, JobActionKind>;

export const emptyInFlight: InFlightActions = new Map();

/**
 * Insert-or-reject. Returns the next map, or `null` when `jobId` already has
 * an action outstanding; the existing entry is never overwritten.
 */
export function beginAction(actions: InFlightActions, jobId: string, kind: JobActionKind): InFlightActions | null {
  if (actions.has(jobId)) {
    return null;
  }

  const next = new Map(actions);
  next.set(jobId, kind);
  return next;
}

export function endAction(actions: InFlightActions, jobId: string): InFlightActions {
  if (!actions.has(jobId)) {
    return actions;
  }

  const next = new Map(actions);
  next.delete(jobId);
  return next;
}

/** Keeps only the entries whose job is still listed. */
export function retainListed(actions: InFlightActions, jobIds: ReadonlySet<string>): InFlightActions {
  const stale = [...actions.keys()].filter((jobId) => !jobIds.has(jobId));
  if (stale.length === 0) {
    return actions;
  }

  const next = new Map(actions);
  for (const jobId of stale) {
    next.delete(jobId);
  }
  return next;
}
