import { JobRecord, JobStatus, ObservedTarget, TERMINAL_STATUSES } from '../types/index';

export interface ReconcileContext {
  sourceFile: string;
  language: string;
  title: string;
  today: string;
}

/**
 * Merge a ledger record with what scan observed at its target path.
 *
 * The target document is the source of truth when it exists and declares
 * a terminal status. Otherwise an existing record is kept untouched, so a
 * failed entry stays failed until it is reset explicitly. Records that do
 * not exist yet start as `pending`, or with the target's status when a
 * target is already there.
 */
export function reconcileRecord(
  existing: JobRecord | undefined,
  observed: ObservedTarget,
  context: ReconcileContext
): JobRecord {
  if (!existing) {
    return {
      sourceFile: context.sourceFile,
      language: context.language,
      status: observed.kind === 'missing' ? 'pending' : observed.status,
      lastUpdated: context.today,
      title: context.title,
    };
  }

  if (
    observed.kind === 'present' &&
    TERMINAL_STATUSES.includes(observed.status) &&
    observed.status !== existing.status
  ) {
    return { ...existing, status: observed.status, lastUpdated: context.today };
  }

  return existing;
}

/**
 * Read a declared `translation_status` value, or `unknown`
 */
export function toJobStatus(value: unknown): JobStatus {
  switch (value) {
    case 'pending':
    case 'translated':
    case 'failed':
      return value;
    default:
      return 'unknown';
  }
}
