export const APPLICATION_STATUSES = ['PENDING', 'QUEUED', 'PROCESSING', 'COMPLETED', 'FAILED'] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export const ALLOWED_TRANSITIONS: Readonly<Record<ApplicationStatus, readonly ApplicationStatus[]>> = {
  PENDING: ['QUEUED', 'FAILED'],
  QUEUED: ['PROCESSING', 'FAILED'],
  // PROCESSING -> PROCESSING covers redelivery of a job whose worker died mid-run.
  PROCESSING: ['PROCESSING', 'COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: ['PROCESSING'],
};

/** Statuses a worker may claim with the exclusive compare-and-swap. */
export const CLAIMABLE_STATUSES: readonly ApplicationStatus[] = ['QUEUED', 'FAILED'];

export function isApplicationStatus(value: unknown): value is ApplicationStatus {
  return typeof value === 'string' && (APPLICATION_STATUSES as readonly string[]).includes(value);
}

export function canTransition(from: ApplicationStatus, to: ApplicationStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Failure history is append-only: each entry goes on its own line after
 * whatever was recorded by earlier attempts.
 */
export function appendFailureReason(existing: string | null | undefined, entry: string): string {
  return existing ? `${existing}\n${entry}` : entry;
}
