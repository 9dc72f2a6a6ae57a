export const DEFAULT_VISIT_COMPLETION_HOURS = 12;
export const DEFAULT_SESSION_TIMEOUT_MINUTES = 30;

export type VisitTimestamps = {
  firstVisitTime: Date | null;
  lastVisitTime: Date | null;
};

export type VisitWindow = {
  visitCompletionHours: number;
  sessionTimeoutMinutes: number;
};

export function visitWindowMs(
  visitCompletionHours = DEFAULT_VISIT_COMPLETION_HOURS,
  sessionTimeoutMinutes = DEFAULT_SESSION_TIMEOUT_MINUTES,
): number {
  return (
    visitCompletionHours * 60 * 60 * 1000 + sessionTimeoutMinutes * 60 * 1000
  );
}

/**
 * Latest known visit moment of a record, or null when the user was never
 * seen by the collector.
 */
export function latestVisitTime(record: VisitTimestamps): Date | null {
  const candidates = [record.lastVisitTime, record.firstVisitTime].filter(
    (value): value is Date =>
      value instanceof Date && !Number.isNaN(value.getTime()),
  );
  if (candidates.length === 0) {
    return null;
  }
  return new Date(Math.max(...candidates.map((value) => value.getTime())));
}

/**
 * Whether hits can still be attached to the collector's current visit.
 *
 * Mirrors the collector's own stitching: a visit completes
 * `visitCompletionHours` after its last hit, plus the session timeout. The
 * window must match the collector's, otherwise purchases land in orphaned
 * visits and lose their traffic source.
 */
export function isVisitOpen(
  record: VisitTimestamps,
  now: Date,
  visitCompletionHours = DEFAULT_VISIT_COMPLETION_HOURS,
  sessionTimeoutMinutes = DEFAULT_SESSION_TIMEOUT_MINUTES,
): boolean {
  const latest = latestVisitTime(record);
  if (!latest) {
    return false;
  }
  const elapsed = now.getTime() - latest.getTime();
  return elapsed <= visitWindowMs(visitCompletionHours, sessionTimeoutMinutes);
}
