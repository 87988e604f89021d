/**
 * ISO timestamp for "now" that is guaranteed to sort strictly after `after`.
 * Terminal timestamps use this so completed_at never equals created_at, even
 * when an execution finishes within the same millisecond it was created.
 */
export function timestampAfter(after: string, now: Date = new Date()): string {
  const floor = Date.parse(after);
  if (Number.isNaN(floor) || now.getTime() > floor) return now.toISOString();
  return new Date(floor + 1).toISOString();
}
