/**
 * Current time as an ISO-8601 UTC string.
 */
export function isoNow(now: Date = new Date()): string {
  return now.toISOString();
}

/**
 * Whether ISO timestamp `a` is at or after `b`. Null never wins.
 */
export function isAtOrAfter(a: string | null, b: string | null): boolean {
  if (!a) return false;
  if (!b) return true;
  return Date.parse(a) >= Date.parse(b);
}
