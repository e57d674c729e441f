// Calendar dates are YYYY-MM-DD strings interpreted in UTC. Readings store
// epoch ms, so a day is the closed range [00:00:00.000, 23:59:59.999] UTC.

export const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export type DayWindow = {
  startMs: number;
  endMs: number;
};

export function isValidDate(value: string): boolean {
  const match = DATE_RE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const ms = Date.UTC(Number(y), Number(m) - 1, Number(d));
  // Rejects overflow such as 2024-02-30, which Date.UTC rolls into March.
  return formatUtcDate(ms) === value;
}

export function formatUtcDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function dayWindow(date: string): DayWindow {
  if (!isValidDate(date)) {
    throw new RangeError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  const startMs = Date.parse(`${date}T00:00:00.000Z`);
  return { startMs, endMs: startMs + DAY_MS - 1 };
}

export function yesterdayUtc(nowMs: number): string {
  return formatUtcDate(nowMs - DAY_MS);
}

// Milliseconds from nowMs until the next hh:mm UTC strictly after nowMs.
export function msUntilNextUtcTime(nowMs: number, hourUtc: number, minuteUtc: number): number {
  const now = new Date(nowMs);
  let next = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), hourUtc, minuteUtc, 0, 0);
  if (next <= nowMs) next += DAY_MS;
  return next - nowMs;
}
