/** Milliseconds since the epoch. Every time comparison in the engine goes through this representation. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function isoTimestamp(ms: number): string {
  return new Date(ms).toISOString();
}

export function parseTimestamp(iso: string): number {
  const ms = Date.parse(iso);
  if (!Number.isFinite(ms)) throw new Error(`Invalid timestamp: ${iso}`);
  return ms;
}

export interface IsoWeek {
  year: number;
  week: number;
}

/** ISO-8601 week of the UTC calendar day containing `ms`. */
export function isoWeek(ms: number): IsoWeek {
  const d = new Date(ms);
  const date = new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
  const day = date.getUTCDay() || 7;
  // Thursday of the same week decides the year
  date.setUTCDate(date.getUTCDate() + 4 - day);
  const yearStart = Date.UTC(date.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((date.getTime() - yearStart) / 86_400_000 + 1) / 7);
  return { year: date.getUTCFullYear(), week };
}

/** Bucket label such as `2025W44`. */
export function weekBucket(ms: number): string {
  const { year, week } = isoWeek(ms);
  return `${year}W${String(week).padStart(2, '0')}`;
}

/** Compact UTC stamp used in task ids: `20251030T120000Z`. */
export function compactStamp(ms: number): string {
  return new Date(ms).toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
}
