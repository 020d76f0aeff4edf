// cdk/lib/partitions.ts

/** Calendar partition of the lake: zero-padded UTC date parts. */
export interface DatePartition {
  year: string;
  month: string;
  day: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

// readings arrive as "YYYY-MM-DD HH:MM:SS"; some firmware sends the ISO "T" form
const TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})Z?$/;

const pad2 = (n: number) => String(n).padStart(2, "0");

export function datePartition(date: Date): DatePartition {
  return {
    year: String(date.getUTCFullYear()),
    month: pad2(date.getUTCMonth() + 1),
    day: pad2(date.getUTCDate()),
  };
}

/**
 * Partitions covering `now` and the `lookbackDays` calendar days before it,
 * newest first.
 */
export function partitionWindow(now: Date, lookbackDays: number): DatePartition[] {
  if (!Number.isInteger(lookbackDays) || lookbackDays < 0) {
    throw new RangeError(`lookbackDays must be a non-negative integer, got ${lookbackDays}`);
  }
  const out: DatePartition[] = [];
  for (let i = 0; i <= lookbackDays; i++) {
    out.push(datePartition(new Date(now.getTime() - i * DAY_MS)));
  }
  return out;
}

export function partitionPath(p: DatePartition): string {
  return `year=${p.year}/month=${p.month}/day=${p.day}`;
}

export function samePartition(a: DatePartition, b: DatePartition): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

/**
 * Parses a reading timestamp as UTC. Returns undefined for anything that is
 * not a real calendar instant (e.g. "2025-02-30 10:00:00").
 */
export function parseReadingTimestamp(text: string): Date | undefined {
  const m = TIMESTAMP_RE.exec(text.trim());
  if (!m) return undefined;
  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return undefined;
  }
  return date;
}

/** Canonical "YYYY-MM-DD HH:MM:SS" (UTC), the form Athena casts to TIMESTAMP. */
export function formatReadingTimestamp(date: Date): string {
  const { year, month, day } = datePartition(date);
  return `${year}-${month}-${day} ${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
}

/** Compact form used in object keys: YYYYMMDDHHMMSS. */
export function compactTimestamp(date: Date): string {
  return formatReadingTimestamp(date).replace(/[- :]/g, "");
}
