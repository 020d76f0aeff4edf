// cdk/lib/read-path.ts
// In-memory evaluation of the two dashboard queries over stored readings.
// Mirrors the SQL in ./queries row for row, including partition pruning.
import type { SensorMetric } from "./catalog";
import {
  type DatePartition,
  parseReadingTimestamp,
  partitionWindow,
  samePartition,
} from "./partitions";
import {
  LATEST_VALUE_LOOKBACK_DAYS,
  TIME_SERIES_LOOKBACK_DAYS,
  TIME_SERIES_TRAILING_HOURS,
  type LatestValueQueryOptions,
  type TimeSeriesQueryOptions,
  trailingBound,
} from "./queries";
import type { SensorRecord } from "./sensor-record";

/** A record plus the partition it was written under. */
export interface StoredReading extends SensorRecord {
  partition: DatePartition;
}

export interface TimeSeriesRow {
  time: Date;
  equipment: string;
  pH: number | null;
  RPM: number | null;
  TCD: number | null;
  temperature: number | null;
}

export interface LatestValueRow {
  equipment: string;
  value: number;
}

function scan(
  readings: readonly StoredReading[],
  now: Date,
  lookbackDays: number,
  equipment: readonly string[]
): StoredReading[] {
  const window = partitionWindow(now, lookbackDays);
  const wanted = new Set(equipment);
  return readings.filter(
    (r) => wanted.has(r.equipment) && window.some((p) => samePartition(p, r.partition))
  );
}

export function selectTimeSeries(
  readings: readonly StoredReading[],
  opts: TimeSeriesQueryOptions
): TimeSeriesRow[] {
  const from = trailingBound(opts.now, opts.trailingHours ?? TIME_SERIES_TRAILING_HOURS);
  const rows: TimeSeriesRow[] = [];
  for (const r of scan(readings, opts.now, opts.lookbackDays ?? TIME_SERIES_LOOKBACK_DAYS, opts.equipment)) {
    const time = parseReadingTimestamp(r.timestamp);
    if (!time || time < from) continue;
    rows.push({
      time,
      equipment: r.equipment,
      pH: r.ph,
      RPM: r.rpm,
      TCD: r.tcd,
      temperature: r.temperature,
    });
  }
  return rows;
}

export function selectLatestValues(
  readings: readonly StoredReading[],
  opts: LatestValueQueryOptions
): LatestValueRow[] {
  const metric: SensorMetric = opts.metric ?? "ph";
  const newest = new Map<string, { timestamp: string; value: number }>();
  for (const r of scan(readings, opts.now, opts.lookbackDays ?? LATEST_VALUE_LOOKBACK_DAYS, opts.equipment)) {
    const value = r[metric];
    if (value === null) continue;
    const seen = newest.get(r.equipment);
    // canonical timestamps sort chronologically as strings, same as the SQL
    if (!seen || r.timestamp > seen.timestamp) {
      newest.set(r.equipment, { timestamp: r.timestamp, value });
    }
  }
  return [...newest].map(([equipment, { value }]) => ({ equipment, value }));
}
