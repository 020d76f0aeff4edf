// cdk/lib/queries.ts
// Athena SQL for the dashboard panels. `now` is always passed in so the
// rendered text depends only on the inputs.
import {
  type CatalogDescriptor,
  EQUIPMENT_ID_PATTERN,
  type SensorMetric,
  SENSOR_CATALOG,
  sqlTypeOf,
} from "./catalog";
import { type DatePartition, formatReadingTimestamp, partitionWindow } from "./partitions";

export const TIME_SERIES_LOOKBACK_DAYS = 5;
export const TIME_SERIES_TRAILING_HOURS = 120;
export const LATEST_VALUE_LOOKBACK_DAYS = 1;

const HOUR_MS = 60 * 60 * 1000;

export class InvalidEquipmentFilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidEquipmentFilterError";
  }
}

export interface TimeSeriesQueryOptions {
  equipment: readonly string[];
  now: Date;
  lookbackDays?: number;
  trailingHours?: number;
  catalog?: CatalogDescriptor;
}

export interface LatestValueQueryOptions {
  equipment: readonly string[];
  now: Date;
  metric?: SensorMetric;
  lookbackDays?: number;
  /** Also project the equipment column next to `value`. */
  withEquipment?: boolean;
  catalog?: CatalogDescriptor;
}

/**
 * Parses an `equipment_filter` value ("25080001,25080002") into distinct ids.
 */
export function parseEquipmentFilter(csv: string): string[] {
  const ids = [...new Set(csv.split(",").map((s) => s.trim()).filter(Boolean))];
  if (ids.length === 0) throw new InvalidEquipmentFilterError("equipment filter is empty");
  const bad = ids.filter((id) => !EQUIPMENT_ID_PATTERN.test(id));
  if (bad.length > 0) {
    throw new InvalidEquipmentFilterError(`invalid equipment id(s): ${bad.join(", ")}`);
  }
  return ids;
}

export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function partitionPredicate(partitions: readonly DatePartition[]): string {
  if (partitions.length === 0) throw new RangeError("partition window is empty");
  return partitions
    .map(
      (p) =>
        `(year = ${sqlString(p.year)} AND month = ${sqlString(p.month)} AND day = ${sqlString(p.day)})`
    )
    .join(" OR ");
}

function equipmentList(equipment: readonly string[]): string {
  if (equipment.length === 0) throw new InvalidEquipmentFilterError("equipment filter is empty");
  const bad = equipment.filter((id) => !EQUIPMENT_ID_PATTERN.test(id));
  if (bad.length > 0) {
    throw new InvalidEquipmentFilterError(`invalid equipment id(s): ${bad.join(", ")}`);
  }
  return equipment.map(sqlString).join(", ");
}

/**
 * Lower bound of the rolling window, as compared against the cast timestamp.
 * Rounded up to a whole second, since readings and the SQL literal carry no
 * milliseconds.
 */
export function trailingBound(now: Date, trailingHours: number): Date {
  const ms = now.getTime() - trailingHours * HOUR_MS;
  return new Date(Math.ceil(ms / 1000) * 1000);
}

export function buildTimeSeriesQuery(opts: TimeSeriesQueryOptions): string {
  const catalog: CatalogDescriptor = opts.catalog ?? SENSOR_CATALOG;
  const lookback = opts.lookbackDays ?? TIME_SERIES_LOOKBACK_DAYS;
  const hours = opts.trailingHours ?? TIME_SERIES_TRAILING_HOURS;
  const from = formatReadingTimestamp(trailingBound(opts.now, hours));

  return [
    "WITH parsed_data AS (",
    "  SELECT",
    `    try_cast("timestamp" AS TIMESTAMP) AS time,`,
    "    equipment,",
    `    CAST(ph AS ${sqlTypeOf(catalog, "ph")}) AS pH,`,
    `    CAST(rpm AS ${sqlTypeOf(catalog, "rpm")}) AS RPM,`,
    `    CAST(tcd AS ${sqlTypeOf(catalog, "tcd")}) AS TCD,`,
    `    CAST(temperature AS ${sqlTypeOf(catalog, "temperature")}) AS temperature`,
    `  FROM ${catalog.database}.${catalog.table}`,
    `  WHERE (${partitionPredicate(partitionWindow(opts.now, lookback))})`,
    `    AND equipment IN (${equipmentList(opts.equipment)})`,
    ")",
    "SELECT time, equipment, pH, RPM, TCD, temperature",
    "FROM parsed_data",
    "WHERE time IS NOT NULL",
    `  AND time >= TIMESTAMP ${sqlString(from)}`,
  ].join("\n");
}

/**
 * Most recent non-null value of one metric per equipment. Rows sharing the
 * newest timestamp are not further ordered, so either may win.
 */
export function buildLatestValueQuery(opts: LatestValueQueryOptions): string {
  const catalog: CatalogDescriptor = opts.catalog ?? SENSOR_CATALOG;
  const metric = opts.metric ?? "ph";
  const lookback = opts.lookbackDays ?? LATEST_VALUE_LOOKBACK_DAYS;

  return [
    "WITH latest_data AS (",
    "  SELECT",
    `    CAST(${metric} AS ${sqlTypeOf(catalog, metric)}) AS value,`,
    "    equipment,",
    `    "timestamp",`,
    `    ROW_NUMBER() OVER (PARTITION BY equipment ORDER BY "timestamp" DESC) AS rn`,
    `  FROM ${catalog.database}.${catalog.table}`,
    `  WHERE (${partitionPredicate(partitionWindow(opts.now, lookback))})`,
    `    AND equipment IN (${equipmentList(opts.equipment)})`,
    `    AND ${metric} IS NOT NULL`,
    `    AND "timestamp" IS NOT NULL`,
    ")",
    opts.withEquipment ? "SELECT equipment, value" : "SELECT value",
    "FROM latest_data",
    "WHERE rn = 1",
  ].join("\n");
}
