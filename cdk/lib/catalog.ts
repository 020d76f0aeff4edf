// cdk/lib/catalog.ts
// Schema of the sensor lake table. The Glue table, the transform output and
// the Athena queries are all derived from this one descriptor.

export type CatalogType = "string" | "double" | "int";

export interface CatalogColumn {
  name: string;
  type: CatalogType;
  comment?: string;
}

export interface CatalogDescriptor {
  database: string;
  table: string;
  /** Key prefix in the lake bucket, with trailing slash. */
  storagePrefix: string;
  columns: readonly CatalogColumn[];
  partitionKeys: readonly CatalogColumn[];
}

export const SENSOR_METRICS = ["ph", "rpm", "tcd", "temperature"] as const;
export type SensorMetric = (typeof SENSOR_METRICS)[number];

export const SENSOR_CATALOG = {
  database: "bioreactor_db",
  table: "sensor_data",
  storagePrefix: "sensor_data/",
  columns: [
    { name: "ph", type: "double", comment: "pH" },
    { name: "rpm", type: "int", comment: "agitator speed" },
    { name: "tcd", type: "double", comment: "total cell density" },
    { name: "temperature", type: "double", comment: "process temperature" },
    { name: "timestamp", type: "string", comment: "YYYY-MM-DD HH:MM:SS, UTC" },
    { name: "equipment", type: "string", comment: "equipment id" },
  ],
  partitionKeys: [
    { name: "year", type: "string" },
    { name: "month", type: "string" },
    { name: "day", type: "string" },
  ],
} as const satisfies CatalogDescriptor;

/** Equipment ids that can be stored and filtered on. */
export const EQUIPMENT_ID_PATTERN = /^[A-Za-z0-9_.:-]+$/;

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;

/** Expected range for pH; values outside are flagged, not rejected. */
export const PH_RANGE = { min: 4.0, max: 9.0 } as const;

const SQL_TYPES: Record<CatalogType, string> = {
  string: "VARCHAR",
  double: "DOUBLE",
  int: "INTEGER",
};

export function columnOf(catalog: CatalogDescriptor, name: string): CatalogColumn {
  const col = catalog.columns.find((c) => c.name === name);
  if (!col) throw new Error(`column ${name} not in ${catalog.database}.${catalog.table}`);
  return col;
}

/** Athena (Trino) type to CAST a catalog column to. */
export function sqlTypeOf(catalog: CatalogDescriptor, name: string): string {
  return SQL_TYPES[columnOf(catalog, name).type];
}

/** Whether a JSON value is acceptable for a column of the given type (null allowed). */
export function matchesCatalogType(type: CatalogType, value: unknown): boolean {
  if (value === null) return true;
  switch (type) {
    case "string":
      return typeof value === "string";
    case "double":
      return typeof value === "number" && Number.isFinite(value);
    case "int":
      return typeof value === "number" && Number.isInteger(value) && value >= INT_MIN && value <= INT_MAX;
  }
}
