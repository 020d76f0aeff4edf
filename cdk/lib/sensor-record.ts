// cdk/lib/sensor-record.ts
import { z } from "zod";
import { EQUIPMENT_ID_PATTERN, SENSOR_CATALOG, matchesCatalogType } from "./catalog";
import {
  type DatePartition,
  datePartition,
  formatReadingTimestamp,
  parseReadingTimestamp,
} from "./partitions";

/** A reading as written to the lake (one JSON line, columns of SENSOR_CATALOG). */
export interface SensorRecord {
  ph: number | null;
  rpm: number | null;
  tcd: number | null;
  temperature: number | null;
  timestamp: string;
  equipment: string;
}

export interface NormalizedReading {
  record: SensorRecord;
  partition: DatePartition;
}

export class InvalidReadingError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid sensor reading: ${issues.join("; ")}`);
    this.name = "InvalidReadingError";
  }
}

// The HMI wraps every value in an array, even single ones.
const Scalar = z.union([z.number(), z.string(), z.null()]);
const SensorValue = z.union([Scalar, z.array(Scalar)]).optional();

const Id = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

const ReadingPayload = z
  .object({
    d: z
      .object({
        pH: SensorValue,
        ph: SensorValue,
        rpm: SensorValue,
        tcd: SensorValue,
        temperatura: SensorValue,
        temperature: SensorValue,
      })
      .passthrough(),
    ts: z.string({ required_error: "ts is required" }),
    equipment: Id.optional(),
    topic: z.string().optional(),
    deviceId: Id.optional(),
  })
  .passthrough();

type ReadingPayload = z.infer<typeof ReadingPayload>;
type RawValue = z.infer<typeof SensorValue>;

function equipmentOf(p: ReadingPayload): string | undefined {
  if (p.equipment) return p.equipment;
  // topic looks like: PRO/<equipment>/data
  const fromTopic = p.topic?.split("/")[1]?.trim();
  if (fromTopic) return fromTopic;
  return p.deviceId || undefined;
}

function toNumber(field: string, raw: RawValue, issues: string[]): number | null {
  const v = Array.isArray(raw) ? raw[0] : raw;
  if (v === undefined || v === null) return null;
  if (typeof v === "string" && v.trim() === "") {
    issues.push(`${field}: empty string`);
    return null;
  }
  const n = typeof v === "number" ? v : Number(v);
  if (!Number.isFinite(n)) {
    issues.push(`${field}: not a number (${JSON.stringify(v)})`);
    return null;
  }
  return n;
}

/**
 * Validates a decoded sensor payload and casts it to the lake schema.
 * Throws InvalidReadingError instead of guessing at bad input.
 */
export function normalizeReading(payload: unknown): NormalizedReading {
  const parsed = ReadingPayload.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidReadingError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "payload"}: ${i.message}`)
    );
  }
  const p = parsed.data;
  const issues: string[] = [];

  const equipment = equipmentOf(p);
  if (!equipment) issues.push("equipment: not present in payload, topic or deviceId");
  else if (!EQUIPMENT_ID_PATTERN.test(equipment)) {
    issues.push(`equipment: invalid id ${JSON.stringify(equipment)}`);
  }

  const at = parseReadingTimestamp(p.ts);
  if (!at) issues.push(`ts: expected YYYY-MM-DD HH:MM:SS, got ${JSON.stringify(p.ts)}`);

  const rpm = toNumber("rpm", p.d.rpm, issues);
  const record = {
    ph: toNumber("ph", p.d.pH ?? p.d.ph, issues),
    rpm: rpm === null ? null : Math.trunc(rpm),
    tcd: toNumber("tcd", p.d.tcd, issues),
    temperature: toNumber("temperature", p.d.temperatura ?? p.d.temperature, issues),
  };

  if (issues.length > 0 || !equipment || !at) throw new InvalidReadingError(issues);

  const out: SensorRecord = {
    ...record,
    timestamp: formatReadingTimestamp(at),
    equipment,
  };
  assertMatchesCatalog(out);
  return { record: out, partition: datePartition(at) };
}

function assertMatchesCatalog(record: SensorRecord): void {
  const values: Record<string, unknown> = { ...record };
  const bad = SENSOR_CATALOG.columns
    .filter((c) => !matchesCatalogType(c.type, values[c.name]))
    .map((c) => `${c.name}: does not match catalog type ${c.type}`);
  if (bad.length > 0) throw new InvalidReadingError(bad);
}
