// cdk/functions/config.ts
// Runtime settings for the Lambdas. The stack sets these variables; defaults
// cover what is optional.
import { z } from "zod";
import { SENSOR_CATALOG } from "../lib/catalog";

type Env = Record<string, string | undefined>;

const csv = z
  .string()
  .default("")
  .transform((s) => s.split(",").map((v) => v.trim()).filter(Boolean));

const TelemetryApiEnv = z.object({
  ATHENA_WORKGROUP: z.string().min(1).default("primary"),
  SENSOR_DATABASE: z.string().min(1).default(SENSOR_CATALOG.database),
  ATHENA_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(500),
  ATHENA_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  ALLOWED_ORIGIN: z.string().default("*"),
});

const AlarmEnv = z.object({
  ALARM_BUCKET: z.string().min(1),
  ALARM_PREFIX: z.string().default("alarms/"),
  ALARM_SENDER: z.string().email(),
  ALARM_DEFAULT_RECIPIENTS: csv,
});

export interface TelemetryApiConfig {
  workGroup: string;
  database: string;
  pollIntervalMs: number;
  timeoutMs: number;
  allowedOrigin: string;
}

export interface AlarmConfig {
  bucket: string;
  prefix: string;
  sender: string;
  defaultRecipients: string[];
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.infer<T> {
  const res = schema.safeParse(env);
  if (!res.success) {
    const detail = res.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`invalid configuration: ${detail}`);
  }
  return res.data;
}

export function loadTelemetryApiConfig(env: Env = process.env): TelemetryApiConfig {
  const e = parseEnv(TelemetryApiEnv, env);
  return {
    workGroup: e.ATHENA_WORKGROUP,
    database: e.SENSOR_DATABASE,
    pollIntervalMs: e.ATHENA_POLL_INTERVAL_MS,
    timeoutMs: e.ATHENA_TIMEOUT_MS,
    allowedOrigin: e.ALLOWED_ORIGIN,
  };
}

export function loadAlarmConfig(env: Env = process.env): AlarmConfig {
  const e = parseEnv(AlarmEnv, env);
  return {
    bucket: e.ALARM_BUCKET,
    prefix: e.ALARM_PREFIX,
    sender: e.ALARM_SENDER,
    defaultRecipients: e.ALARM_DEFAULT_RECIPIENTS,
  };
}
