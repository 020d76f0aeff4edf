// cdk/functions/telemetry-api.ts
import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2,
} from "aws-lambda";
import { z } from "zod";
import { SENSOR_METRICS } from "../lib/catalog";
import {
  InvalidEquipmentFilterError,
  buildLatestValueQuery,
  buildTimeSeriesQuery,
  parseEquipmentFilter,
} from "../lib/queries";
import { AthenaQueryRunner, type QueryRow, type QueryRunner, athenaApi } from "./athena";
import { loadTelemetryApiConfig } from "./config";

export interface SeriesPoint {
  time: string | null;
  equipment: string | null;
  pH: number | null;
  RPM: number | null;
  TCD: number | null;
  temperature: number | null;
}

export interface LatestValue {
  equipment: string | null;
  value: number | null;
}

export interface TelemetryApiDeps {
  runner: QueryRunner;
  allowedOrigin: string;
  now?: () => Date;
}

type Result = APIGatewayProxyStructuredResultV2;

const SeriesParams = z.object({ equipment: z.string({ required_error: "equipment is required" }) });
const LatestParams = SeriesParams.extend({ metric: z.enum(SENSOR_METRICS).default("ph") });

class BadRequest extends Error {}

function num(v: string | null | undefined): number | null {
  if (v === null || v === undefined || v === "") return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

function params<T extends z.ZodTypeAny>(schema: T, event: APIGatewayProxyEventV2): z.infer<T> {
  const res = schema.safeParse(event.queryStringParameters ?? {});
  if (!res.success) throw new BadRequest(res.error.issues.map((i) => i.message).join("; "));
  return res.data;
}

const toSeriesPoint = (r: QueryRow): SeriesPoint => ({
  time: r.time ?? null,
  equipment: r.equipment ?? null,
  pH: num(r.ph),
  RPM: num(r.rpm),
  TCD: num(r.tcd),
  temperature: num(r.temperature),
});

export function createHandler(deps: TelemetryApiDeps) {
  const now = deps.now ?? (() => new Date());
  const cors = {
    "Access-Control-Allow-Origin": deps.allowedOrigin,
    "Access-Control-Allow-Methods": "GET,OPTIONS",
    "Access-Control-Allow-Headers": "content-type,authorization",
  };

  function json(status: number, body: unknown): Result {
    return {
      statusCode: status,
      headers: { ...cors, "content-type": "application/json" },
      body: JSON.stringify(body),
    };
  }

  return async (event: APIGatewayProxyEventV2): Promise<Result> => {
    const method = event.requestContext?.http?.method ?? "GET";
    if (method === "OPTIONS") {
      // Preflight response
      return { statusCode: 204, headers: cors, body: "" };
    }

    const rawPath = event.rawPath || event.requestContext?.http?.path || "";
    try {
      // /series?equipment=25080001,25080002
      if (rawPath === "/series") {
        const p = params(SeriesParams, event);
        const sql = buildTimeSeriesQuery({ equipment: parseEquipmentFilter(p.equipment), now: now() });
        const rows = await deps.runner.run(sql);
        return json(200, rows.map(toSeriesPoint));
      }

      // /latest?equipment=25080001&metric=ph
      if (rawPath === "/latest") {
        const p = params(LatestParams, event);
        const sql = buildLatestValueQuery({
          equipment: parseEquipmentFilter(p.equipment),
          metric: p.metric,
          now: now(),
          withEquipment: true,
        });
        const rows = await deps.runner.run(sql);
        const values: LatestValue[] = rows.map((r) => ({ equipment: r.equipment ?? null, value: num(r.value) }));
        return json(200, values);
      }

      return json(404, { message: "route not found", pathTried: rawPath });
    } catch (err) {
      if (err instanceof BadRequest || err instanceof InvalidEquipmentFilterError) {
        return json(400, { message: err.message });
      }
      console.error("query error", rawPath, err);
      return json(500, { message: err instanceof Error ? err.message : "error" });
    }
  };
}

let defaultHandler: ReturnType<typeof createHandler> | undefined;

export const handler = async (event: APIGatewayProxyEventV2): Promise<Result> => {
  if (!defaultHandler) {
    const config = loadTelemetryApiConfig();
    defaultHandler = createHandler({
      runner: new AthenaQueryRunner(athenaApi(), config),
      allowedOrigin: config.allowedOrigin,
    });
  }
  return defaultHandler(event);
};
