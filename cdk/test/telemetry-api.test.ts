import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { QueryRow, QueryRunner } from "../functions/athena";
import { createHandler } from "../functions/telemetry-api";
import { buildLatestValueQuery, buildTimeSeriesQuery } from "../lib/queries";

const now = new Date(Date.UTC(2025, 7, 31, 12, 0, 0));

function httpEvent(
  rawPath: string,
  query?: Record<string, string>,
  method = "GET"
): APIGatewayProxyEventV2 {
  return {
    version: "2.0",
    routeKey: `${method} ${rawPath}`,
    rawPath,
    rawQueryString: new URLSearchParams(query).toString(),
    headers: {},
    queryStringParameters: query,
    isBase64Encoded: false,
    requestContext: {
      accountId: "123456789012",
      apiId: "api",
      domainName: "api.example.com",
      domainPrefix: "api",
      http: { method, path: rawPath, protocol: "HTTP/1.1", sourceIp: "127.0.0.1", userAgent: "vitest" },
      requestId: "req-1",
      routeKey: `${method} ${rawPath}`,
      stage: "$default",
      time: "31/Aug/2025:12:00:00 +0000",
      timeEpoch: now.getTime(),
    },
  };
}

function fakeRunner(rows: QueryRow[] = []) {
  const sql: string[] = [];
  const runner: QueryRunner = {
    run: async (q) => {
      sql.push(q);
      return rows;
    },
  };
  return { runner, sql };
}

const body = (res: { body?: string }): unknown => JSON.parse(res.body ?? "");

describe("telemetry api", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("serves the time series for the requested equipment", async () => {
    const { runner, sql } = fakeRunner([
      {
        time: "2025-08-31 10:00:00.000",
        equipment: "25080001",
        ph: "7.1",
        rpm: "120",
        tcd: null,
        temperature: "36.9",
      },
    ]);
    const handler = createHandler({ runner, allowedOrigin: "http://localhost:5173", now: () => now });
    const res = await handler(httpEvent("/series", { equipment: "25080001,25080002" }));

    expect(sql).toEqual([buildTimeSeriesQuery({ equipment: ["25080001", "25080002"], now })]);
    expect(res.statusCode).toBe(200);
    expect(res.headers?.["Access-Control-Allow-Origin"]).toBe("http://localhost:5173");
    expect(body(res)).toEqual([
      { time: "2025-08-31 10:00:00.000", equipment: "25080001", pH: 7.1, RPM: 120, TCD: null, temperature: 36.9 },
    ]);
  });

  it("serves the latest value per equipment, pH by default", async () => {
    const { runner, sql } = fakeRunner([{ equipment: "25080001", value: "7.3" }]);
    const handler = createHandler({ runner, allowedOrigin: "*", now: () => now });
    const res = await handler(httpEvent("/latest", { equipment: "25080001" }));

    expect(sql).toEqual([
      buildLatestValueQuery({ equipment: ["25080001"], metric: "ph", now, withEquipment: true }),
    ]);
    expect(body(res)).toEqual([{ equipment: "25080001", value: 7.3 }]);
  });

  it("passes the metric through", async () => {
    const { runner, sql } = fakeRunner();
    const handler = createHandler({ runner, allowedOrigin: "*", now: () => now });
    await handler(httpEvent("/latest", { equipment: "25080001", metric: "temperature" }));
    expect(sql[0]).toContain("    AND temperature IS NOT NULL");
  });

  it("rejects bad parameters with 400 and runs nothing", async () => {
    const { runner, sql } = fakeRunner();
    const handler = createHandler({ runner, allowedOrigin: "*", now: () => now });

    const missing = await handler(httpEvent("/series"));
    expect(missing.statusCode).toBe(400);
    expect(body(missing)).toEqual({ message: "equipment is required" });

    const badId = await handler(httpEvent("/series", { equipment: "a'b" }));
    expect(badId.statusCode).toBe(400);
    expect(body(badId)).toEqual({ message: "invalid equipment id(s): a'b" });

    const badMetric = await handler(httpEvent("/latest", { equipment: "25080001", metric: "co2" }));
    expect(badMetric.statusCode).toBe(400);

    expect(sql).toEqual([]);
  });

  it("answers preflight and unknown routes", async () => {
    const handler = createHandler({ runner: fakeRunner().runner, allowedOrigin: "*" });
    expect((await handler(httpEvent("/series", undefined, "OPTIONS"))).statusCode).toBe(204);
    const missing = await handler(httpEvent("/devices"));
    expect(missing.statusCode).toBe(404);
    expect(body(missing)).toEqual({ message: "route not found", pathTried: "/devices" });
  });

  it("reports query failures as 500", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const runner: QueryRunner = {
      run: async () => {
        throw new Error("query q-1 FAILED: boom");
      },
    };
    const res = await createHandler({ runner, allowedOrigin: "*" })(httpEvent("/series", { equipment: "e1" }));
    expect(res.statusCode).toBe(500);
    expect(body(res)).toEqual({ message: "query q-1 FAILED: boom" });
    expect(error).toHaveBeenCalledOnce();
  });
});
