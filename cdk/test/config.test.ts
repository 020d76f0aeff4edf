import { describe, expect, it } from "vitest";
import { loadAlarmConfig, loadTelemetryApiConfig } from "../functions/config";

describe("config", () => {
  it("fills telemetry api defaults", () => {
    expect(loadTelemetryApiConfig({})).toEqual({
      workGroup: "primary",
      database: "bioreactor_db",
      pollIntervalMs: 500,
      timeoutMs: 20_000,
      allowedOrigin: "*",
    });
  });

  it("coerces numeric settings", () => {
    const config = loadTelemetryApiConfig({ ATHENA_WORKGROUP: "bioreactor_wg", ATHENA_POLL_INTERVAL_MS: "250" });
    expect(config.workGroup).toBe("bioreactor_wg");
    expect(config.pollIntervalMs).toBe(250);
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadTelemetryApiConfig({ ATHENA_TIMEOUT_MS: "soon" })).toThrow(/ATHENA_TIMEOUT_MS/);
  });

  it("parses the alarm settings", () => {
    expect(
      loadAlarmConfig({
        ALARM_BUCKET: "test-bucket",
        ALARM_SENDER: "alerts@example.com",
        ALARM_DEFAULT_RECIPIENTS: "a@example.com, b@example.com,",
      })
    ).toEqual({
      bucket: "test-bucket",
      prefix: "alarms/",
      sender: "alerts@example.com",
      defaultRecipients: ["a@example.com", "b@example.com"],
    });
  });

  it("requires the alarm bucket and a sender address", () => {
    expect(() => loadAlarmConfig({ ALARM_SENDER: "alerts@example.com" })).toThrow(
      "invalid configuration: ALARM_BUCKET: Required"
    );
    expect(() => loadAlarmConfig({ ALARM_BUCKET: "b", ALARM_SENDER: "nobody" })).toThrow(/ALARM_SENDER/);
  });
});
