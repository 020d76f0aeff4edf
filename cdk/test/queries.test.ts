import { describe, expect, it } from "vitest";
import {
  InvalidEquipmentFilterError,
  buildLatestValueQuery,
  buildTimeSeriesQuery,
  parseEquipmentFilter,
  partitionPredicate,
  sqlString,
} from "../lib/queries";

// 2025-09-02 12:00:00 UTC
const now = new Date(Date.UTC(2025, 8, 2, 12, 0, 0));

describe("parseEquipmentFilter", () => {
  it("splits, trims and de-duplicates", () => {
    expect(parseEquipmentFilter(" 25080001, 25080002,,25080001 ")).toEqual(["25080001", "25080002"]);
  });

  it("rejects an empty filter", () => {
    expect(() => parseEquipmentFilter(" , ")).toThrow(InvalidEquipmentFilterError);
  });

  it("rejects ids that could break out of the IN list", () => {
    expect(() => parseEquipmentFilter("25080001,x') OR ('1'='1")).toThrow(
      "invalid equipment id(s): x') OR ('1'='1"
    );
  });
});

describe("sql helpers", () => {
  it("doubles quotes in string literals", () => {
    expect(sqlString("O'Brien")).toBe("'O''Brien'");
  });

  it("ORs one clause per partition", () => {
    expect(
      partitionPredicate([
        { year: "2025", month: "09", day: "01" },
        { year: "2025", month: "08", day: "31" },
      ])
    ).toBe(
      "(year = '2025' AND month = '09' AND day = '01') OR (year = '2025' AND month = '08' AND day = '31')"
    );
  });
});

describe("buildTimeSeriesQuery", () => {
  it("renders the five-day window and the 120 hour bound", () => {
    const sql = buildTimeSeriesQuery({ equipment: ["25080001", "25080002"], now });
    expect(sql).toBe(
      [
        "WITH parsed_data AS (",
        "  SELECT",
        '    try_cast("timestamp" AS TIMESTAMP) AS time,',
        "    equipment,",
        "    CAST(ph AS DOUBLE) AS pH,",
        "    CAST(rpm AS INTEGER) AS RPM,",
        "    CAST(tcd AS DOUBLE) AS TCD,",
        "    CAST(temperature AS DOUBLE) AS temperature",
        "  FROM bioreactor_db.sensor_data",
        "  WHERE ((year = '2025' AND month = '09' AND day = '02')" +
          " OR (year = '2025' AND month = '09' AND day = '01')" +
          " OR (year = '2025' AND month = '08' AND day = '31')" +
          " OR (year = '2025' AND month = '08' AND day = '30')" +
          " OR (year = '2025' AND month = '08' AND day = '29')" +
          " OR (year = '2025' AND month = '08' AND day = '28'))",
        "    AND equipment IN ('25080001', '25080002')",
        ")",
        "SELECT time, equipment, pH, RPM, TCD, temperature",
        "FROM parsed_data",
        "WHERE time IS NOT NULL",
        "  AND time >= TIMESTAMP '2025-08-28 12:00:00'",
      ].join("\n")
    );
  });

  it("honours a custom window and bound", () => {
    const sql = buildTimeSeriesQuery({ equipment: ["25080001"], now, lookbackDays: 0, trailingHours: 6 });
    expect(sql).toContain("  WHERE ((year = '2025' AND month = '09' AND day = '02'))\n");
    expect(sql).toContain("  AND time >= TIMESTAMP '2025-09-02 06:00:00'");
  });

  it("is deterministic for the same inputs", () => {
    const opts = { equipment: ["25080001"], now };
    expect(buildTimeSeriesQuery(opts)).toBe(buildTimeSeriesQuery(opts));
  });

  it("refuses an empty equipment set", () => {
    expect(() => buildTimeSeriesQuery({ equipment: [], now })).toThrow(InvalidEquipmentFilterError);
  });
});

describe("buildLatestValueQuery", () => {
  it("ranks by timestamp within today and yesterday", () => {
    expect(buildLatestValueQuery({ equipment: ["25080001"], now })).toBe(
      [
        "WITH latest_data AS (",
        "  SELECT",
        "    CAST(ph AS DOUBLE) AS value,",
        "    equipment,",
        '    "timestamp",',
        '    ROW_NUMBER() OVER (PARTITION BY equipment ORDER BY "timestamp" DESC) AS rn',
        "  FROM bioreactor_db.sensor_data",
        "  WHERE ((year = '2025' AND month = '09' AND day = '02') OR (year = '2025' AND month = '09' AND day = '01'))",
        "    AND equipment IN ('25080001')",
        "    AND ph IS NOT NULL",
        '    AND "timestamp" IS NOT NULL',
        ")",
        "SELECT value",
        "FROM latest_data",
        "WHERE rn = 1",
      ].join("\n")
    );
  });

  it("casts other metrics by their catalog type and can project equipment", () => {
    const sql = buildLatestValueQuery({ equipment: ["25080001"], now, metric: "rpm", withEquipment: true });
    const lines = sql.split("\n");
    expect(lines).toContain("    CAST(rpm AS INTEGER) AS value,");
    expect(lines).toContain("    AND rpm IS NOT NULL");
    expect(lines).toContain("SELECT equipment, value");
  });

  it("refuses invalid ids passed directly", () => {
    expect(() => buildLatestValueQuery({ equipment: ["a b"], now })).toThrow(InvalidEquipmentFilterError);
  });
});
