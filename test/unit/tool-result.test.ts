import { describe, it, expect } from "vitest";
import { describeResult, renderTable, toolFailure, toolSuccess } from "../../src/tools/result.js";
import { parseToolResult } from "../../src/tools/schema.js";
import type { TabularPayload } from "../../src/tools/types.js";

const payload: TabularPayload = {
  columns: [
    { name: "region", type: "string" },
    { name: "revenue", type: "number" },
  ],
  rows: [
    ["North", 250.5],
    ["South|East", 200],
    ["West", null],
  ],
  rowCount: 3,
};

describe("renderTable", () => {
  it("renders a markdown table", () => {
    expect(renderTable(payload)).toBe(
      [
        "| region | revenue |",
        "| --- | --- |",
        "| North | 250.50 |",
        "| South\\|East | 200 |",
        "| West |  |",
      ].join("\n"),
    );
  });

  it("truncates long results", () => {
    expect(renderTable(payload, 1)).toBe(
      ["| region | revenue |", "| --- | --- |", "| North | 250.50 |", "\n…and 2 more rows"].join("\n"),
    );
  });

  it("handles a column-less payload", () => {
    expect(renderTable({ columns: [], rows: [], rowCount: 0 })).toBe("(no columns)");
  });
});

describe("tool results", () => {
  it("rounds elapsed time", () => {
    expect(toolSuccess("sales_trend", payload, 12.6).elapsedMs).toBe(13);
    expect(toolFailure("x", "engine_error", "boom", 0.4).elapsedMs).toBe(0);
  });

  it("describes successes and failures", () => {
    expect(describeResult(toolSuccess("sales_trend", payload, 12))).toBe("sales_trend: 3 rows in 12ms");
    expect(describeResult(toolFailure("inventory_check", "not_found", "no rows", 3))).toBe(
      "inventory_check: not_found (no rows)",
    );
  });

  it("parses results received over the wire", () => {
    const wire: unknown = JSON.parse(JSON.stringify(toolFailure("x", "engine_timeout", "slow", 5)));
    expect(parseToolResult(wire)).toEqual({
      toolName: "x",
      status: "error",
      payload: { code: "engine_timeout", message: "slow" },
      elapsedMs: 5,
    });
    expect(parseToolResult({ toolName: "x", status: "maybe" })).toBeNull();
  });
});
