import { describe, it, expect } from "vitest";
import { HELP_TEXT, IntentReasoner, detectIntent, parseMonths, summarize } from "../../src/agent/reasoner.js";
import { toolFailure, toolSuccess } from "../../src/tools/result.js";

describe("parseMonths", () => {
  it("reads explicit and named periods", () => {
    expect(parseMonths("last 3 months")).toBe(3);
    expect(parseMonths("over the last year")).toBe(12);
    expect(parseMonths("this quarter")).toBe(3);
    expect(parseMonths("recently")).toBeUndefined();
  });
});

describe("detectIntent", () => {
  it("routes warehouse questions to inventory_check", () => {
    expect(detectIntent("Check inventory for wh001")).toEqual({
      toolName: "inventory_check",
      arguments: { warehouse_id: "WH001" },
    });
  });

  it("asks for a missing warehouse", () => {
    expect(detectIntent("How is our stock looking?")).toEqual({
      ask: "Which warehouse should I check? Include an ID such as WH001.",
    });
  });

  it("routes order lookups to order_detail", () => {
    expect(detectIntent("Show order details for ord-12345")).toEqual({
      toolName: "order_detail",
      arguments: { order_id: "ORD-12345" },
    });
    expect(detectIntent("What is the order status?")).toEqual({
      ask: "Which order should I look up? Include an ID such as ORD-12345.",
    });
  });

  it("reads a top-N customer limit", () => {
    expect(detectIntent("Who are our top 5 customers?")).toEqual({
      toolName: "customer_insight",
      arguments: { limit: 5 },
    });
  });

  it("asks for costs only when mentioned", () => {
    expect(detectIntent("Product performance with cost for the last 3 months")).toEqual({
      toolName: "product_performance",
      arguments: { months: 3, include_cost: true },
    });
    expect(detectIntent("How are our products doing?")).toEqual({
      toolName: "product_performance",
      arguments: { months: 6 },
    });
  });

  it("prefers the regional breakdown over the sales trend", () => {
    expect(detectIntent("Sales by region this quarter")).toEqual({
      toolName: "regional_breakdown",
      arguments: { months: 3 },
    });
  });

  it("falls back to the sales trend", () => {
    expect(detectIntent("What is the sales trend?")).toEqual({ toolName: "sales_trend", arguments: {} });
    expect(detectIntent("Revenue for the last 12 months")).toEqual({
      toolName: "sales_trend",
      arguments: { months: 12 },
    });
  });

  it("returns null for small talk", () => {
    expect(detectIntent("hello there")).toBeNull();
  });
});

describe("summarize", () => {
  it("explains a permission refusal", () => {
    const result = toolFailure(
      "customer_insight",
      "authorization_denied",
      "Role 'analyst' is not allowed to call customer_insight",
      1,
    );
    expect(summarize(result)).toBe(
      "You don't have permission to view the top customers. Role 'analyst' is not allowed to call customer_insight.",
    );
  });

  it("passes other failures through", () => {
    const result = toolFailure("inventory_check", "not_found", "inventory_check found no rows for warehouse_id=WH999", 1);
    expect(summarize(result)).toBe(
      "I couldn't get the inventory status: inventory_check found no rows for warehouse_id=WH999",
    );
  });

  it("reports empty results", () => {
    expect(summarize(toolSuccess("sales_trend", { columns: [], rows: [], rowCount: 0 }, 1))).toBe(
      "No data was found for the monthly sales trend.",
    );
  });

  it("renders rows as a table with a source line", () => {
    const result = toolSuccess(
      "regional_breakdown",
      {
        columns: [
          { name: "region", type: "string" },
          { name: "total_revenue", type: "integer" },
        ],
        rows: [["North", 250]],
        rowCount: 1,
      },
      1,
    );
    expect(summarize(result)).toBe(
      "Here is the regional breakdown:\n\n| region | total_revenue |\n| --- | --- |\n| North | 250 |\n\nSource: regional_breakdown",
    );
  });
});

describe("IntentReasoner", () => {
  const reasoner = new IntentReasoner();
  const base = { role: "analyst", iteration: 0, toolResults: [] };

  it("answers with help when no tool fits", async () => {
    expect(await reasoner.next({ ...base, message: "hi" })).toEqual({ kind: "answer", text: HELP_TEXT });
  });

  it("calls a tool first, then answers from its result", async () => {
    const message = "inventory for WH001";
    expect(await reasoner.next({ ...base, message })).toEqual({
      kind: "call",
      toolName: "inventory_check",
      arguments: { warehouse_id: "WH001" },
    });

    const result = toolSuccess("inventory_check", { columns: [], rows: [], rowCount: 0 }, 1);
    expect(await reasoner.next({ ...base, message, iteration: 1, toolResults: [result] })).toEqual({
      kind: "answer",
      text: "No data was found for the inventory status.",
    });
  });
});
