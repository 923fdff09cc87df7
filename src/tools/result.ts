import type { CellValue, TabularPayload, ToolFailure, ToolResult, ToolSuccess } from "./types.js";

export function toolSuccess(toolName: string, payload: TabularPayload, elapsedMs: number): ToolSuccess {
  return Object.freeze({ toolName, status: "ok", payload, elapsedMs: Math.round(elapsedMs) });
}

export function toolFailure(
  toolName: string,
  code: string,
  message: string,
  elapsedMs: number,
): ToolFailure {
  return Object.freeze({
    toolName,
    status: "error",
    payload: { code, message },
    elapsedMs: Math.round(elapsedMs),
  });
}

function formatCell(value: CellValue): string {
  if (value === null) return "";
  if (typeof value === "number" && !Number.isInteger(value)) return value.toFixed(2);
  return String(value).replace(/\|/g, "\\|");
}

/** Markdown table of the first `maxRows` rows. */
export function renderTable(payload: TabularPayload, maxRows = 20): string {
  if (payload.columns.length === 0) return "(no columns)";
  const header = `| ${payload.columns.map((c) => c.name).join(" | ")} |`;
  const divider = `| ${payload.columns.map(() => "---").join(" | ")} |`;
  const body = payload.rows.slice(0, maxRows).map((row) => `| ${row.map(formatCell).join(" | ")} |`);
  const lines = [header, divider, ...body];
  if (payload.rowCount > maxRows) {
    lines.push(`\n…and ${payload.rowCount - maxRows} more rows`);
  }
  return lines.join("\n");
}

export function describeResult(result: ToolResult): string {
  if (result.status === "ok") {
    return `${result.toolName}: ${result.payload.rowCount} rows in ${result.elapsedMs}ms`;
  }
  return `${result.toolName}: ${result.payload.code} (${result.payload.message})`;
}
