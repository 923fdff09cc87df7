import { renderTable } from "../tools/result.js";
import type { ToolResult } from "../tools/types.js";
import type { Reasoner, ReasonerStep, ReasonerTurn } from "./types.js";

interface Intent {
  readonly toolName: string;
  readonly arguments: Record<string, unknown>;
}

const DEFAULT_MONTHS = 6;

const LABELS: Record<string, string> = {
  sales_trend: "monthly sales trend",
  customer_insight: "top customers",
  product_performance: "product performance",
  regional_breakdown: "regional breakdown",
  inventory_check: "inventory status",
  order_detail: "order details",
};

export const HELP_TEXT = [
  "I can answer questions about:",
  "- sales trends over the last N months",
  "- top customers (managers only)",
  "- product performance",
  "- regional sales breakdown",
  "- inventory for a warehouse, e.g. WH001",
  "- a single order, e.g. ORD-12345",
].join("\n");

export function parseMonths(message: string): number | undefined {
  const explicit = /(\d+)\s*months?/i.exec(message);
  if (explicit) return Number(explicit[1]);
  if (/\b(year|annual|12 months)\b/i.test(message)) return 12;
  if (/\bquarter\b/i.test(message)) return 3;
  return undefined;
}

type Detection = Intent | { readonly ask: string } | null;

/** Maps a question onto one registry tool and its arguments. */
export function detectIntent(message: string): Detection {
  const text = message.toLowerCase();
  const months = parseMonths(message);

  const warehouse = /\bWH\d{3}\b/i.exec(message);
  if (warehouse || /\b(inventory|stock|warehouse)\b/.test(text)) {
    if (!warehouse) return { ask: "Which warehouse should I check? Include an ID such as WH001." };
    return {
      toolName: "inventory_check",
      arguments: { warehouse_id: warehouse[0].toUpperCase() },
    };
  }

  const order = /\bORD-\d+\b/i.exec(message);
  if (order || /\border (details?|status)\b/.test(text)) {
    if (!order) return { ask: "Which order should I look up? Include an ID such as ORD-12345." };
    return {
      toolName: "order_detail",
      arguments: { order_id: order[0].toUpperCase() },
    };
  }

  if (/\bcustomers?\b/.test(text)) {
    const top = /\btop\s+(\d+)/.exec(text);
    return {
      toolName: "customer_insight",
      arguments: top ? { limit: Number(top[1]) } : {},
    };
  }

  if (/\bproducts?\b/.test(text)) {
    return {
      toolName: "product_performance",
      arguments: {
        months: months ?? DEFAULT_MONTHS,
        ...(/\b(cost|costs|margin)\b/.test(text) ? { include_cost: true } : {}),
      },
    };
  }

  if (/\bregion(s|al)?\b/.test(text)) {
    return {
      toolName: "regional_breakdown",
      arguments: { months: months ?? DEFAULT_MONTHS },
    };
  }

  if (/\b(sales|revenue|trends?)\b/.test(text)) {
    return {
      toolName: "sales_trend",
      arguments: months === undefined ? {} : { months },
    };
  }

  return null;
}

export function summarize(result: ToolResult): string {
  const label = LABELS[result.toolName] ?? result.toolName;
  if (result.status === "error") {
    if (result.payload.code === "authorization_denied") {
      return `You don't have permission to view the ${label}. ${result.payload.message}.`;
    }
    return `I couldn't get the ${label}: ${result.payload.message}`;
  }
  if (result.payload.rowCount === 0) {
    return `No data was found for the ${label}.`;
  }
  return `Here is the ${label}:\n\n${renderTable(result.payload)}\n\nSource: ${result.toolName}`;
}

/**
 * Keyword-driven reasoner: at most one tool call per turn, then a summary of
 * its result. Stands in for a language model behind the same interface.
 */
export class IntentReasoner implements Reasoner {
  async next(turn: ReasonerTurn): Promise<ReasonerStep> {
    const last = turn.toolResults.at(-1);
    if (last) return { kind: "answer", text: summarize(last) };

    const intent = detectIntent(turn.message);
    if (!intent) return { kind: "answer", text: HELP_TEXT };
    if ("ask" in intent) return { kind: "answer", text: intent.ask };
    return { kind: "call", toolName: intent.toolName, arguments: intent.arguments };
  }
}
