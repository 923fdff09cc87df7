import { z } from "zod";
import { toolResultSchema } from "../tools/schema.js";
import type { ToolResult } from "../tools/types.js";
import type { Role } from "../utils/types.js";

/** One NDJSON line of a streamed agent answer. */
export type AgentChunk =
  | { readonly type: "text"; readonly text: string }
  | {
      readonly type: "tool_call";
      readonly toolName: string;
      readonly arguments: Readonly<Record<string, unknown>>;
    }
  | { readonly type: "tool_result"; readonly result: ToolResult }
  | { readonly type: "error"; readonly code: string; readonly message: string }
  | { readonly type: "done" };

export const agentChunkSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({
    type: z.literal("tool_call"),
    toolName: z.string(),
    arguments: z.record(z.string(), z.unknown()),
  }),
  z.object({ type: z.literal("tool_result"), result: toolResultSchema }),
  z.object({ type: z.literal("error"), code: z.string(), message: z.string() }),
  z.object({ type: z.literal("done") }),
]);

export const completeAnswerSchema = z.object({
  requestId: z.string(),
  text: z.string(),
  toolResults: z.array(toolResultSchema),
});

export interface ReasonerTurn {
  readonly message: string;
  readonly role: Role;
  /** Results gathered so far in this turn, oldest first. */
  readonly toolResults: readonly ToolResult[];
  readonly iteration: number;
}

export type ReasonerStep =
  | {
      readonly kind: "call";
      readonly toolName: string;
      readonly arguments: Readonly<Record<string, unknown>>;
    }
  | { readonly kind: "answer"; readonly text: string };

/** Decides the next step of a turn: call a tool or answer. */
export interface Reasoner {
  next(turn: ReasonerTurn, signal?: AbortSignal): Promise<ReasonerStep>;
}
