import { z } from "zod";
import type { ToolResult } from "./types.js";

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const toolSuccessSchema = z.object({
  toolName: z.string(),
  status: z.literal("ok"),
  payload: z.object({
    columns: z.array(
      z.object({
        name: z.string(),
        type: z.enum(["string", "integer", "number", "boolean", "null"]),
      }),
    ),
    rows: z.array(z.array(cellSchema)),
    rowCount: z.number().int().min(0),
  }),
  elapsedMs: z.number().min(0),
});

const toolFailureSchema = z.object({
  toolName: z.string(),
  status: z.literal("error"),
  payload: z.object({ code: z.string(), message: z.string() }),
  elapsedMs: z.number().min(0),
});

export const toolResultSchema = z.discriminatedUnion("status", [
  toolSuccessSchema,
  toolFailureSchema,
]);

export const errorBodySchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

export function parseToolResult(raw: unknown): ToolResult | null {
  const parsed = toolResultSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

const propertySchema = z.object({
  type: z.enum(["string", "integer", "number", "boolean"]),
  description: z.string().default(""),
  default: z.union([z.string(), z.number(), z.boolean()]).optional(),
  minimum: z.number().optional(),
  maximum: z.number().optional(),
  pattern: z.string().optional(),
  enum: z.array(z.string()).min(1).optional(),
  restrictedToRoles: z.array(z.string().min(1)).min(1).optional(),
});

export const registryEntrySchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, "tool names are snake_case"),
  description: z.string().min(1),
  inputSchema: z.object({
    type: z.literal("object").default("object"),
    properties: z.record(z.string(), propertySchema).default({}),
    required: z.array(z.string()).default([]),
  }),
  allowedRoles: z.array(z.string().min(1)).min(1).nullable().default(null),
  binding: z.object({
    sql: z.string().min(1),
    emptyResult: z.enum(["empty", "error"]).default("empty"),
  }),
});

export const registryFileSchema = z.object({
  tools: z.array(registryEntrySchema).min(1),
});
