import { z } from "zod";
import type { AnalyticsConfig } from "./types.js";

const endpoint = (port: number) => ({
  port: z.number().int().positive().default(port),
  hostname: z.string().default("127.0.0.1"),
  url: z.string().url().optional(),
});

const directoryUserSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  name: z.string().min(1),
  email: z.string().min(1),
  role: z.string().min(1),
});

const identitySchema = z.object({
  ...endpoint(19870),
  issuer: z.string().min(1).default("analytics-identity"),
  signingSecret: z.string().min(16).default("local-development-signing-secret"),
  accessTokenTtlSec: z.number().int().positive().default(3_600),
  refreshTokenTtlSec: z.number().int().positive().default(2_592_000),
  users: z.array(directoryUserSchema).default([]),
});

const sessionSchema = z.object({
  renewalMarginSec: z.number().int().min(0).default(300),
  refreshMaxAttempts: z.number().int().min(1).max(10).default(3),
  refreshBaseDelayMs: z.number().int().positive().default(200),
  loginTimeoutMs: z.number().int().positive().default(10_000),
  refreshTimeoutMs: z.number().int().positive().default(10_000),
});

const runtimeSchema = z.object({
  ...endpoint(19871),
  invokeTimeoutMs: z.number().int().positive().default(120_000),
  maxIterations: z.number().int().min(1).max(50).default(10),
});

const gatewaySchema = z.object({
  ...endpoint(19872),
  verificationCacheTtlMs: z.number().int().min(0).default(60_000),
  toolTimeoutMs: z.number().int().positive().default(30_000),
});

const executorSchema = z.object({
  ...endpoint(19873),
  internalKey: z.string().min(8).default("local-internal-key"),
  timeoutMs: z.number().int().positive().default(15_000),
  retries: z.number().int().min(0).max(3).default(1),
  databasePath: z.string().min(1).default(":memory:"),
  seedPath: z.string().optional(),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const analyticsConfigSchema = z.object({
  identity: identitySchema.default({}),
  session: sessionSchema.default({}),
  runtime: runtimeSchema.default({}),
  gateway: gatewaySchema.default({}),
  executor: executorSchema.default({}),
  registry: z.object({ path: z.string().optional() }).default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): AnalyticsConfig {
  return analyticsConfigSchema.parse(raw);
}

export function serviceUrl(endpoint: { port: number; hostname: string; url?: string }): string {
  return endpoint.url ?? `http://${endpoint.hostname}:${endpoint.port}`;
}
