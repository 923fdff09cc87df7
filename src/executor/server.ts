import { Hono } from "hono";
import { timingSafeEqual } from "node:crypto";
import { z } from "zod";
import { errorBody, httpStatusFor } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { ToolExecutor } from "../tools/types.js";

export const INTERNAL_KEY_HEADER = "x-internal-key";

const executeRequestSchema = z.object({
  toolName: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).default({}),
});

function keysMatch(expected: string, actual: string | undefined): boolean {
  if (!actual) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(actual);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Internal execution endpoint. Only the gateway holds the key; no user
 * credentials ever reach this hop.
 */
export function createExecutorApp(executor: ToolExecutor, internalKey: string, logger: Logger): Hono {
  const app = new Hono();

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.use("/execute", async (c, next) => {
    if (!keysMatch(internalKey, c.req.header(INTERNAL_KEY_HEADER))) {
      logger.warn({ path: c.req.path }, "Rejected request without a valid internal key");
      return c.json({ error: { code: "forbidden", message: "Invalid internal key" } }, 403);
    }
    await next();
  });

  app.post("/execute", async (c) => {
    const parsed = executeRequestSchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: { code: "invalid_request", message: "Expected { toolName, arguments }" } }, 400);
    }

    try {
      const result = await executor.execute(parsed.data.toolName, parsed.data.arguments, c.req.raw.signal);
      return c.json(result);
    } catch (err) {
      const status = httpStatusFor(err);
      if (status === 500) logger.error({ err, tool: parsed.data.toolName }, "Execution failed");
      return c.json(errorBody(err), status);
    }
  });

  return app;
}
