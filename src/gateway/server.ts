import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import { AnalyticsError, errorBody, httpStatusFor } from "../errors.js";
import { fromHeaders, type PropagationContext } from "../identity/propagation.js";
import type { Logger } from "../logging/logger.js";
import type { ToolGatewayRouter } from "./router.js";

const invokeBodySchema = z.object({
  arguments: z.record(z.string(), z.unknown()).default({}),
});

const MISSING_IDENTITY = {
  error: { code: "token_rejected", message: "Missing identity headers" },
} as const;

type Env = { Variables: { identity: PropagationContext } };

const requireIdentity: MiddlewareHandler<Env> = async (c, next) => {
  const context = fromHeaders(c.req.raw.headers);
  if (!context) return c.json(MISSING_IDENTITY, 401);
  c.set("identity", context);
  await next();
};

/** HTTP face of the tool gateway. */
export function createGatewayApp(router: ToolGatewayRouter, logger: Logger): Hono<Env> {
  const app = new Hono<Env>();

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/tools", requireIdentity, async (c) => {
    try {
      const tools = await router.listTools(c.get("identity"));
      return c.json({
        tools: tools.map((tool) => ({
          name: tool.name,
          description: tool.description,
          inputSchema: tool.inputSchema,
        })),
      });
    } catch (err) {
      return c.json(errorBody(err), httpStatusFor(err));
    }
  });

  app.post("/tools/:name/invoke", requireIdentity, async (c) => {
    const context = c.get("identity");
    const toolName = c.req.param("name");
    const parsed = invokeBodySchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: { code: "invalid_request", message: "Expected { arguments }" } }, 400);
    }

    try {
      const result = await router.route(
        { toolName, arguments: parsed.data.arguments, requestingRole: context.role },
        context,
        c.req.raw.signal,
      );
      return c.json(result);
    } catch (err) {
      const status = httpStatusFor(err);
      if (err instanceof AnalyticsError) {
        logger.info({ requestId: context.requestId, tool: toolName, code: err.code }, "Tool call rejected");
      } else {
        logger.error({ err, requestId: context.requestId, tool: toolName }, "Tool call failed");
      }
      return c.json(errorBody(err), status);
    }
  });

  return app;
}
