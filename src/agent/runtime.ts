import { Hono } from "hono";
import { stream } from "hono/streaming";
import { z } from "zod";
import { AnalyticsError, InvocationCancelled, errorBody, httpStatusFor } from "../errors.js";
import { fromHeaders } from "../identity/propagation.js";
import type { TokenVerifier } from "../identity/verifier.js";
import type { Logger } from "../logging/logger.js";
import type { ToolResult } from "../tools/types.js";
import type { GatewayClient } from "./gateway-client.js";
import { runTurn } from "./loop.js";
import { NDJSON_CONTENT_TYPE, encodeChunk } from "./stream.js";
import type { AgentChunk, Reasoner } from "./types.js";

export interface RuntimeAppDeps {
  readonly verifier: TokenVerifier;
  readonly reasoner: Reasoner;
  readonly gateway: Pick<GatewayClient, "callTool">;
  readonly logger: Logger;
  readonly maxIterations: number;
}

const invocationSchema = z.object({
  message: z.string().trim().min(1),
  stream: z.boolean().default(false),
});

function errorChunk(err: unknown): AgentChunk {
  const { error } = errorBody(err);
  return { type: "error", code: error.code, message: error.message };
}

/** Agent runtime: authenticates the caller, then runs one turn per invocation. */
export function createRuntimeApp(deps: RuntimeAppDeps): Hono {
  const { logger } = deps;
  const app = new Hono();

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.post("/invocations", async (c) => {
    const context = fromHeaders(c.req.raw.headers);
    if (!context) {
      return c.json({ error: { code: "token_rejected", message: "Missing identity headers" } }, 401);
    }

    try {
      await deps.verifier.verifyContext(context);
    } catch (err) {
      logger.warn({ err, requestId: context.requestId }, "Invocation rejected");
      return c.json(errorBody(err), httpStatusFor(err));
    }

    const parsed = invocationSchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: { code: "invalid_request", message: "Expected { message, stream }" } }, 400);
    }
    const { message } = parsed.data;
    logger.info({ requestId: context.requestId, userId: context.userId, stream: parsed.data.stream }, "Invocation received");

    const turn = (signal: AbortSignal) =>
      runTurn({
        message,
        context,
        reasoner: deps.reasoner,
        gateway: deps.gateway,
        maxIterations: deps.maxIterations,
        logger,
        signal,
      });

    if (parsed.data.stream) {
      c.header("Content-Type", NDJSON_CONTENT_TYPE);
      return stream(c, async (out) => {
        const controller = new AbortController();
        out.onAbort(() => controller.abort(new InvocationCancelled()));
        try {
          for await (const chunk of turn(controller.signal)) {
            await out.write(encodeChunk(chunk));
          }
        } catch (err) {
          if (controller.signal.aborted) {
            logger.debug({ requestId: context.requestId }, "Invocation cancelled by caller");
            return;
          }
          logger.error({ err, requestId: context.requestId }, "Invocation failed");
          await out.write(encodeChunk(errorChunk(err)));
        }
      });
    }

    const texts: string[] = [];
    const toolResults: ToolResult[] = [];
    try {
      for await (const chunk of turn(c.req.raw.signal)) {
        if (chunk.type === "text") texts.push(chunk.text);
        if (chunk.type === "tool_result") toolResults.push(chunk.result);
      }
    } catch (err) {
      if (!(err instanceof AnalyticsError)) {
        logger.error({ err, requestId: context.requestId }, "Invocation failed");
      }
      return c.json(errorBody(err), httpStatusFor(err));
    }

    return c.json({ requestId: context.requestId, text: texts.join("\n"), toolResults });
  });

  return app;
}
