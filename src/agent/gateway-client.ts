import { TokenRejectedError } from "../errors.js";
import { toHeaders, type PropagationContext } from "../identity/propagation.js";
import { toolFailure } from "../tools/result.js";
import { errorBodySchema, parseToolResult } from "../tools/schema.js";
import type { ToolCall, ToolResult } from "../tools/types.js";
import { joinUrl, readJson, type FetchFn } from "../utils/http.js";

/**
 * Runtime-side client of the tool gateway. Carries the caller's context
 * unchanged; gateway refusals come back as error results so the
 * conversation can continue.
 */
export class GatewayClient {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async callTool(call: ToolCall, context: PropagationContext, signal?: AbortSignal): Promise<ToolResult> {
    const started = performance.now();
    const elapsed = () => performance.now() - started;

    let res: Response;
    try {
      res = await this.fetchFn(
        joinUrl(this.baseUrl, `/tools/${encodeURIComponent(call.toolName)}/invoke`),
        {
          method: "POST",
          headers: { ...toHeaders(context), "content-type": "application/json" },
          body: JSON.stringify({ arguments: call.arguments }),
          signal,
        },
      );
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      const reason = err instanceof Error ? err.message : String(err);
      return toolFailure(call.toolName, "gateway_unavailable", `Tool gateway is unreachable: ${reason}`, elapsed());
    }

    const body = await readJson(res);
    if (res.status === 401) {
      throw new TokenRejectedError("Tool gateway rejected the access token");
    }
    if (res.ok) {
      return (
        parseToolResult(body) ??
        toolFailure(call.toolName, "malformed_result", "Tool gateway returned a malformed result", elapsed())
      );
    }

    const error = errorBodySchema.safeParse(body);
    return error.success
      ? toolFailure(call.toolName, error.data.error.code, error.data.error.message, elapsed())
      : toolFailure(call.toolName, "gateway_error", `Tool gateway answered ${res.status}`, elapsed());
  }
}
