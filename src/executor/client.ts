import { InvalidArgumentError, UnknownToolError, UpstreamError } from "../errors.js";
import { errorBodySchema, parseToolResult } from "../tools/schema.js";
import type { ToolExecutor, ToolResult } from "../tools/types.js";
import { joinUrl, readJson, type FetchFn } from "../utils/http.js";
import { INTERNAL_KEY_HEADER } from "./server.js";

/** ToolExecutor that forwards to a remote executor app. */
export class HttpToolExecutor implements ToolExecutor {
  constructor(
    private readonly baseUrl: string,
    private readonly internalKey: string,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async execute(
    toolName: string,
    args: Readonly<Record<string, unknown>>,
    signal?: AbortSignal,
  ): Promise<ToolResult> {
    let res: Response;
    try {
      res = await this.fetchFn(joinUrl(this.baseUrl, "/execute"), {
        method: "POST",
        headers: { "content-type": "application/json", [INTERNAL_KEY_HEADER]: this.internalKey },
        body: JSON.stringify({ toolName, arguments: args }),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      throw new UpstreamError("executor", 0, "Executor is unreachable", { cause: err });
    }

    const body = await readJson(res);
    if (res.ok) {
      const result = parseToolResult(body);
      if (!result) throw new UpstreamError("executor", res.status, "Executor returned a malformed result");
      return result;
    }

    const error = errorBodySchema.safeParse(body);
    const message = error.success ? error.data.error.message : `Executor answered ${res.status}`;
    if (error.success && error.data.error.code === "invalid_argument") {
      throw new InvalidArgumentError(message);
    }
    if (error.success && error.data.error.code === "unknown_tool") {
      throw new UnknownToolError(toolName);
    }
    throw new UpstreamError("executor", res.status, message);
  }
}
