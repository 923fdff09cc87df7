import {
  AnalyticsError,
  AuthorizationError,
  InvocationCancelled,
  OperationTimeoutError,
  TokenRejectedError,
  UpstreamError,
} from "../errors.js";
import { toHeaders, type PropagationContext } from "../identity/propagation.js";
import type { Logger } from "../logging/logger.js";
import { errorBodySchema } from "../tools/schema.js";
import type { ToolResult } from "../tools/types.js";
import { joinUrl, readJson, type FetchFn } from "../utils/http.js";
import type { RequestId } from "../utils/types.js";
import { NDJSON_CONTENT_TYPE, decodeChunks } from "./stream.js";
import { completeAnswerSchema, type AgentChunk } from "./types.js";

export interface CompleteResponse {
  readonly kind: "complete";
  readonly requestId: RequestId;
  readonly text: string;
  readonly toolResults: readonly ToolResult[];
}

/** Lazy, finite and single-use. Breaking out of the loop releases the connection. */
export interface StreamingResponse extends AsyncIterable<AgentChunk> {
  readonly kind: "stream";
  readonly requestId: RequestId;
  cancel(): void;
}

export type AgentResponse = CompleteResponse | StreamingResponse;

export interface InvokeOptions {
  readonly signal?: AbortSignal;
  readonly stream?: boolean;
}

export interface AgentClientOptions {
  readonly invokeTimeoutMs: number;
  readonly fetchFn?: FetchFn;
}

/**
 * Bounds one invocation: aborted by the caller's signal, `cancel()` or the
 * timeout, whichever comes first.
 */
class InvocationScope {
  readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly onParentAbort = () => this.controller.abort(new InvocationCancelled());

  constructor(
    timeoutMs: number,
    private readonly parent?: AbortSignal,
  ) {
    if (parent?.aborted) throw new InvocationCancelled();
    parent?.addEventListener("abort", this.onParentAbort, { once: true });
    this.timer = setTimeout(
      () => this.controller.abort(new OperationTimeoutError("invoke", timeoutMs)),
      timeoutMs,
    );
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(): void {
    this.controller.abort(new InvocationCancelled());
  }

  /** The error that explains why the scope ended, or a transport failure. */
  failure(err: unknown): Error {
    if (this.signal.aborted) {
      const reason: unknown = this.signal.reason;
      return reason instanceof OperationTimeoutError ? reason : new InvocationCancelled();
    }
    if (err instanceof AnalyticsError) return err;
    return new UpstreamError("runtime", 0, "Agent runtime is unreachable", { cause: err });
  }

  release(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener("abort", this.onParentAbort);
  }
}

/** Sends a user message to the agent runtime under the caller's identity. */
export class AgentInvocationClient {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly baseUrl: string,
    private readonly logger: Logger,
    private readonly options: AgentClientOptions,
  ) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  invoke(
    message: string,
    context: PropagationContext,
    options: InvokeOptions & { readonly stream: true },
  ): Promise<StreamingResponse>;
  invoke(
    message: string,
    context: PropagationContext,
    options?: InvokeOptions & { readonly stream?: false },
  ): Promise<CompleteResponse>;
  async invoke(message: string, context: PropagationContext, options: InvokeOptions = {}): Promise<AgentResponse> {
    const scope = new InvocationScope(this.options.invokeTimeoutMs, options.signal);
    const streaming = options.stream === true;

    let res: Response;
    try {
      res = await this.fetchFn(joinUrl(this.baseUrl, "/invocations"), {
        method: "POST",
        headers: {
          ...toHeaders(context),
          "content-type": "application/json",
          accept: streaming ? NDJSON_CONTENT_TYPE : "application/json",
        },
        body: JSON.stringify({ message, stream: streaming }),
        signal: scope.signal,
      });
      if (!res.ok) throw await this.statusError(res);
    } catch (err) {
      scope.release();
      throw this.logged(scope.failure(err), context);
    }

    if (streaming) return this.streaming(res, scope, context);

    try {
      const parsed = completeAnswerSchema.safeParse(await readJson(res));
      if (!parsed.success) {
        throw new UpstreamError("runtime", res.status, "Agent runtime returned a malformed answer");
      }
      return {
        kind: "complete",
        requestId: context.requestId,
        text: parsed.data.text,
        toolResults: parsed.data.toolResults,
      };
    } catch (err) {
      throw this.logged(scope.failure(err), context);
    } finally {
      scope.release();
    }
  }

  private streaming(res: Response, scope: InvocationScope, context: PropagationContext): StreamingResponse {
    const body = res.body;
    if (!body) {
      scope.release();
      throw new UpstreamError("runtime", res.status, "Agent runtime sent no stream");
    }

    const logged = (err: Error) => this.logged(err, context);
    const chunks = async function* (): AsyncGenerator<AgentChunk, void, undefined> {
      try {
        for await (const chunk of decodeChunks(body, scope.signal)) {
          // A hop further down refused the token mid-turn; the caller must log in again.
          if (chunk.type === "error" && chunk.code === "token_rejected") {
            throw new TokenRejectedError(chunk.message);
          }
          yield chunk;
        }
      } catch (err) {
        throw logged(scope.failure(err));
      } finally {
        scope.release();
      }
    };

    const iterator = chunks();
    let consumed = false;
    return {
      kind: "stream",
      requestId: context.requestId,
      cancel: () => scope.cancel(),
      [Symbol.asyncIterator]() {
        if (consumed) throw new Error("Agent response stream can only be consumed once");
        consumed = true;
        return iterator;
      },
    };
  }

  private async statusError(res: Response): Promise<Error> {
    const error = errorBodySchema.safeParse(await readJson(res));
    const message = error.success ? error.data.error.message : `Agent runtime answered ${res.status}`;
    if (res.status === 401) return new TokenRejectedError(message);
    if (res.status === 403) return new AuthorizationError(message);
    return new UpstreamError("runtime", res.status, message);
  }

  private logged(err: Error, context: PropagationContext): Error {
    if (err instanceof InvocationCancelled) {
      this.logger.debug({ requestId: context.requestId }, "Invocation cancelled");
    } else {
      this.logger.warn({ err, requestId: context.requestId }, "Invocation failed");
    }
    return err;
  }
}
