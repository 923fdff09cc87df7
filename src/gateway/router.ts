import { AuthorizationError, UnknownToolError } from "../errors.js";
import type { PropagationContext } from "../identity/propagation.js";
import type { TokenVerifier } from "../identity/verifier.js";
import type { Logger } from "../logging/logger.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { RegistryEntry, ToolCall, ToolExecutor, ToolResult } from "../tools/types.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { withTimeout } from "../utils/timeout.js";
import type { RequestId } from "../utils/types.js";
import { authorizeCall } from "./policy.js";

export type RouteState = "received" | "validated" | "authorized" | "dispatched" | "completed" | "rejected";

const TRANSITIONS: Readonly<Record<RouteState, readonly RouteState[]>> = {
  received: ["validated", "rejected"],
  validated: ["authorized", "rejected"],
  authorized: ["dispatched", "rejected"],
  dispatched: ["completed", "rejected"],
  completed: [],
  rejected: [],
};

export interface RouteTransition {
  readonly requestId: RequestId;
  readonly toolName: string;
  readonly from: RouteState | null;
  readonly to: RouteState;
  readonly reason?: string;
}

export interface RouterEvents {
  transition: (event: RouteTransition) => void;
}

export interface RouterOptions {
  readonly toolTimeoutMs: number;
}

/** Follows one request through the state machine; refuses skipped steps. */
class RouteTracker {
  private current: RouteState = "received";

  constructor(
    private readonly notify: (event: RouteTransition) => void,
    private readonly requestId: RequestId,
    private readonly toolName: string,
  ) {
    notify({ requestId, toolName, from: null, to: "received" });
  }

  get state(): RouteState {
    return this.current;
  }

  advance(to: RouteState, reason?: string): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new Error(`Illegal route transition ${this.current} -> ${to}`);
    }
    const from = this.current;
    this.current = to;
    this.notify({ requestId: this.requestId, toolName: this.toolName, from, to, reason });
  }
}

/**
 * Trust boundary between the agent runtime and the executor. Every call is
 * re-authenticated and re-authorized here; the executor only ever sees the
 * tool name and arguments.
 */
export class ToolGatewayRouter extends TypedEventEmitter<RouterEvents> {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly verifier: TokenVerifier,
    private readonly executor: ToolExecutor,
    private readonly logger: Logger,
    private readonly options: RouterOptions,
  ) {
    super();
  }

  /** Registry entries the verified caller's role may call. */
  async listTools(context: PropagationContext): Promise<RegistryEntry[]> {
    const identity = await this.verifier.verifyContext(context);
    return this.registry.visibleTo(identity.role);
  }

  async route(call: ToolCall, context: PropagationContext, signal?: AbortSignal): Promise<ToolResult> {
    const tracker = new RouteTracker(
      (event) => this.record(event),
      context.requestId,
      call.toolName,
    );

    try {
      const identity = await this.verifier.verifyContext(context);
      if (call.requestingRole !== identity.role) {
        throw new AuthorizationError(
          `Requesting role '${call.requestingRole}' does not match the access token role '${identity.role}'`,
        );
      }
      const entry = this.registry.get(call.toolName);
      if (!entry) throw new UnknownToolError(call.toolName);
      tracker.advance("validated");

      authorizeCall(entry, call.arguments, identity.role);
      tracker.advance("authorized");

      tracker.advance("dispatched");
      const result = await withTimeout(
        "tool_call",
        this.options.toolTimeoutMs,
        (callSignal) => this.executor.execute(entry.name, call.arguments, callSignal),
        signal,
      );
      tracker.advance("completed", result.status);
      return result;
    } catch (err) {
      tracker.advance("rejected", err instanceof Error ? err.message : String(err));
      throw err;
    }
  }

  private record(event: RouteTransition): void {
    this.logger.debug(
      { requestId: event.requestId, tool: event.toolName, from: event.from, to: event.to, reason: event.reason },
      "Route transition",
    );
    this.emit("transition", event);
  }
}
