import type { PropagationContext } from "../identity/propagation.js";
import type { Logger } from "../logging/logger.js";
import type { ToolResult } from "../tools/types.js";
import type { GatewayClient } from "./gateway-client.js";
import type { AgentChunk, Reasoner } from "./types.js";

export interface TurnInput {
  readonly message: string;
  readonly context: PropagationContext;
  readonly reasoner: Reasoner;
  readonly gateway: Pick<GatewayClient, "callTool">;
  readonly maxIterations: number;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
}

/**
 * One conversational turn: alternate reasoner steps and tool calls until the
 * reasoner answers or the iteration limit is reached.
 */
export async function* runTurn(input: TurnInput): AsyncGenerator<AgentChunk, void, undefined> {
  const { context, signal } = input;
  const toolResults: ToolResult[] = [];

  for (let iteration = 0; iteration < input.maxIterations; iteration++) {
    signal?.throwIfAborted();
    const step = await input.reasoner.next(
      { message: input.message, role: context.role, toolResults, iteration },
      signal,
    );

    if (step.kind === "answer") {
      yield { type: "text", text: step.text };
      yield { type: "done" };
      return;
    }

    yield { type: "tool_call", toolName: step.toolName, arguments: step.arguments };
    const result = await input.gateway.callTool(
      { toolName: step.toolName, arguments: step.arguments, requestingRole: context.role },
      context,
      signal,
    );
    input.logger.debug(
      { requestId: context.requestId, tool: result.toolName, status: result.status },
      "Tool call finished",
    );
    toolResults.push(result);
    yield { type: "tool_result", result };
  }

  input.logger.warn({ requestId: context.requestId, maxIterations: input.maxIterations }, "Iteration limit reached");
  yield { type: "text", text: `I could not finish this request within ${input.maxIterations} steps.` };
  yield { type: "done" };
}
