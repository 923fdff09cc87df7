import {
  EngineExecutionError,
  EngineTimeoutError,
  OperationTimeoutError,
  UnknownToolError,
} from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { ToolRegistry } from "../tools/registry.js";
import { toolFailure, toolSuccess } from "../tools/result.js";
import type { CellValue, RegistryEntry, TabularPayload, ToolExecutor, ToolResult } from "../tools/types.js";
import { retry } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import { parameterNames, type DataEngine, type QueryParams } from "./engine.js";

export interface DispatcherOptions {
  readonly timeoutMs: number;
  /** Extra attempts after an engine timeout. */
  readonly retries: number;
  readonly retryDelayMs?: number;
}

function toParam(value: unknown): CellValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" || typeof value === "number") return value;
  throw new EngineExecutionError("malformed_query", `Cannot bind value of type ${typeof value}`);
}

/** Binds validated arguments to the statement's named parameters; absent optionals become NULL. */
export function bindParameters(sql: string, args: Readonly<Record<string, unknown>>): QueryParams {
  const params: Record<string, CellValue> = {};
  for (const name of parameterNames(sql)) {
    params[name] = toParam(args[name]);
  }
  return params;
}

function describeArgs(args: Readonly<Record<string, unknown>>): string {
  return Object.entries(args)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(", ");
}

function failureCode(err: EngineTimeoutError | EngineExecutionError): string {
  return err instanceof EngineTimeoutError ? err.code : err.reason;
}

/**
 * Maps a named tool call onto its parameterized query. Argument problems are
 * thrown; engine failures come back as error results.
 */
export class ToolExecutorDispatcher implements ToolExecutor {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly engine: DataEngine,
    private readonly logger: Logger,
    private readonly options: DispatcherOptions,
  ) {}

  async execute(
    toolName: string,
    args: Readonly<Record<string, unknown>>,
    signal?: AbortSignal,
  ): Promise<ToolResult> {
    const entry = this.registry.get(toolName);
    if (!entry) throw new UnknownToolError(toolName);

    const validated = this.registry.validate(toolName, args);
    const params = bindParameters(entry.binding.sql, validated);
    const started = performance.now();

    try {
      const payload = await retry(() => this.runQuery(entry, params, signal), {
        maxAttempts: this.options.retries + 1,
        baseDelayMs: this.options.retryDelayMs ?? 100,
        signal,
        shouldRetry: (err) => err instanceof EngineTimeoutError,
        onRetry: (err, attempt) =>
          this.logger.warn({ err, tool: toolName, attempt }, "Engine timed out, retrying"),
      });

      if (payload.rowCount === 0 && entry.binding.emptyResult === "error") {
        throw new EngineExecutionError(
          "not_found",
          `${toolName} found no rows for ${describeArgs(args)}`,
        );
      }

      const result = toolSuccess(toolName, payload, performance.now() - started);
      this.logger.info({ tool: toolName, rows: payload.rowCount, elapsedMs: result.elapsedMs }, "Tool executed");
      return result;
    } catch (err) {
      if (signal?.aborted) throw err;
      if (err instanceof EngineTimeoutError || err instanceof EngineExecutionError) {
        const result = toolFailure(toolName, failureCode(err), err.message, performance.now() - started);
        this.logger.warn({ tool: toolName, code: result.payload.code }, "Tool execution failed");
        return result;
      }
      throw err;
    }
  }

  private async runQuery(
    entry: RegistryEntry,
    params: QueryParams,
    signal?: AbortSignal,
  ): Promise<TabularPayload> {
    try {
      return await withTimeout(
        "execute",
        this.options.timeoutMs,
        (querySignal) => this.engine.query(entry.binding.sql, params, querySignal),
        signal,
      );
    } catch (err) {
      if (err instanceof OperationTimeoutError) {
        throw new EngineTimeoutError(this.options.timeoutMs, { cause: err });
      }
      if (err instanceof EngineTimeoutError || err instanceof EngineExecutionError || signal?.aborted) {
        throw err;
      }
      throw new EngineExecutionError("engine_error", `Data engine failed for ${entry.name}`, { cause: err });
    }
  }
}
