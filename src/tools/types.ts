import type { Role } from "../utils/types.js";

export type CellValue = string | number | boolean | null;
export type ColumnType = "string" | "integer" | "number" | "boolean" | "null";

export interface ColumnInfo {
  readonly name: string;
  readonly type: ColumnType;
}

export interface TabularPayload {
  readonly columns: readonly ColumnInfo[];
  readonly rows: readonly (readonly CellValue[])[];
  readonly rowCount: number;
}

export interface ToolErrorDetail {
  readonly code: string;
  readonly message: string;
}

export interface ToolCall {
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly requestingRole: Role;
}

export interface ToolSuccess {
  readonly toolName: string;
  readonly status: "ok";
  readonly payload: TabularPayload;
  readonly elapsedMs: number;
}

export interface ToolFailure {
  readonly toolName: string;
  readonly status: "error";
  readonly payload: ToolErrorDetail;
  readonly elapsedMs: number;
}

export type ToolResult = ToolSuccess | ToolFailure;

/** Executes one named registry tool. Implemented in-process and over HTTP. */
export interface ToolExecutor {
  execute(
    toolName: string,
    args: Readonly<Record<string, unknown>>,
    signal?: AbortSignal,
  ): Promise<ToolResult>;
}

export type PropertyType = "string" | "integer" | "number" | "boolean";

export interface ToolPropertySchema {
  readonly type: PropertyType;
  readonly description: string;
  readonly default?: string | number | boolean;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly pattern?: string;
  readonly enum?: readonly string[];
  /** Roles allowed to supply this argument. Absent means everyone. */
  readonly restrictedToRoles?: readonly Role[];
}

export interface ToolInputSchema {
  readonly type: "object";
  readonly properties: Readonly<Record<string, ToolPropertySchema>>;
  readonly required: readonly string[];
}

export interface ToolBinding {
  /** Parameterized SQL; named parameters are written `@name`. */
  readonly sql: string;
  /** Whether an empty result set is a valid answer or a lookup failure. */
  readonly emptyResult: "empty" | "error";
}

export interface RegistryEntry {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  /** Null when every authenticated role may call the tool. */
  readonly allowedRoles: readonly Role[] | null;
  readonly binding: ToolBinding;
}
