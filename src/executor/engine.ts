import type { CellValue, TabularPayload } from "../tools/types.js";

export type QueryParams = Readonly<Record<string, CellValue>>;

/**
 * The data engine boundary: parameterized query in, tabular result out.
 * Implementations throw EngineTimeoutError or EngineExecutionError.
 */
export interface DataEngine {
  query(sql: string, params: QueryParams, signal?: AbortSignal): Promise<TabularPayload>;
  close(): void;
}

const PARAM_PATTERN = /@([A-Za-z_][A-Za-z0-9_]*)/g;

/** Named parameters referenced by a statement, in order of first use. */
export function parameterNames(sql: string): string[] {
  const names = new Set<string>();
  for (const match of sql.matchAll(PARAM_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}
