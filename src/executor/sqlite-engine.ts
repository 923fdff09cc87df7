import Database from "better-sqlite3";
import { readFileSync } from "node:fs";
import { EngineExecutionError } from "../errors.js";
import type { CellValue, ColumnInfo, ColumnType, TabularPayload } from "../tools/types.js";
import type { DataEngine, QueryParams } from "./engine.js";

export interface SqliteEngineOptions {
  /** SQL script run once when the database opens. */
  readonly seedSql?: string;
  readonly maxRows?: number;
}

const DEFAULT_MAX_ROWS = 1_000;

function toCell(value: unknown): CellValue {
  if (value === null || typeof value === "string" || typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  throw new EngineExecutionError("malformed_result", `Unsupported value of type ${typeof value} in result`);
}

function inferType(rows: readonly (readonly CellValue[])[], index: number): ColumnType {
  let type: ColumnType = "null";
  for (const row of rows) {
    const value = row[index];
    if (value === null || value === undefined) continue;
    if (typeof value === "string") return "string";
    if (!Number.isInteger(value)) return "number";
    type = "integer";
  }
  return type;
}

function engineMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** DataEngine over a SQLite database. Only read-only statements are allowed. */
export class SqliteDataEngine implements DataEngine {
  private readonly db: Database.Database;
  private readonly maxRows: number;

  constructor(path = ":memory:", options: SqliteEngineOptions = {}) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    if (options.seedSql) this.db.exec(options.seedSql);
    this.maxRows = options.maxRows ?? DEFAULT_MAX_ROWS;
  }

  static open(path: string, seedPath?: string): SqliteDataEngine {
    const seedSql = seedPath ? readFileSync(seedPath, "utf-8") : undefined;
    return new SqliteDataEngine(path, { seedSql });
  }

  async query(sql: string, params: QueryParams, signal?: AbortSignal): Promise<TabularPayload> {
    signal?.throwIfAborted();

    let statement: Database.Statement;
    try {
      statement = this.db.prepare(sql);
    } catch (err) {
      throw new EngineExecutionError("malformed_query", `Query rejected by engine: ${engineMessage(err)}`, {
        cause: err,
      });
    }
    if (!statement.reader) {
      throw new EngineExecutionError("permission_denied", "Only read-only statements may run against the data engine");
    }

    let raw: unknown[];
    try {
      raw = statement.raw(true).all(params);
    } catch (err) {
      throw new EngineExecutionError("engine_error", `Query failed: ${engineMessage(err)}`, { cause: err });
    }

    const rows = raw.slice(0, this.maxRows).map((row) => {
      if (!Array.isArray(row)) {
        throw new EngineExecutionError("malformed_result", "Engine returned a non-tabular row");
      }
      return row.map(toCell);
    });
    const columns: ColumnInfo[] = statement
      .columns()
      .map((column, index) => ({ name: column.name, type: inferType(rows, index) }));

    return { columns, rows, rowCount: rows.length };
  }

  close(): void {
    this.db.close();
  }
}
