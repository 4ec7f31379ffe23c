/**
 * Cliniq - Warehouse Connection Layer
 *
 * PostgreSQL connection pool behind the small query interface the schema
 * profile and the warehouse tools depend on.
 */

import pg from "pg";
import type { RouterConfig } from "../config/router-config.ts";
import { BackendError, TableNotFoundError, errorMessage } from "../errors.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";

export type WarehouseRow = Record<string, unknown>;

export interface WarehouseQuery {
  sql: string;
  params: unknown[];
}

export interface WarehouseConnection {
  execute(query: WarehouseQuery): Promise<WarehouseRow[]>;
  /** Physical column names of `table`; rejects when the table does not exist. */
  listColumns(table: string): Promise<string[]>;
  /** Idempotent. */
  close(): Promise<void>;
}

export function getConnectionConfig(warehouse: RouterConfig["warehouse"]): pg.PoolConfig {
  return {
    host: warehouse.host,
    port: warehouse.port,
    database: warehouse.database,
    user: warehouse.user,
    password: warehouse.password,
    max: warehouse.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  };
}

/** `schema.table` → [schema, table]; a bare name has no schema. */
export function splitTableName(table: string): { schema?: string; name: string } {
  const dot = table.lastIndexOf(".");
  if (dot < 0) return { name: table };
  return { schema: table.slice(0, dot), name: table.slice(dot + 1) };
}

export class PgWarehouseConnection implements WarehouseConnection {
  private pool: pg.Pool | undefined;

  constructor(
    private readonly poolConfig: pg.PoolConfig,
    private readonly logger: Logger = silentLogger,
  ) {}

  private getPool(): pg.Pool {
    if (!this.pool) {
      this.pool = new pg.Pool(this.poolConfig);
      this.pool.on("error", (err) => {
        this.logger.error("Unexpected pool error:", err.message);
      });
    }
    return this.pool;
  }

  async execute(query: WarehouseQuery): Promise<WarehouseRow[]> {
    try {
      const result = await this.getPool().query<WarehouseRow>({ text: query.sql, values: query.params });
      return result.rows;
    } catch (err) {
      throw new BackendError(`Query execution failed: ${errorMessage(err)}`, err);
    }
  }

  async listColumns(table: string): Promise<string[]> {
    const { schema, name } = splitTableName(table);
    const text = schema
      ? "SELECT column_name FROM information_schema.columns WHERE table_schema = $1 AND table_name = $2 ORDER BY ordinal_position"
      : "SELECT column_name FROM information_schema.columns WHERE table_name = $1 ORDER BY ordinal_position";
    const values = schema ? [schema, name] : [name];
    const result = await this.getPool().query<{ column_name: string }>({ text, values });
    // information_schema answers an empty set for a missing table; callers rely on a rejection.
    if (result.rows.length === 0) throw new TableNotFoundError(table);
    return result.rows.map((r) => r.column_name);
  }

  async close(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = undefined;
      await pool.end();
    }
  }
}
