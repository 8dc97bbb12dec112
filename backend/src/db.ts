// backend/src/db.ts
import fs from "fs";
import path from "path";
import { Pool, type QueryResultRow } from "pg";
import type { Logger } from "./logging";
import { errorMessage } from "./logging";

export interface Database {
  query(text: string, params?: unknown[]): Promise<QueryResultRow[]>;
}

function preview(text: string): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > 100 ? `${flat.substring(0, 100)}...` : flat;
}

export class PgDatabase implements Database {
  private readonly pool: Pool;

  constructor(connectionString: string, private readonly log: Logger) {
    this.pool = new Pool({ connectionString, max: 10, idleTimeoutMillis: 30000, connectionTimeoutMillis: 5000 });
    this.pool.on("error", (err) => {
      this.log.error("Unexpected error on idle PostgreSQL client", { error: errorMessage(err) });
    });
  }

  async query(text: string, params: unknown[] = []): Promise<QueryResultRow[]> {
    const start = Date.now();
    try {
      const res = await this.pool.query(text, params);
      this.log.info("Executed query", { text: preview(text), durationMs: Date.now() - start, rows: res.rowCount });
      return res.rows;
    } catch (error) {
      this.log.error("Query failed", { text: preview(text), durationMs: Date.now() - start, error: errorMessage(error) });
      throw new Error(`Database query failed: ${errorMessage(error)}`);
    }
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}

export async function testDatabaseConnection(db: Database, log: Logger): Promise<boolean> {
  try {
    await db.query("SELECT 1");
    return true;
  } catch (error) {
    log.error("Database connection test failed", { error: errorMessage(error) });
    return false;
  }
}

function findSchemaFile(): string {
  const candidates = [
    path.resolve(__dirname, "..", "db", "schema.sql"),
    path.resolve(process.cwd(), "backend", "db", "schema.sql"),
    path.resolve(process.cwd(), "db", "schema.sql"),
  ];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`schema.sql not found (looked in ${candidates.join(", ")})`);
  }
  return found;
}

export async function ensureSchema(db: Database): Promise<void> {
  const sql = fs.readFileSync(findSchemaFile(), "utf8");
  await db.query(sql);
}
