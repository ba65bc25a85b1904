// api/src/db.ts
import pg from "pg";
import { parse as parsePg } from "pg-connection-string";
import { AsyncLocalStorage } from "node:async_hooks";
import { config } from "./config.js";
import { AppError } from "./middleware/errorHandler.js";

const { Pool } = pg;

if (!config.databaseUrl) {
  throw new Error("DATABASE_URL must be set to use the database");
}

// Жёстко парсим DATABASE_URL, чтобы PG* env не переопределяли
const cn = parsePg(config.databaseUrl);
const resolvedHost = cn.host || "127.0.0.1";
const isLocalHost =
  resolvedHost === "127.0.0.1" || resolvedHost === "localhost" || resolvedHost === "::1";

export const pool = new Pool({
  host: resolvedHost,
  port: cn.port ? Number(cn.port) : 5432,
  user: cn.user ?? undefined,
  password: cn.password ?? undefined,
  database: cn.database ?? undefined,
  // managed Postgres требует SSL, локальный обычно нет
  ssl: isLocalHost ? false : { rejectUnauthorized: false },
  max: 10,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 10_000,
});

const txStorage = new AsyncLocalStorage<pg.PoolClient>();

pool.on("connect", () => {
  if (config.nodeEnv !== "production") console.log("DB: connected");
});
pool.on("error", (err) => {
  console.error("DB: unexpected error", err);
});

/** Универсальный helper для SQL-запросов */
export async function q<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<T[]> {
  const t0 = Date.now();
  try {
    const client = txStorage.getStore();
    const res = client ? await client.query<T>(text, params) : await pool.query<T>(text, params);
    if (config.nodeEnv !== "production") {
      console.log(`SQL ok (${Date.now() - t0}ms, rows=${res.rowCount}) ::`, text, params);
    }
    return res.rows;
  } catch (err) {
    const causeMessage = err instanceof Error ? err.message : String(err);
    console.error("DB ERROR:", causeMessage, { text, params });
    throw new AppError("Database operation failed", 500, {
      code: "db_error",
      isOperational: false,
      details: { causeMessage },
    });
  }
}

export async function withTransaction<T>(fn: () => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await txStorage.run(client, async () => fn());
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      console.error("DB: rollback failed", rollbackErr);
    }
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool() {
  await pool.end();
  if (config.nodeEnv !== "production") console.log("DB: pool closed");
}

/**
 * Таблица каталога площадок. cohort_range хранится строкой вида "10-30",
 * разбор и валидация — в facilityCatalog.ts.
 */
export async function ensureFacilitiesSchema() {
  console.log("🔧 Ensuring facilities schema...");
  await q(`
    CREATE TABLE IF NOT EXISTS facilities (
      id serial PRIMARY KEY,
      name text NOT NULL,
      cohort_range text NOT NULL
    );
  `);
  await q(`CREATE INDEX IF NOT EXISTS idx_facilities_name ON facilities(name);`);
  console.log("✅ facilities schema ensured");
}
