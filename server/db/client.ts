import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { newDb } from "pg-mem";
import { existsSync, readFileSync, readdirSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { getConfig } from "../config";
import * as schema from "./schema";

const { Pool } = pg;
type Pool = pg.Pool;
type PoolConfig = pg.PoolConfig;

const currentDir = dirname(fileURLToPath(import.meta.url));
const projectRoot = join(currentDir, "..", "..");
const migrationsDir = join(projectRoot, "migrations");

let pool: Pool | null = null;
let db: NodePgDatabase<typeof schema> | null = null;
let memoryPool: Pool | null = null;
let loggedInMemoryWarning = false;

interface Queryable {
  query: (...args: unknown[]) => unknown;
}

interface Connectable {
  connect: (...args: unknown[]) => Promise<unknown>;
}

function isQueryable(target: unknown): target is Queryable {
  return typeof target === "object" && target !== null && "query" in target && typeof target.query === "function";
}

function isConnectable(target: unknown): target is Connectable {
  return typeof target === "object" && target !== null && "connect" in target && typeof target.connect === "function";
}

// Drizzle maps select results by column position
function toArrayRows(result: unknown): unknown {
  if (typeof result !== "object" || result === null || !("rows" in result) || !Array.isArray(result.rows)) {
    return result;
  }

  return {
    ...result,
    rows: result.rows.map((row: unknown) => (typeof row === "object" && row !== null ? Object.values(row) : row)),
  };
}

// pg-mem rejects the `types` and `rowMode` options drizzle passes on query configs,
// so array-mode results are rebuilt here from the keyed rows it returns
function patchQueryMethod(target: unknown): void {
  if (!isQueryable(target)) {
    return;
  }

  const originalQuery = target.query.bind(target);
  target.query = (query: unknown, ...rest: unknown[]) => {
    if (query && typeof query === "object" && !Array.isArray(query)) {
      const normalizedQuery: Record<string, unknown> = { ...query };
      const arrayRows = normalizedQuery.rowMode === "array";
      delete normalizedQuery.types;
      delete normalizedQuery.rowMode;

      const result = originalQuery(normalizedQuery, ...rest);
      if (!arrayRows || rest.some(arg => typeof arg === "function")) {
        return result;
      }
      return Promise.resolve(result).then(toArrayRows);
    }

    return originalQuery(query, ...rest);
  };
}

function patchConnectMethod(target: unknown): void {
  if (!isConnectable(target)) {
    return;
  }

  const originalConnect = target.connect.bind(target);
  target.connect = async (...args: unknown[]) => {
    const client = await originalConnect(...args);
    patchQueryMethod(client);
    return client;
  };
}

function applyMigrations(run: (sql: string) => void): void {
  if (!existsSync(migrationsDir)) {
    return;
  }

  const migrationFiles = readdirSync(migrationsDir)
    .filter(file => file.endsWith(".sql"))
    .sort();

  for (const file of migrationFiles) {
    const sql = readFileSync(join(migrationsDir, file), "utf-8");
    if (sql.trim().length > 0) {
      run(sql);
    }
  }
}

function ensureMemoryPool(): Pool {
  if (memoryPool) {
    return memoryPool;
  }

  const memoryDb = newDb({ autoCreateForeignKeyIndices: true });

  try {
    applyMigrations(sql => memoryDb.public.none(sql));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[db] Failed to apply migrations to in-memory database: ${message}`);
  }

  const adapters = memoryDb.adapters.createPg();
  const pgMemPool = new adapters.Pool();

  patchQueryMethod(pgMemPool);
  patchConnectMethod(pgMemPool);

  memoryPool = pgMemPool;

  if (!loggedInMemoryWarning) {
    console.warn("[db] DATABASE_URL not set; using in-memory pg-mem database. Data will reset on restart.");
    loggedInMemoryWarning = true;
  }

  return pgMemPool;
}

/** A fresh, migrated pg-mem database; used by tests that need real queries. */
export function createMemoryDatabase(): NodePgDatabase<typeof schema> {
  const memoryDb = newDb({ autoCreateForeignKeyIndices: true });
  applyMigrations(sql => memoryDb.public.none(sql));
  const adapters = memoryDb.adapters.createPg();
  const isolatedPool = new adapters.Pool();
  patchQueryMethod(isolatedPool);
  patchConnectMethod(isolatedPool);
  return drizzle(isolatedPool, { schema });
}

export function createDatabase(): NodePgDatabase<typeof schema> {
  if (!db) {
    const connectionString = getConfig().databaseUrl;

    if (connectionString) {
      const config: PoolConfig = {
        connectionString,
        max: parseInt(process.env.DB_POOL_MAX || "5", 10),
        idleTimeoutMillis: parseInt(process.env.DB_IDLE_TIMEOUT_MS || "10000", 10),
      };

      pool = new Pool(config);
    } else {
      pool = ensureMemoryPool();
    }

    db = drizzle(pool, { schema, logger: process.env.DB_DEBUG === "true" });
  }

  return db;
}

export async function shutdownDatabase(): Promise<void> {
  try {
    await pool?.end();
  } catch (error) {
    console.warn("[db] Error while closing connection pool:", error);
  }
  pool = null;
  db = null;
  memoryPool = null;
}

export type AppDatabase = NodePgDatabase<typeof schema>;
