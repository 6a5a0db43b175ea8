import { Pool, PoolClient, QueryResult, QueryResultRow } from "pg";
import { DatabaseConfig } from "../config.js";
import { createLogger } from "../logger.js";

const logger = createLogger("db");

let pool: Pool | null = null;

/**
 * Initialize database connection pool
 */
export function initializeDatabase(config: DatabaseConfig): Pool {
  if (pool) {
    return pool;
  }

  pool = new Pool({
    connectionString: config.connectionString,
    ssl: config.ssl,
    max: config.maxPoolSize || 10,
    idleTimeoutMillis: config.idleTimeoutMillis || 30000,
    connectionTimeoutMillis: config.connectionTimeoutMillis || 5000,
  });

  // Organization names arrive in many scripts; keep every connection on UTF-8
  pool.on("connect", (client) => {
    client.query("SET client_encoding = 'UTF8'").catch((err: unknown) => {
      logger.error({ err }, "Failed to set client_encoding on new connection");
    });
  });

  pool.on("error", (err) => {
    logger.error({ err }, "Unexpected database pool error");
  });

  logger.info("Database connection pool initialized");
  return pool;
}

/**
 * Get database pool instance
 */
export function getPool(): Pool {
  if (!pool) {
    throw new Error("Database not initialized. Call initializeDatabase() first.");
  }
  return pool;
}

/**
 * Execute a query
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

/**
 * Get a client from the pool for transactions
 */
export async function getClient(): Promise<PoolClient> {
  return getPool().connect();
}

/**
 * Close database connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info("Database connection pool closed");
  }
}

export function isDatabaseInitialized(): boolean {
  return pool !== null;
}
