import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { getPool, initializeDatabase } from "./client.js";
import { DatabaseConfig, getDatabaseConfig } from "../config.js";
import { createLogger } from "../logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const logger = createLogger("migrate");

interface Migration {
  filename: string;
  version: number;
  sql: string;
}

/**
 * Migration filename format: NNN_description.sql
 */
const MIGRATION_FILENAME_PATTERN = /^(\d+)_(.+)\.sql$/;

export function parseMigrationFilename(filename: string): { version: number; description: string } | null {
  const match = filename.match(MIGRATION_FILENAME_PATTERN);
  if (!match) {
    return null;
  }

  const version = parseInt(match[1], 10);
  if (isNaN(version)) {
    return null;
  }

  return { version, description: match[2] };
}

async function loadMigrations(): Promise<Migration[]> {
  const migrationsDir = path.join(__dirname, "migrations");
  const files = await fs.readdir(migrationsDir);

  const migrations: Migration[] = [];
  const errors: string[] = [];

  for (const file of files) {
    if (!file.endsWith(".sql")) continue;

    const parsed = parseMigrationFilename(file);
    if (!parsed) {
      errors.push(`Invalid migration filename: ${file}. Expected format: NNN_description.sql`);
      continue;
    }

    const sql = await fs.readFile(path.join(migrationsDir, file), "utf-8");
    migrations.push({ filename: file, version: parsed.version, sql });
  }

  if (errors.length > 0) {
    throw new Error(`Migration filename validation failed:\n${errors.join("\n")}`);
  }

  return migrations.sort((a, b) => a.version - b.version);
}

async function createMigrationsTable(): Promise<void> {
  await getPool().query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      filename VARCHAR(255) NOT NULL,
      applied_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrations(): Promise<number[]> {
  const result = await getPool().query<{ version: number }>(
    "SELECT version FROM schema_migrations ORDER BY version"
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(migration: Migration): Promise<void> {
  const client = await getPool().connect();

  try {
    await client.query("BEGIN");
    await client.query(migration.sql);
    await client.query(
      "INSERT INTO schema_migrations (version, filename) VALUES ($1, $2)",
      [migration.version, migration.filename]
    );
    await client.query("COMMIT");
    logger.info({ migration: migration.filename }, "Applied migration");
  } catch (error) {
    await client.query("ROLLBACK");
    logger.error({ err: error, migration: migration.filename }, "Failed to apply migration");
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Run all pending migrations
 */
export async function runMigrations(config?: DatabaseConfig): Promise<number> {
  if (config) {
    initializeDatabase(config);
  }

  await createMigrationsTable();

  const migrations = await loadMigrations();
  const appliedVersions = await getAppliedMigrations();
  const pending = migrations.filter((m) => !appliedVersions.includes(m.version));

  if (pending.length === 0) {
    return 0;
  }

  logger.info({ count: pending.length }, "Applying pending migrations");
  for (const migration of pending) {
    await applyMigration(migration);
  }
  return pending.length;
}

/**
 * CLI runner for migrations
 */
if (import.meta.url === `file://${process.argv[1]}`) {
  const config = getDatabaseConfig();
  if (!config) {
    logger.error("DATABASE_URL is not set");
    process.exit(1);
  }

  runMigrations(config)
    .then((applied) => {
      logger.info({ applied }, "Migration complete");
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error({ err: error }, "Migration failed");
      process.exit(1);
    });
}
