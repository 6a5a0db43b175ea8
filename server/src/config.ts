import path from "path";
import { fileURLToPath } from "url";
import { ConfigError } from "./errors.js";
import { SEARCH_BACKENDS, type SearchBackendName } from "./types.js";
import type { BackoffConfig } from "./utils/retry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the bundled data directory (geo qualifiers, blocked domains)
 * In dev: __dirname is /server/src, data is at ../data
 * In prod: __dirname is /dist, data is at ../server/data
 */
export function getDataPath(): string {
  if (process.env.DATA_DIR) {
    return path.resolve(process.env.DATA_DIR);
  }
  return process.env.NODE_ENV === "production"
    ? path.join(__dirname, "../server/data")
    : path.join(__dirname, "../data");
}

/**
 * Database configuration from environment
 */
export interface DatabaseConfig {
  connectionString?: string;
  ssl?: boolean | { rejectUnauthorized: boolean };
  maxPoolSize?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Get database configuration from environment variables.
 * Returns null when no database is configured; the JSON file stores are used then.
 */
export function getDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig | null {
  const connectionString = env.DATABASE_URL || env.DATABASE_PRIVATE_URL;

  if (!connectionString) {
    return null;
  }

  let ssl: boolean | { rejectUnauthorized: boolean } = false;
  if (env.DATABASE_SSL === "true") {
    const rejectUnauthorized = env.DATABASE_SSL_REJECT_UNAUTHORIZED !== "false";
    ssl = { rejectUnauthorized };
  }

  return {
    connectionString,
    ssl,
    maxPoolSize: readInt(env, "DATABASE_MAX_POOL_SIZE", 10, 1),
    idleTimeoutMillis: readInt(env, "DATABASE_IDLE_TIMEOUT_MS", 30000, 0),
    connectionTimeoutMillis: readInt(env, "DATABASE_CONNECTION_TIMEOUT_MS", 5000, 0),
  };
}

export interface PipelineConfig {
  searchOrder: SearchBackendName[];
  searchRetry: BackoffConfig;
  fetchRetry: BackoffConfig;
  classifyRetry: BackoffConfig;
  maxContentLength: number;
  minContentLength: number;
  cacheEnabled: boolean;
  cacheMaxAgeMs: number;
  workerCount: number;
  rateLimitIntervalMs: number;
  requestTimeoutMs: number;
  similarityThreshold: number;
  followAboutLinks: boolean;
  outputDir: string;
  userAgent: string;
  google: {
    apiKey?: string;
    engineId?: string;
  };
  anthropicApiKey?: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Build the pipeline configuration from environment variables.
 * Invalid values throw ConfigError instead of silently falling back.
 */
export function getPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const baseDelayMs = readInt(env, "RETRY_BASE_DELAY_MS", 2000, 0);
  const maxDelayMs = readInt(env, "RETRY_MAX_DELAY_MS", 30000, 0);

  return {
    searchOrder: readSearchOrder(env.SEARCH_ORDER),
    searchRetry: {
      maxAttempts: readInt(env, "SEARCH_MAX_ATTEMPTS", 3, 1),
      baseDelayMs,
      maxDelayMs,
    },
    fetchRetry: {
      maxAttempts: readInt(env, "FETCH_MAX_ATTEMPTS", 3, 1),
      baseDelayMs,
      maxDelayMs,
    },
    classifyRetry: {
      maxAttempts: readInt(env, "CLASSIFY_MAX_ATTEMPTS", 3, 1),
      baseDelayMs,
      maxDelayMs,
    },
    maxContentLength: readInt(env, "MAX_CONTENT_LENGTH", 2000, 1),
    minContentLength: readInt(env, "MIN_CONTENT_LENGTH", 100, 0),
    cacheEnabled: readBool(env, "CACHE_ENABLED", true),
    cacheMaxAgeMs: readInt(env, "CACHE_MAX_AGE_DAYS", 30, 0) * DAY_MS,
    workerCount: readInt(env, "WORKER_COUNT", 4, 1),
    rateLimitIntervalMs: readInt(env, "CLASSIFY_RATE_LIMIT_MS", 1000, 0),
    requestTimeoutMs: readInt(env, "REQUEST_TIMEOUT_MS", 10000, 1),
    similarityThreshold: readInt(env, "SIMILARITY_THRESHOLD", 88, 0, 100),
    followAboutLinks: readBool(env, "FOLLOW_ABOUT_LINKS", true),
    outputDir: path.resolve(env.OUTPUT_DIR || "output"),
    userAgent:
      env.HTTP_USER_AGENT ||
      "Mozilla/5.0 (compatible; OrgSectorRegistry/1.0; +https://example.org/bot)",
    google: {
      apiKey: env.GOOGLE_API_KEY || undefined,
      engineId: env.GOOGLE_SEARCH_ENGINE_ID || undefined,
    },
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
  };
}

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, name: string, defaultValue: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) return true;
  if (["false", "0", "no"].includes(normalized)) return false;
  throw new ConfigError(`${name} must be true or false, got "${raw}"`);
}

function readSearchOrder(raw: string | undefined): SearchBackendName[] {
  if (!raw || raw.trim() === "") {
    return [...SEARCH_BACKENDS];
  }

  const order: SearchBackendName[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim().toLowerCase();
    const backend = SEARCH_BACKENDS.find((candidate) => candidate === name);
    if (!backend) {
      throw new ConfigError(`SEARCH_ORDER contains unknown backend "${part.trim()}"`);
    }
    if (!order.includes(backend)) {
      order.push(backend);
    }
  }
  return order;
}
