import pg from "pg";
import { createLogger, type Logger } from "../../logger.js";

export interface EslQueryResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/** A checked-out connection. pg's PoolClient satisfies this. */
export interface EslPoolClient {
  query(text: string, values?: unknown[]): Promise<EslQueryResult>;
  release(err?: Error | boolean): void;
}

/** A bounded set of connections. pg's Pool satisfies this. */
export interface EslPool {
  connect(): Promise<EslPoolClient>;
  end(): Promise<void>;
}

export interface PostgresPoolConfig {
  connectionString: string;
  /** Upper bound on open connections (default: 10) */
  maxConnections?: number;
  /** How long connect() waits for a free connection before failing (default: 5000) */
  connectionTimeoutMs?: number;
  /** How long an unused connection stays open (default: 10000) */
  idleTimeoutMs?: number;
  logger?: Logger;
}

export const POOL_DEFAULTS = {
  maxConnections: 10,
  connectionTimeoutMs: 5_000,
  idleTimeoutMs: 10_000,
} as const;

export function createPostgresPool(config: PostgresPoolConfig): EslPool {
  const logger = config.logger ?? createLogger();
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    max: config.maxConnections ?? POOL_DEFAULTS.maxConnections,
    connectionTimeoutMillis: config.connectionTimeoutMs ?? POOL_DEFAULTS.connectionTimeoutMs,
    idleTimeoutMillis: config.idleTimeoutMs ?? POOL_DEFAULTS.idleTimeoutMs,
  });

  // An idle client losing its connection must not crash the process
  pool.on("error", (err) => {
    logger.warn(`Warning: idle PostgreSQL connection failed: ${err.message}`);
  });

  return pool;
}

/**
 * "postgres://user:secret@db:5432/esl" → "postgres://db:5432/esl"
 */
export function describeConnection(connectionString: string): string {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch {
    // Key/value connection strings ("host=... dbname=...") are not URLs
    return "postgres";
  }
  return `${url.protocol}//${url.host}${url.pathname}`;
}
