import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { LOG_LEVELS } from "./logger.js";
import { DEFAULT_COLLECTION } from "./storage/parse/store.js";
import { DEFAULT_TIMEOUT_MS } from "./storage/parse/client.js";
import { POOL_DEFAULTS } from "./storage/postgres/pool.js";

const ParseConfigSchema = z.object({
  application_id: z.string().min(1),
  api_key: z.string().optional(),
  server_url: z.string().min(1),
  collection: z.string().min(1).default(DEFAULT_COLLECTION),
  timeout_ms: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

const PostgresConfigSchema = z.object({
  connection_string: z.string().min(1),
  max_connections: z.number().int().positive().default(POOL_DEFAULTS.maxConnections),
  connection_timeout_ms: z
    .number()
    .int()
    .nonnegative()
    .default(POOL_DEFAULTS.connectionTimeoutMs),
  idle_timeout_ms: z.number().int().nonnegative().default(POOL_DEFAULTS.idleTimeoutMs),
});

const ConfigSchema = z.object({
  storage: z
    .object({
      engine: z.enum(["parse", "postgres"]).default("parse"),
      parse: ParseConfigSchema.optional(),
      postgres: PostgresConfigSchema.optional(),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(LOG_LEVELS).default("warn"),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ParseConfig = z.infer<typeof ParseConfigSchema>;
export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; replaces the default location */
  configPath?: string;
  /** Environment to read overrides and XDG_CONFIG_HOME from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Default config file location: $XDG_CONFIG_HOME/esl/esl.toml, falling back
 * to ~/.config/esl/esl.toml
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(configHome, "esl", "esl.toml");
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return {};
    }
    throw new ConfigError(`Failed to parse config file ${configPath}`, err);
  }

  try {
    return parseToml(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(
      `Failed to parse config file ${configPath}: ${message}`,
      err,
      "Check the TOML syntax of the config file",
    );
  }
}

function section(parent: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parent[key];
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

/**
 * Layers environment variables over the file contents:
 * - ESL_STORAGE_ENGINE → storage.engine
 * - PARSE_APPLICATION_ID, PARSE_API_KEY, PARSE_SERVER_URL, PARSE_COLLECTION → storage.parse.*
 * - DATABASE_URL → storage.postgres.connection_string
 * - ESL_LOG_LEVEL → log.level
 */
function applyEnv(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const storage = section(raw, "storage");
  const parse = section(storage, "parse");
  const postgres = section(storage, "postgres");
  const log = section(raw, "log");

  if (env.ESL_STORAGE_ENGINE) storage.engine = env.ESL_STORAGE_ENGINE;
  if (env.PARSE_APPLICATION_ID) parse.application_id = env.PARSE_APPLICATION_ID;
  if (env.PARSE_API_KEY) parse.api_key = env.PARSE_API_KEY;
  if (env.PARSE_SERVER_URL) parse.server_url = env.PARSE_SERVER_URL;
  if (env.PARSE_COLLECTION) parse.collection = env.PARSE_COLLECTION;
  if (env.DATABASE_URL) postgres.connection_string = env.DATABASE_URL;
  if (env.ESL_LOG_LEVEL) log.level = env.ESL_LOG_LEVEL;

  if (Object.keys(parse).length > 0) storage.parse = parse;
  if (Object.keys(postgres).length > 0) storage.postgres = postgres;

  return { ...raw, storage, log };
}

/**
 * Load configuration: defaults, then the TOML file, then environment
 * variables.
 * @throws {ConfigError} If the file is unreadable or malformed, or the result is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? getConfigPath(env);
  const raw = applyEnv(readConfigFile(configPath), env);

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration in ${configPath}: ${problems}`);
  }

  return result.data;
}
