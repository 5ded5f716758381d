import type { Config } from "../config.js";
import { ConfigError } from "../../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { EslStore } from "./engine.js";
import { ParseEslStore } from "./parse/store.js";
import { PostgresEslStore } from "./postgres/store.js";
import { createPostgresPool, describeConnection } from "./postgres/pool.js";

/**
 * Create the store selected by `storage.engine`.
 * @throws {ConfigError} If the selected engine has no configuration section
 */
export function createEslStore(config: Config, logger?: Logger): EslStore {
  const log = logger ?? createLogger(config.log.level);

  switch (config.storage.engine) {
    case "parse": {
      const parse = config.storage.parse;
      if (!parse) {
        throw new ConfigError(
          "Parse storage selected but not configured",
          undefined,
          "Set PARSE_APPLICATION_ID and PARSE_SERVER_URL, or add a [storage.parse] section",
        );
      }
      return new ParseEslStore({
        applicationId: parse.application_id,
        apiKey: parse.api_key,
        serverUrl: parse.server_url,
        collection: parse.collection,
        timeoutMs: parse.timeout_ms,
        logger: log,
      });
    }

    case "postgres": {
      const postgres = config.storage.postgres;
      if (!postgres) {
        throw new ConfigError(
          "PostgreSQL storage selected but not configured",
          undefined,
          "Set DATABASE_URL, or add a [storage.postgres] section",
        );
      }
      return new PostgresEslStore({
        pool: createPostgresPool({
          connectionString: postgres.connection_string,
          maxConnections: postgres.max_connections,
          connectionTimeoutMs: postgres.connection_timeout_ms,
          idleTimeoutMs: postgres.idle_timeout_ms,
          logger: log,
        }),
        identifier: describeConnection(postgres.connection_string),
      });
    }
  }
}
