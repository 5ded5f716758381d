// Storage engine interface and implementations
export { type EslStore, assertSavable } from "./engine.js";
export { ParseEslStore, type ParseEslStoreConfig, DEFAULT_COLLECTION } from "./parse/store.js";
export { ParseClient, type ParseClientConfig, type ParseCreated, type ParseWhere } from "./parse/client.js";
export { PostgresEslStore, type PostgresEslStoreConfig, SQL, INSERT_COLUMNS } from "./postgres/store.js";
export {
  createPostgresPool,
  describeConnection,
  type EslPool,
  type EslPoolClient,
  type EslQueryResult,
  type PostgresPoolConfig,
} from "./postgres/pool.js";
export { createEslStore } from "./factory.js";
