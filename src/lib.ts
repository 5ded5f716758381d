// Library entry point
export * from "./types.js";
export * from "./errors.js";
export * from "./core/storage/index.js";
export { createEslRecord, generateLabelId } from "./core/esl-record.js";
export { EslService, type CreateEslOptions } from "./core/esl-service.js";
export { loadConfig, getConfigPath, type Config, type LoadConfigOptions } from "./core/config.js";
export { createLogger, type Logger, type LogLevel } from "./core/logger.js";
export { parseTimestamp, formatTimestamp, TIMESTAMP_FORMAT } from "./core/timestamp.js";
