/**
 * Shared test utilities for CLI command tests.
 */

import { EslService } from "../core/esl-service.js";
import { PostgresEslStore } from "../core/storage/index.js";
import { FakePool } from "../test-utils/index.js";
import type { CliOptions } from "./utils.js";

export interface CapturedOutput {
  stdout: string[];
  stderr: string[];
  restore: () => void;
}

export function captureOutput(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];

  const originalLog = console.log;
  const originalError = console.error;

  console.log = (...args: unknown[]) => stdout.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => stderr.push(args.map(String).join(" "));

  return {
    stdout,
    stderr,
    restore: () => {
      console.log = originalLog;
      console.error = originalError;
    },
  };
}

export interface TestCli {
  options: CliOptions;
  store: PostgresEslStore;
  pool: FakePool;
}

/**
 * CLI options backed by a real PostgresEslStore over an in-memory pool.
 */
export function createTestCli(): TestCli {
  const pool = new FakePool();
  const store = new PostgresEslStore({ pool, identifier: "postgres://test/esl" });
  const service = new EslService(store);

  return {
    options: { getService: () => service },
    store,
    pool,
  };
}
