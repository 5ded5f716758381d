#!/usr/bin/env node

import { runCli } from "./cli/index.js";
import { exitWithError } from "./cli/utils.js";
import { loadConfig } from "./core/config.js";
import { EslService } from "./core/esl-service.js";
import { createEslStore } from "./core/storage/factory.js";
import type { EslStore } from "./core/storage/engine.js";

interface ParsedGlobalOptions {
  configPath?: string;
  filteredArgs: string[];
}

/**
 * Pull the global --config flag out of the arguments. Handles both
 * "--config value" and "--config=value".
 */
function parseGlobalOptions(args: string[]): ParsedGlobalOptions {
  let configPath: string | undefined;
  const filteredArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--config") {
      const nextArg = args[i + 1];
      if (!nextArg || nextArg.startsWith("-")) {
        console.error("Error: --config requires a value");
        process.exit(1);
      }
      configPath = nextArg;
      i++;
      continue;
    }

    if (arg.startsWith("--config=")) {
      configPath = arg.slice("--config=".length);
      continue;
    }

    filteredArgs.push(arg);
  }

  return { configPath, filteredArgs };
}

async function main(): Promise<void> {
  const { configPath, filteredArgs } = parseGlobalOptions(process.argv.slice(2));
  const stores: EslStore[] = [];

  const getService = (): EslService => {
    const store = createEslStore(loadConfig({ configPath }));
    stores.push(store);
    return new EslService(store);
  };

  try {
    await runCli(filteredArgs, { getService });
  } finally {
    await Promise.all(stores.map((store) => store.close()));
  }
}

main().catch((err) => {
  exitWithError(err);
});
