import type { EslRecord } from "../types.js";
import type { EslService } from "../core/esl-service.js";
import { colors } from "./colors.js";

export interface CliOptions {
  /** Opens storage on first use, so help output needs no configuration */
  getService: () => EslService;
}

export function createService(options: CliOptions): EslService {
  return options.getService();
}

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, string | boolean>;
}

export interface FlagConfig {
  short?: string;
  hasValue: boolean;
}

export function parseArgs(
  args: string[],
  flagDefs: Record<string, FlagConfig>,
  command: string,
): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};

  const readValue = (flagName: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith("-")) {
      console.error(`${colors.red}Error:${colors.reset} --${flagName} requires a value`);
      process.exit(1);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith("--")) {
      const [flagName, inlineValue] = arg.slice(2).split("=", 2);
      const flagConfig = flagDefs[flagName];

      if (!flagConfig) {
        console.error(`${colors.red}Error:${colors.reset} Unknown option: --${flagName}`);
        console.error(`Run "esl ${command} --help" for usage information.`);
        process.exit(1);
      }

      if (flagConfig.hasValue) {
        flags[flagName] = inlineValue ?? readValue(flagName, ++i);
      } else {
        flags[flagName] = true;
      }
    } else if (arg.startsWith("-") && arg.length === 2) {
      const shortFlag = arg.slice(1);
      const flagEntry = Object.entries(flagDefs).find(
        ([, config]) => config.short === shortFlag,
      );

      if (!flagEntry) {
        console.error(`${colors.red}Error:${colors.reset} Unknown option: -${shortFlag}`);
        console.error(`Run "esl ${command} --help" for usage information.`);
        process.exit(1);
      }

      const [flagName, flagConfig] = flagEntry;
      flags[flagName] = flagConfig.hasValue ? readValue(flagName, ++i) : true;
    } else {
      positional.push(arg);
    }
  }

  return { positional, flags };
}

export function getStringFlag(flags: ParsedArgs["flags"], name: string): string | undefined {
  const value = flags[name];
  return typeof value === "string" ? value : undefined;
}

export function getBooleanFlag(flags: ParsedArgs["flags"], name: string): boolean {
  return flags[name] === true;
}

export function formatEsl(esl: EslRecord): string {
  const statusIcon = esl.printed ? `${colors.green}[x]` : `${colors.yellow}[ ]`;
  const name = esl.name ? ` ${esl.name}` : "";
  const price = esl.price ? ` ${colors.cyan}${esl.price}${colors.reset}` : "";
  const created = esl.created_at ? ` ${colors.dim}(${esl.created_at})${colors.reset}` : "";

  return `${statusIcon}${colors.reset} ${colors.bold}${esl.label_id}${colors.reset} ${esl.type}${name}${price}${created}`;
}

/**
 * Print records as JSON or one line each.
 */
export function printEsls(esls: EslRecord[], json: boolean, emptyMessage: string): void {
  if (json) {
    console.log(JSON.stringify(esls, null, 2));
    return;
  }

  if (esls.length === 0) {
    console.log(emptyMessage);
    return;
  }

  for (const esl of esls) {
    console.log(formatEsl(esl));
  }
}

/**
 * Report a failed command and exit with status 1.
 */
export function exitWithError(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`${colors.red}Error:${colors.reset} ${message}`);

  const suggestion = suggestionOf(err);
  if (suggestion) {
    console.error(`${colors.dim}${suggestion}${colors.reset}`);
  }

  process.exit(1);
}

function suggestionOf(err: unknown): string | undefined {
  if (err instanceof Error && "suggestion" in err && typeof err.suggestion === "string") {
    return err.suggestion;
  }
  return undefined;
}
