import { colors } from "./colors.js";
import {
  type CliOptions,
  createService,
  exitWithError,
  getBooleanFlag,
  parseArgs,
  printEsls,
} from "./utils.js";

export async function pendingCommand(args: string[], options: CliOptions): Promise<void> {
  const { positional, flags } = parseArgs(args, {
    json: { hasValue: false },
    help: { short: "h", hasValue: false },
  }, "pending");

  if (getBooleanFlag(flags, "help")) {
    console.log(`${colors.bold}esl pending${colors.reset} - List labels not printed yet

${colors.bold}USAGE:${colors.reset}
  esl pending <serial> [options]

${colors.bold}OPTIONS:${colors.reset}
  --json                     Output as JSON
  -h, --help                 Show this help message

${colors.bold}EXAMPLE:${colors.reset}
  esl pending DEV-42
`);
    return;
  }

  const serial = positional[0];
  if (!serial) {
    console.error(`${colors.red}Error:${colors.reset} Serial is required`);
    console.error(`Usage: esl pending <serial>`);
    process.exit(1);
  }

  try {
    const esls = await createService(options).pending(serial);
    printEsls(esls, getBooleanFlag(flags, "json"), `No pending labels for ${serial}.`);
  } catch (err) {
    exitWithError(err);
  }
}
