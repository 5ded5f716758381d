import { TIMESTAMP_FORMAT } from "../core/timestamp.js";
import { colors } from "./colors.js";
import {
  type CliOptions,
  createService,
  exitWithError,
  getBooleanFlag,
  getStringFlag,
  parseArgs,
  printEsls,
} from "./utils.js";

export async function rangeCommand(args: string[], options: CliOptions): Promise<void> {
  const { positional, flags } = parseArgs(args, {
    from: { short: "f", hasValue: true },
    to: { short: "t", hasValue: true },
    json: { hasValue: false },
    help: { short: "h", hasValue: false },
  }, "range");

  if (getBooleanFlag(flags, "help")) {
    console.log(`${colors.bold}esl range${colors.reset} - List labels created between two instants

${colors.bold}USAGE:${colors.reset}
  esl range <serial> --from <timestamp> --to <timestamp>

${colors.bold}OPTIONS:${colors.reset}
  -f, --from <timestamp>     Exclusive lower bound (${TIMESTAMP_FORMAT}, UTC)
  -t, --to <timestamp>       Exclusive upper bound
  --json                     Output as JSON
  -h, --help                 Show this help message

${colors.bold}EXAMPLE:${colors.reset}
  esl range DEV-42 --from "2024-03-01 00:00:00:000" --to "2024-03-02 00:00:00:000"
`);
    return;
  }

  const serial = positional[0];
  const from = getStringFlag(flags, "from");
  const to = getStringFlag(flags, "to");

  if (!serial) {
    console.error(`${colors.red}Error:${colors.reset} Serial is required`);
    process.exit(1);
  }
  if (!from || !to) {
    console.error(`${colors.red}Error:${colors.reset} --from and --to are required`);
    process.exit(1);
  }

  try {
    const esls = await createService(options).history(serial, from, to);
    printEsls(esls, getBooleanFlag(flags, "json"), `No labels for ${serial} in that range.`);
  } catch (err) {
    exitWithError(err);
  }
}
