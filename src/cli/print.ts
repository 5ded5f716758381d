import { colors } from "./colors.js";
import { type CliOptions, createService, exitWithError, getBooleanFlag, parseArgs } from "./utils.js";

export async function printCommand(args: string[], options: CliOptions): Promise<void> {
  const { positional, flags } = parseArgs(args, {
    help: { short: "h", hasValue: false },
  }, "print");

  if (getBooleanFlag(flags, "help")) {
    console.log(`${colors.bold}esl print${colors.reset} - Mark every pending label of a device printed

${colors.bold}USAGE:${colors.reset}
  esl print <serial>

${colors.bold}OPTIONS:${colors.reset}
  -h, --help                 Show this help message
`);
    return;
  }

  const serial = positional[0];
  if (!serial) {
    console.error(`${colors.red}Error:${colors.reset} Serial is required`);
    console.error(`Usage: esl print <serial>`);
    process.exit(1);
  }

  try {
    const printed = await createService(options).printAll(serial);
    if (printed.length === 0) {
      console.log(`No pending labels for ${serial}.`);
      return;
    }
    for (const esl of printed) {
      console.log(`${colors.green}Printed${colors.reset} ${esl.label_id} (${esl.identity})`);
    }
    console.log(`Marked ${printed.length} label(s) printed.`);
  } catch (err) {
    exitWithError(err);
  }
}
