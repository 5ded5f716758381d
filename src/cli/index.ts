import { colors } from "./colors.js";
import { helpCommand } from "./help.js";
import { pendingCommand } from "./pending.js";
import { printCommand } from "./print.js";
import { rangeCommand } from "./range.js";
import { saveCommand } from "./save.js";
import type { CliOptions } from "./utils.js";

export type { CliOptions } from "./utils.js";

export async function runCli(args: string[], options: CliOptions): Promise<void> {
  const command = args[0];

  switch (command) {
    case "save":
    case "add":
      return saveCommand(args.slice(1), options);
    case "pending":
    case "ls":
      return pendingCommand(args.slice(1), options);
    case "print":
      return printCommand(args.slice(1), options);
    case "range":
      return rangeCommand(args.slice(1), options);
    case "help":
    case "--help":
    case "-h":
      return helpCommand();
    default:
      if (!command) {
        return helpCommand();
      }
      console.error(`${colors.red}Error:${colors.reset} Unknown command: ${command}`);
      console.error('Run "esl help" for usage information.');
      process.exit(1);
  }
}
