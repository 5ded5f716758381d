import { ESL_TYPES } from "../types.js";
import { TIMESTAMP_FORMAT } from "../core/timestamp.js";
import { colors } from "./colors.js";

export function helpCommand(): void {
  console.log(`${colors.bold}esl${colors.reset} - Electronic shelf label records

${colors.bold}USAGE:${colors.reset}
  esl <command> [options]

${colors.bold}COMMANDS:${colors.reset}
  save -t <type> -s <serial>       Save a new label
  pending <serial>                 List labels not printed yet
  print <serial>                   Mark every pending label printed
  range <serial> --from --to       List labels created in a time range
  help                             Show this help message

${colors.bold}GLOBAL OPTIONS:${colors.reset}
  --config <path>                  Use custom config file
  --help, -h                       Show this help message

${colors.bold}SAVE OPTIONS:${colors.reset}
  -t, --type <type>                ${ESL_TYPES.join(" | ")}
  -l, --label-id <id>              Label id (generated for Hanshow)
  --item-id, --name, --scientific-name, --price, --price-info,
  --fishing-gear, --zone, --zone-code, --sub-zone, --sub-zone-code,
  --plu, --size, --freezing-info, --origin, --allergens, --label,
  --production, --category-code, --vat-rate, --purchase-price

${colors.bold}TIMESTAMPS:${colors.reset}
  ${TIMESTAMP_FORMAT} in UTC, e.g. "2024-03-01 08:00:00:000"

${colors.bold}CONFIGURATION:${colors.reset}
  ~/.config/esl/esl.toml, overridden by ESL_STORAGE_ENGINE,
  PARSE_APPLICATION_ID, PARSE_API_KEY, PARSE_SERVER_URL, PARSE_COLLECTION,
  DATABASE_URL and ESL_LOG_LEVEL

${colors.bold}EXAMPLES:${colors.reset}
  esl save -t Hanshow -s DEV-42 --name "Sea bream" --price 12.90
  esl pending DEV-42
  esl print DEV-42
`);
}
