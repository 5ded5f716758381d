import { EslTypeSchema, ESL_TYPES, type EslDetails } from "../types.js";
import { colors } from "./colors.js";
import {
  type CliOptions,
  createService,
  exitWithError,
  formatEsl,
  getBooleanFlag,
  getStringFlag,
  parseArgs,
} from "./utils.js";

// Flag → record field for the free-text descriptive fields
const TEXT_FLAGS = {
  "item-id": "item_id",
  name: "name",
  "scientific-name": "scientific_name",
  price: "price",
  "price-info": "price_info",
  "fishing-gear": "fishing_gear",
  zone: "zone",
  "zone-code": "zone_code",
  "sub-zone": "sub_zone",
  "sub-zone-code": "sub_zone_code",
  plu: "plu",
  size: "size",
  "freezing-info": "freezing_info",
  origin: "origin",
  allergens: "allergens",
  label: "label",
  production: "production",
  "category-code": "category_code",
} as const;

const NUMBER_FLAGS = {
  "vat-rate": "vat_rate",
  "purchase-price": "purchase_price",
} as const;

function parseNumberFlag(name: string, value: string): number {
  const parsed = Number(value.replace(",", "."));
  if (value.trim() === "" || Number.isNaN(parsed)) {
    console.error(`${colors.red}Error:${colors.reset} --${name} expects a number, got "${value}"`);
    process.exit(1);
  }
  return parsed;
}

export async function saveCommand(args: string[], options: CliOptions): Promise<void> {
  const valueFlags = Object.fromEntries(
    [...Object.keys(TEXT_FLAGS), ...Object.keys(NUMBER_FLAGS)].map((name) => [
      name,
      { hasValue: true },
    ]),
  );
  const { flags } = parseArgs(args, {
    ...valueFlags,
    type: { short: "t", hasValue: true },
    serial: { short: "s", hasValue: true },
    "label-id": { short: "l", hasValue: true },
    json: { hasValue: false },
    help: { short: "h", hasValue: false },
  }, "save");

  if (getBooleanFlag(flags, "help")) {
    console.log(`${colors.bold}esl save${colors.reset} - Save a new label

${colors.bold}USAGE:${colors.reset}
  esl save --type <type> --serial <serial> [options]

${colors.bold}OPTIONS:${colors.reset}
  -t, --type <type>          Device family (${ESL_TYPES.join(", ")})
  -s, --serial <serial>      Device serial number
  -l, --label-id <id>        Label id (generated for Hanshow when omitted)
  --item-id <id>             Item id (Pricer)
  --name, --price, --plu ... Descriptive fields, see "esl help"
  --vat-rate <n>             VAT rate
  --purchase-price <n>       Purchase price
  --json                     Output as JSON
  -h, --help                 Show this help message

${colors.bold}EXAMPLE:${colors.reset}
  esl save -t Hanshow -s DEV-42 --name "Sea bream" --price 12.90
  esl save -t Pricer -s DEV-7 -l 2001234567890 --item-id 4411
`);
    return;
  }

  const typeValue = getStringFlag(flags, "type");
  const type = EslTypeSchema.safeParse(typeValue);
  if (!type.success) {
    console.error(
      `${colors.red}Error:${colors.reset} --type must be one of ${ESL_TYPES.join(", ")}` +
        (typeValue ? `, got "${typeValue}"` : ""),
    );
    process.exit(1);
  }

  const serial = getStringFlag(flags, "serial");
  if (!serial) {
    console.error(`${colors.red}Error:${colors.reset} --serial is required`);
    process.exit(1);
  }

  const details: EslDetails = {};
  for (const [flag, field] of Object.entries(TEXT_FLAGS)) {
    const value = getStringFlag(flags, flag);
    if (value !== undefined) details[field] = value;
  }
  for (const [flag, field] of Object.entries(NUMBER_FLAGS)) {
    const value = getStringFlag(flags, flag);
    if (value !== undefined) details[field] = parseNumberFlag(flag, value);
  }

  try {
    const esl = await createService(options).create({
      ...details,
      type: type.data,
      serial,
      label_id: getStringFlag(flags, "label-id"),
    });

    if (getBooleanFlag(flags, "json")) {
      console.log(JSON.stringify(esl, null, 2));
      return;
    }

    console.log(`Saved ESL ${esl.identity}`);
    console.log(formatEsl(esl));
  } catch (err) {
    exitWithError(err);
  }
}
