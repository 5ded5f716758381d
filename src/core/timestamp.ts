import { SerializationError } from "../errors.js";

/**
 * The date-time format callers use for range bounds, e.g.
 * `2024-03-01 08:00:00:000`. PostgreSQL spells it `YYYY-MM-DD HH24:MI:SS:MS`.
 */
export const TIMESTAMP_FORMAT = "YYYY-MM-DD HH24:MI:SS:MS";

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}):(\d{1,3})$/;

/**
 * Parses a range bound as a UTC instant.
 * @throws {SerializationError} If the string is not in TIMESTAMP_FORMAT or names an impossible date
 */
export function parseTimestamp(value: string): Date {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw new SerializationError(
      `Invalid timestamp "${value}": expected ${TIMESTAMP_FORMAT}`,
      undefined,
      'Use a value such as "2024-03-01 08:00:00:000"',
    );
  }

  const [year, month, day, hours, minutes, seconds] = match
    .slice(1, 7)
    .map((part) => parseInt(part, 10));
  // Like PostgreSQL's MS field, "5" is half a second rather than 5 ms
  const millis = parseInt(match[7].padEnd(3, "0"), 10);

  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));

  // Date.UTC silently rolls 2024-02-30 over into March
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    throw new SerializationError(`Invalid timestamp "${value}": no such date`);
  }

  return date;
}

/** Formats an instant back into TIMESTAMP_FORMAT (UTC) */
export function formatTimestamp(date: Date): string {
  const pad = (n: number, width = 2) => n.toString().padStart(width, "0");
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}:` +
    pad(date.getUTCMilliseconds(), 3)
  );
}
