import { describe, it, expect } from "vitest";
import { SerializationError } from "../errors.js";
import { formatTimestamp, parseTimestamp } from "./timestamp.js";

describe("parseTimestamp", () => {
  it("parses as UTC", () => {
    expect(parseTimestamp("2024-03-01 08:00:00:000").toISOString()).toBe(
      "2024-03-01T08:00:00.000Z",
    );
  });

  it("reads a short millisecond field as a fraction of a second", () => {
    expect(parseTimestamp("2024-03-01 08:00:00:5").toISOString()).toBe(
      "2024-03-01T08:00:00.500Z",
    );
    expect(parseTimestamp("2024-03-01 08:00:00:123").getUTCMilliseconds()).toBe(123);
  });

  it("ignores surrounding whitespace", () => {
    expect(parseTimestamp("  2024-03-01 08:00:00:000\n").toISOString()).toBe(
      "2024-03-01T08:00:00.000Z",
    );
  });

  it("rejects other formats", () => {
    expect(() => parseTimestamp("2024-03-01T08:00:00Z")).toThrow(SerializationError);
    expect(() => parseTimestamp("not-a-date")).toThrow(
      'Invalid timestamp "not-a-date": expected YYYY-MM-DD HH24:MI:SS:MS',
    );
  });

  it("rejects impossible dates", () => {
    expect(() => parseTimestamp("2024-02-30 08:00:00:000")).toThrow(
      'Invalid timestamp "2024-02-30 08:00:00:000": no such date',
    );
    expect(() => parseTimestamp("2024-03-01 25:00:00:000")).toThrow(SerializationError);
  });
});

describe("formatTimestamp", () => {
  it("formats in UTC with padded fields", () => {
    expect(formatTimestamp(new Date("2024-03-01T08:05:09.007Z"))).toBe(
      "2024-03-01 08:05:09:007",
    );
  });

  it("is read back by parseTimestamp", () => {
    const date = new Date("2023-12-31T23:59:59.999Z");
    expect(parseTimestamp(formatTimestamp(date)).getTime()).toBe(date.getTime());
  });
});
