import { createEslRecord } from "../core/esl-record.js";
import type { CreateEslInput, EslRecord } from "../types.js";

/**
 * An unsaved Hanshow record for DEV-42 unless overridden.
 */
export function createRecord(overrides: Partial<CreateEslInput> = {}): EslRecord {
  return createEslRecord({
    type: "Hanshow",
    serial: "DEV-42",
    label_id: "abc123",
    ...overrides,
  });
}
