import type { EslRecord } from "../../types.js";
import { ValidationError } from "../../errors.js";

/**
 * Persistence contract for ESL records.
 *
 * Implementations:
 * - Parse Server over REST (ParseEslStore)
 * - PostgreSQL through a connection pool (PostgresEslStore)
 *
 * Every method rejects with an EslStoreError subclass on failure. Nothing is
 * retried; retry policy belongs to the caller.
 */
export interface EslStore {
  /**
   * Persist a new record. This is the only operation that assigns identity.
   * @returns A copy of the record with identity and created_at populated
   * @throws {ValidationError} If the record already has an identity, is marked printed, or serial or label_id is empty
   */
  save(record: EslRecord): Promise<EslRecord>;

  /**
   * All records of a device that have not been printed yet.
   */
  findUnprintedBySerial(serial: string): Promise<EslRecord[]>;

  /**
   * Flag a saved record as printed.
   * @returns A copy of the record with printed = true
   * @throws {MissingIdentityError} If the record was never saved; nothing is written
   * @throws {PlatformError | DatabaseError} If the backend has no object with that identity
   */
  markPrinted(record: EslRecord): Promise<EslRecord>;

  /**
   * Printed and unprinted records of a device created strictly between two
   * instants. Bounds use TIMESTAMP_FORMAT and are exclusive.
   * @throws {SerializationError} If a bound is not a valid timestamp
   */
  findByDateRange(serial: string, start: string, end: string): Promise<EslRecord[]>;

  /**
   * Human-readable identifier for this backend.
   * For Parse: the collection URL. For PostgreSQL: "postgres://host/db"
   */
  getIdentifier(): string;

  /** Release sockets or pooled connections */
  close(): Promise<void>;
}

/**
 * Checks the preconditions shared by every backend's save().
 * @throws {ValidationError}
 */
export function assertSavable(record: EslRecord): void {
  if (record.identity !== null) {
    throw new ValidationError(
      `ESL ${record.label_id} was already saved as ${record.identity}`,
      undefined,
      "Use markPrinted() to update a saved record",
    );
  }
  if (record.printed) {
    throw new ValidationError(`ESL ${record.label_id} cannot be saved as already printed`);
  }
  if (!record.serial.trim()) {
    throw new ValidationError("ESL serial is required");
  }
  if (!record.label_id.trim()) {
    throw new ValidationError("ESL label id is required");
  }
}
