import { EslWireSchema, fromWire, toWire, type EslRecord } from "../../../types.js";
import { MissingIdentityError, SerializationError } from "../../../errors.js";
import { assertSavable, type EslStore } from "../engine.js";
import { parseTimestamp } from "../../timestamp.js";
import { ParseClient, type ParseClientConfig, type ParseWhere } from "./client.js";

export const DEFAULT_COLLECTION = "GenericEsl";

export interface ParseEslStoreConfig extends ParseClientConfig {
  /** Object path under the server root (default: "GenericEsl") */
  collection?: string;
}

/**
 * Storage backend using a Parse Server collection.
 *
 * Maps ESL records to Parse objects:
 * - identity → objectId (assigned by Parse on create)
 * - created_at → createdAt (assigned by Parse on create)
 * - every other field → its wire name (eslId, nom, prix, ...)
 */
export class ParseEslStore implements EslStore {
  private client: ParseClient;
  private collection: string;

  constructor(config: ParseEslStoreConfig) {
    this.client = new ParseClient(config);
    this.collection = config.collection || DEFAULT_COLLECTION;
  }

  async save(record: EslRecord): Promise<EslRecord> {
    assertSavable(record);

    const created = await this.client.create(this.collection, toWire(record));
    return {
      ...record,
      identity: created.objectId,
      created_at: created.createdAt,
    };
  }

  async findUnprintedBySerial(serial: string): Promise<EslRecord[]> {
    return this.find({ serial, printed: false });
  }

  async markPrinted(record: EslRecord): Promise<EslRecord> {
    if (!record.identity) {
      throw new MissingIdentityError();
    }

    await this.client.update(
      `${this.collection}/${encodeURIComponent(record.identity)}`,
      { printed: true },
    );
    return { ...record, printed: true };
  }

  async findByDateRange(serial: string, start: string, end: string): Promise<EslRecord[]> {
    const after = parseTimestamp(start);
    const before = parseTimestamp(end);

    return this.find({
      serial,
      createdAt: {
        $gt: { __type: "Date", iso: after.toISOString() },
        $lt: { __type: "Date", iso: before.toISOString() },
      },
    });
  }

  getIdentifier(): string {
    return `${this.client.serverUrl}/${this.collection}`;
  }

  async close(): Promise<void> {
    // Requests do not keep sockets open between calls
  }

  private async find(where: ParseWhere): Promise<EslRecord[]> {
    const results = await this.client.query(this.collection, where);

    return results.map((row, index) => {
      const parsed = EslWireSchema.safeParse(row);
      if (!parsed.success) {
        throw new SerializationError(
          `Invalid ESL at index ${index} in ${this.getIdentifier()}: ${parsed.error.message}`,
        );
      }
      return fromWire(parsed.data);
    });
  }
}
