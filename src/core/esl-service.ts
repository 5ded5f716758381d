import type { CreateEslInput, EslDetails, EslRecord, EslType } from "../types.js";
import type { EslStore } from "./storage/engine.js";
import { createEslRecord, generateLabelId } from "./esl-record.js";

export interface CreateEslOptions extends EslDetails {
  type: EslType;
  serial: string;
  /** Generated for Hanshow labels when omitted */
  label_id?: string;
}

export class EslService {
  constructor(private store: EslStore) {}

  async create(options: CreateEslOptions): Promise<EslRecord> {
    const labelId = options.label_id ?? (options.type === "Hanshow" ? generateLabelId() : "");
    const input: CreateEslInput = { ...options, label_id: labelId };
    return this.store.save(createEslRecord(input));
  }

  async pending(serial: string): Promise<EslRecord[]> {
    return this.store.findUnprintedBySerial(serial);
  }

  async markPrinted(record: EslRecord): Promise<EslRecord> {
    return this.store.markPrinted(record);
  }

  /**
   * Marks every pending label of a device printed, one at a time. Stops at the
   * first failure; labels already flipped stay printed.
   */
  async printAll(serial: string): Promise<EslRecord[]> {
    const pending = await this.store.findUnprintedBySerial(serial);
    const printed: EslRecord[] = [];

    for (const record of pending) {
      printed.push(await this.store.markPrinted(record));
    }

    return printed;
  }

  async history(serial: string, start: string, end: string): Promise<EslRecord[]> {
    return this.store.findByDateRange(serial, start, end);
  }

  getIdentifier(): string {
    return this.store.getIdentifier();
  }
}
