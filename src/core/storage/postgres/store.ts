import { randomUUID } from "node:crypto";
import { EslWireSchema, fromWire, type EslRecord } from "../../../types.js";
import {
  ConnectionAcquireError,
  DatabaseError,
  MissingIdentityError,
  SerializationError,
  isEslStoreError,
} from "../../../errors.js";
import { assertSavable, type EslStore } from "../engine.js";
import { TIMESTAMP_FORMAT, parseTimestamp } from "../../timestamp.js";
import type { EslPool, EslPoolClient } from "./pool.js";

/**
 * Columns written by save(), in parameter order. createdAt is left to the
 * database clock.
 */
export const INSERT_COLUMNS = [
  "objectId",
  "nom",
  "nomScientifique",
  "plu",
  "congelInfos",
  "type",
  "origine",
  "serial",
  "printed",
  "eslId",
  "prix",
  "zone",
  "sousZone",
  "engin",
  "zoneCode",
  "sousZoneCode",
  "infosPrix",
  "taille",
  "production",
  "allergenes",
  "itemId",
  "label",
] as const;

export type InsertColumn = (typeof INSERT_COLUMNS)[number];

/**
 * Statements run against the `esl` table (see schema.sql). Column names are
 * quoted so their camelCase survives PostgreSQL's case folding.
 */
export const SQL = {
  insert:
    `INSERT INTO esl (${INSERT_COLUMNS.map((column) => `"${column}"`).join(", ")}, "createdAt")` +
    ` VALUES (${INSERT_COLUMNS.map((_, index) => `$${index + 1}`).join(", ")}, now())` +
    ` RETURNING "createdAt"`,
  findUnprinted: "SELECT * FROM esl WHERE serial = $1 AND printed = false",
  markPrinted: 'UPDATE esl SET printed = true WHERE "objectId" = $1',
  // TO_TIMESTAMP reads in the session time zone; the round trip through
  // timestamp re-reads the same wall clock as UTC
  findByDateRange:
    `SELECT * FROM esl WHERE serial = $1` +
    ` AND "createdAt" > (TO_TIMESTAMP($2, '${TIMESTAMP_FORMAT}')::timestamp AT TIME ZONE 'UTC')` +
    ` AND "createdAt" < (TO_TIMESTAMP($3, '${TIMESTAMP_FORMAT}')::timestamp AT TIME ZONE 'UTC')`,
} as const;

function insertValues(identity: string, record: EslRecord): unknown[] {
  const row: Record<InsertColumn, unknown> = {
    objectId: identity,
    nom: record.name,
    nomScientifique: record.scientific_name,
    plu: record.plu,
    congelInfos: record.freezing_info,
    type: record.type,
    origine: record.origin,
    serial: record.serial,
    printed: record.printed,
    eslId: record.label_id,
    prix: record.price,
    zone: record.zone,
    sousZone: record.sub_zone,
    engin: record.fishing_gear,
    zoneCode: record.zone_code,
    sousZoneCode: record.sub_zone_code,
    infosPrix: record.price_info,
    taille: record.size,
    production: record.production,
    allergenes: record.allergens,
    itemId: record.item_id,
    label: record.label,
  };
  return INSERT_COLUMNS.map((column) => row[column]);
}

export interface PostgresEslStoreConfig {
  pool: EslPool;
  /** Shown by getIdentifier() and in errors (default: "postgres") */
  identifier?: string;
}

/**
 * Storage backend using a PostgreSQL table through a connection pool.
 *
 * Each operation checks out one connection and gives it back when done.
 * Identities are v4 UUIDs generated here; creation times come from the
 * database clock.
 */
export class PostgresEslStore implements EslStore {
  private pool: EslPool;
  private identifier: string;

  constructor(config: PostgresEslStoreConfig) {
    this.pool = config.pool;
    this.identifier = config.identifier ?? "postgres";
  }

  async save(record: EslRecord): Promise<EslRecord> {
    assertSavable(record);
    const identity = randomUUID();

    const result = await this.withClient((client) =>
      client.query(SQL.insert, insertValues(identity, record)),
    );

    const createdAt = result.rows[0]?.createdAt;
    return {
      ...record,
      identity,
      created_at: createdAt instanceof Date ? createdAt.toISOString() : null,
    };
  }

  async findUnprintedBySerial(serial: string): Promise<EslRecord[]> {
    return this.select(SQL.findUnprinted, [serial]);
  }

  async markPrinted(record: EslRecord): Promise<EslRecord> {
    if (!record.identity) {
      throw new MissingIdentityError();
    }
    const identity = record.identity;

    const result = await this.withClient((client) => client.query(SQL.markPrinted, [identity]));
    if (result.rowCount === 0) {
      throw new DatabaseError(`No ESL with identity ${identity} in ${this.identifier}`);
    }
    return { ...record, printed: true };
  }

  async findByDateRange(serial: string, start: string, end: string): Promise<EslRecord[]> {
    // Same validation as the REST backend; the database parses the strings itself
    parseTimestamp(start);
    parseTimestamp(end);

    return this.select(SQL.findByDateRange, [serial, start.trim(), end.trim()]);
  }

  getIdentifier(): string {
    return this.identifier;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async select(text: string, values: unknown[]): Promise<EslRecord[]> {
    const result = await this.withClient((client) => client.query(text, values));

    return result.rows.map((row, index) => {
      const parsed = EslWireSchema.safeParse(row);
      if (!parsed.success) {
        throw new SerializationError(
          `Invalid ESL row ${index} in ${this.identifier}: ${parsed.error.message}`,
        );
      }
      return fromWire(parsed.data);
    });
  }

  /**
   * Runs `fn` on a pooled connection and always hands the connection back.
   * @throws {ConnectionAcquireError} If no connection frees up within the pool's timeout
   * @throws {DatabaseError} If the query fails
   */
  private async withClient<T>(fn: (client: EslPoolClient) => Promise<T>): Promise<T> {
    let client: EslPoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new ConnectionAcquireError(this.identifier, err);
    }

    try {
      return await fn(client);
    } catch (err) {
      if (isEslStoreError(err)) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new DatabaseError(`Postgres error: ${message}`, err, sqlState(err));
    } finally {
      client.release();
    }
  }
}

function sqlState(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
