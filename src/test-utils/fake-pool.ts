import type { EslPool, EslPoolClient, EslQueryResult } from "../core/storage/postgres/pool.js";
import { INSERT_COLUMNS, SQL } from "../core/storage/postgres/store.js";
import { parseTimestamp } from "../core/timestamp.js";

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

/**
 * In-memory stand-in for a pg Pool. It understands exactly the statements
 * PostgresEslStore issues and keeps rows in an array, with createdAt taken
 * from a controllable clock.
 */
export class FakePool implements EslPool {
  readonly rows: Record<string, unknown>[] = [];
  readonly queries: RecordedQuery[] = [];
  checkedOut = 0;
  released = 0;
  ended = false;
  /** Thrown by the next connect() */
  connectError: Error | null = null;
  /** Thrown by the next query */
  queryError: Error | null = null;
  now: () => Date = () => new Date();

  async connect(): Promise<EslPoolClient> {
    if (this.connectError) {
      const err = this.connectError;
      this.connectError = null;
      throw err;
    }

    this.checkedOut++;
    return {
      query: (text, values = []) => this.run(text, values),
      release: () => {
        this.released++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  /** Insert a row directly, bypassing the store (for legacy-shape rows) */
  seed(row: Record<string, unknown>): void {
    this.rows.push({ ...row });
  }

  private async run(text: string, values: unknown[]): Promise<EslQueryResult> {
    this.queries.push({ text, values });

    if (this.queryError) {
      const err = this.queryError;
      this.queryError = null;
      throw err;
    }

    switch (text) {
      case SQL.insert: {
        const row: Record<string, unknown> = {};
        INSERT_COLUMNS.forEach((column, index) => {
          row[column] = values[index];
        });
        if (this.rows.some((existing) => existing.objectId === row.objectId)) {
          throw Object.assign(new Error("duplicate key value violates unique constraint"), {
            code: "23505",
          });
        }
        row.createdAt = this.now();
        this.rows.push(row);
        return { rows: [{ createdAt: row.createdAt }], rowCount: 1 };
      }

      case SQL.findUnprinted: {
        const rows = this.rows.filter(
          (row) => row.serial === values[0] && row.printed === false,
        );
        return { rows: rows.map((row) => ({ ...row })), rowCount: rows.length };
      }

      case SQL.markPrinted: {
        const rows = this.rows.filter((row) => row.objectId === values[0]);
        for (const row of rows) {
          row.printed = true;
        }
        return { rows: [], rowCount: rows.length };
      }

      case SQL.findByDateRange: {
        const after = parseTimestamp(String(values[1])).getTime();
        const before = parseTimestamp(String(values[2])).getTime();
        const rows = this.rows.filter((row) => {
          const createdAt = row.createdAt instanceof Date ? row.createdAt.getTime() : NaN;
          return row.serial === values[0] && createdAt > after && createdAt < before;
        });
        return { rows: rows.map((row) => ({ ...row })), rowCount: rows.length };
      }

      default:
        throw new Error(`FakePool does not understand: ${text}`);
    }
  }
}
