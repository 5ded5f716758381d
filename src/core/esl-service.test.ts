import { describe, it, expect, beforeEach } from "vitest";
import { MissingIdentityError, ValidationError } from "../errors.js";
import { FakePool } from "../test-utils/index.js";
import { EslService } from "./esl-service.js";
import { PostgresEslStore } from "./storage/index.js";

describe("EslService", () => {
  let pool: FakePool;
  let service: EslService;

  beforeEach(() => {
    pool = new FakePool();
    service = new EslService(new PostgresEslStore({ pool }));
  });

  describe("create", () => {
    it("saves a fresh unprinted record", async () => {
      const esl = await service.create({
        type: "Pricer",
        serial: "DEV-42",
        label_id: "2001234567890",
        item_id: "4411",
      });

      expect(esl.identity).not.toBeNull();
      expect(esl.printed).toBe(false);
      expect(esl.item_id).toBe("4411");
      expect(pool.rows).toHaveLength(1);
    });

    it("generates label ids for Hanshow", async () => {
      const first = await service.create({ type: "Hanshow", serial: "DEV-42" });
      const second = await service.create({ type: "Hanshow", serial: "DEV-42" });

      expect(first.label_id).toMatch(/^[0-9a-z]{24}$/);
      expect(first.label_id).not.toBe(second.label_id);
    });

    it("requires a label id for other types", async () => {
      await expect(service.create({ type: "EasyVCO", serial: "DEV-42" })).rejects.toBeInstanceOf(
        ValidationError,
      );
      expect(pool.rows).toEqual([]);
    });
  });

  describe("printAll", () => {
    it("marks every pending record of the device", async () => {
      await service.create({ type: "Hanshow", serial: "DEV-42" });
      await service.create({ type: "Hanshow", serial: "DEV-42" });
      await service.create({ type: "Hanshow", serial: "DEV-7" });

      const printed = await service.printAll("DEV-42");

      expect(printed).toHaveLength(2);
      expect(printed.every((esl) => esl.printed)).toBe(true);
      await expect(service.pending("DEV-42")).resolves.toEqual([]);
      await expect(service.pending("DEV-7")).resolves.toHaveLength(1);
    });

    it("stops at the first failure and keeps earlier updates", async () => {
      await service.create({ type: "Hanshow", serial: "DEV-42" });
      await service.create({ type: "Hanshow", serial: "DEV-42" });
      let updates = 0;
      const run = pool.connect.bind(pool);
      pool.connect = async () => {
        const client = await run();
        return {
          query: async (text, values) => {
            if (text.startsWith("UPDATE") && ++updates === 2) {
              throw new Error("connection lost");
            }
            return client.query(text, values);
          },
          release: client.release,
        };
      };

      await expect(service.printAll("DEV-42")).rejects.toThrow("Postgres error: connection lost");
      expect(pool.rows.map((row) => row.printed)).toEqual([true, false]);
    });
  });

  it("refuses to mark an unsaved record", async () => {
    const esl = await service.create({ type: "Hanshow", serial: "DEV-42" });

    await expect(service.markPrinted({ ...esl, identity: null })).rejects.toBeInstanceOf(
      MissingIdentityError,
    );
  });

  it("delegates history to the store", async () => {
    pool.now = () => new Date("2024-03-01T09:00:00.000Z");
    await service.create({ type: "Hanshow", serial: "DEV-42", label_id: "abc123" });

    const found = await service.history(
      "DEV-42",
      "2024-03-01 08:59:59:999",
      "2024-03-01 09:00:00:001",
    );

    expect(found.map((esl) => esl.label_id)).toEqual(["abc123"]);
    expect(service.getIdentifier()).toBe("postgres");
  });
});
