import { describe, it, expect } from "vitest";
import { EslRecordSchema, EslWireSchema, fromWire, toWire } from "./types.js";
import { createRecord } from "./test-utils/index.js";

describe("EslWireSchema", () => {
  it("decodes a Parse object into a record", () => {
    const wire = EslWireSchema.parse({
      objectId: "abc123",
      type: "Pricer",
      serial: "DEV-42",
      printed: true,
      eslId: "L-1",
      itemId: "ITEM-9",
      nom: "Bar de ligne",
      prix: "24.90",
      tva: 5.5,
      createdAt: "2024-03-01T09:00:00.000Z",
      updatedAt: "2024-03-01T09:00:00.000Z",
    });

    const record = fromWire(wire);
    expect(record.identity).toBe("abc123");
    expect(record.type).toBe("Pricer");
    expect(record.printed).toBe(true);
    expect(record.label_id).toBe("L-1");
    expect(record.item_id).toBe("ITEM-9");
    expect(record.name).toBe("Bar de ligne");
    expect(record.price).toBe("24.90");
    expect(record.vat_rate).toBe(5.5);
    expect(record.created_at).toBe("2024-03-01T09:00:00.000Z");
    expect(record.origin).toBeNull();
  });

  it("accepts Parse Date objects and Date instances for createdAt", () => {
    const base = { type: "Hanshow", serial: "DEV-42", printed: false, eslId: "L-1" };

    const fromObject = EslWireSchema.parse({
      ...base,
      createdAt: { __type: "Date", iso: "2024-03-01T09:00:00.000Z" },
    });
    const fromDate = EslWireSchema.parse({
      ...base,
      createdAt: new Date("2024-03-01T09:00:00.000Z"),
    });

    expect(fromObject.createdAt).toBe("2024-03-01T09:00:00.000Z");
    expect(fromDate.createdAt).toBe("2024-03-01T09:00:00.000Z");
  });

  it("accepts SQL NULL for descriptive columns", () => {
    const record = fromWire(
      EslWireSchema.parse({
        objectId: "7f0c",
        type: "EasyVCO",
        serial: "DEV-42",
        printed: false,
        eslId: "L-2",
        nom: null,
        prix: null,
        createdAt: null,
      }),
    );

    expect(record.name).toBeNull();
    expect(record.price).toBeNull();
    expect(record.created_at).toBeNull();
  });

  it("rejects an unknown device type", () => {
    const result = EslWireSchema.safeParse({
      type: "Unknown",
      serial: "DEV-42",
      printed: false,
      eslId: "L-1",
    });
    expect(result.success).toBe(false);
  });

  describe("legacy migration", () => {
    it("reads a missing printed flag as false", () => {
      const wire = EslWireSchema.parse({ type: "Hanshow", serial: "DEV-42", eslId: "L-1" });
      expect(wire.printed).toBe(false);
    });

    it("moves id to eslId", () => {
      const wire = EslWireSchema.parse({
        type: "Hanshow",
        serial: "DEV-42",
        printed: false,
        id: "old-label",
      });
      expect(wire.eslId).toBe("old-label");
    });

    it("keeps eslId when both id and eslId are present", () => {
      const wire = EslWireSchema.parse({
        type: "Hanshow",
        serial: "DEV-42",
        printed: false,
        id: "old-label",
        eslId: "new-label",
      });
      expect(wire.eslId).toBe("new-label");
    });

    it("converts a numeric price to text", () => {
      const wire = EslWireSchema.parse({
        type: "Hanshow",
        serial: "DEV-42",
        printed: false,
        eslId: "L-1",
        prix: 12.5,
      });
      expect(wire.prix).toBe("12.5");
    });
  });
});

describe("toWire", () => {
  it("writes required fields and leaves out null ones", () => {
    const record = createRecord({ name: "Sole", price: "31.00", vat_rate: 5.5 });

    expect(toWire(record)).toEqual({
      type: "Hanshow",
      serial: "DEV-42",
      printed: false,
      eslId: "abc123",
      nom: "Sole",
      prix: "31.00",
      tva: 5.5,
    });
  });

  it("never sends backend-owned fields", () => {
    const record = {
      ...createRecord(),
      identity: "abc123",
      created_at: "2024-03-01T09:00:00.000Z",
    };

    const wire = toWire(record);
    expect(wire).not.toHaveProperty("objectId");
    expect(wire).not.toHaveProperty("createdAt");
  });

  it("reads back what it writes", () => {
    const record = createRecord({ item_id: "ITEM-9", origin: "FR", allergens: "poisson" });
    const back = fromWire(EslWireSchema.parse(toWire(record)));

    expect(back).toEqual(record);
  });
});

describe("EslRecordSchema", () => {
  it("defaults descriptive fields to null", () => {
    const record = EslRecordSchema.parse({
      type: "Hanshow",
      serial: "DEV-42",
      printed: false,
      identity: null,
      label_id: "L-1",
      created_at: null,
    });
    expect(record.name).toBeNull();
    expect(record.purchase_price).toBeNull();
  });
});
