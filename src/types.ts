import { z } from "zod";

/**
 * Device families. A new family is a new member here, never a subclass.
 */
export const EslTypeSchema = z.enum(["Hanshow", "Pricer", "EasyVCO"]);

export type EslType = z.infer<typeof EslTypeSchema>;

export const ESL_TYPES: readonly EslType[] = EslTypeSchema.options;

const optionalText = z.string().nullable().default(null);
const optionalNumber = z.number().nullable().default(null);

/**
 * An ESL price-tag record as the rest of the code sees it.
 *
 * `identity` and `created_at` are owned by the backend: both are null until a
 * successful save and never change afterwards.
 */
export const EslRecordSchema = z.object({
  type: EslTypeSchema,
  serial: z.string(),
  printed: z.boolean(),
  identity: z.string().nullable(),
  label_id: z.string(),
  /** Only Pricer labels carry an item id */
  item_id: optionalText,
  name: optionalText,
  scientific_name: optionalText,
  price: optionalText,
  price_info: optionalText,
  fishing_gear: optionalText,
  zone: optionalText,
  zone_code: optionalText,
  sub_zone: optionalText,
  sub_zone_code: optionalText,
  plu: optionalText,
  size: optionalText,
  freezing_info: optionalText,
  origin: optionalText,
  allergens: optionalText,
  label: optionalText,
  // fished, farmed, freshwater...
  production: optionalText,
  vat_rate: optionalNumber,
  category_code: optionalText,
  purchase_price: optionalNumber,
  created_at: z.string().nullable(),
});

export type EslRecord = z.infer<typeof EslRecordSchema>;

/** Descriptive fields a caller may set when building a record */
export type EslDetails = Partial<
  Omit<EslRecord, "type" | "serial" | "label_id" | "printed" | "identity" | "created_at">
>;

export interface CreateEslInput extends EslDetails {
  type: EslType;
  serial: string;
  label_id: string;
}

// ============ Wire format ============

/**
 * Parse dates come back either as plain ISO strings (createdAt on objects) or
 * as `{ __type: "Date", iso }`; the pg driver hands out Date instances.
 */
const TimestampSchema = z
  .union([
    z.string(),
    z.date(),
    z.object({ __type: z.literal("Date"), iso: z.string() }),
  ])
  .transform((value) => {
    if (value instanceof Date) return value.toISOString();
    if (typeof value === "string") return value;
    return value.iso;
  });

const wireText = z.string().nullish();
const wireNumber = z.number().nullish();

/**
 * Migrates records written by earlier revisions of the schema:
 * - `printed` did not exist; those labels were never printed
 * - the label id was stored as `id` before it became `eslId`
 * - `prix` was briefly numeric
 */
function migrateLegacyWire(data: unknown): unknown {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return data;
  }

  const record: Record<string, unknown> = { ...data };

  if (record.printed === undefined || record.printed === null) {
    record.printed = false;
  }

  if (record.eslId === undefined && typeof record.id === "string") {
    record.eslId = record.id;
  }
  delete record.id;

  if (typeof record.prix === "number") {
    record.prix = String(record.prix);
  }

  return record;
}

/**
 * The record as it travels over the wire: REST JSON bodies and SQL rows share
 * the same field names.
 */
export const EslWireSchema = z.preprocess(
  migrateLegacyWire,
  z.object({
    type: EslTypeSchema,
    serial: z.string(),
    printed: z.boolean(),
    objectId: z.string().nullish(),
    eslId: z.string(),
    itemId: wireText,
    nom: wireText,
    nomScientifique: wireText,
    prix: wireText,
    infosPrix: wireText,
    engin: wireText,
    zone: wireText,
    zoneCode: wireText,
    sousZone: wireText,
    sousZoneCode: wireText,
    plu: wireText,
    taille: wireText,
    congelInfos: wireText,
    origine: wireText,
    allergenes: wireText,
    label: wireText,
    production: wireText,
    tva: wireNumber,
    codeCategorie: wireText,
    prixAchat: wireNumber,
    createdAt: TimestampSchema.nullish(),
  }),
);

export type EslWire = z.infer<typeof EslWireSchema>;

export function fromWire(wire: EslWire): EslRecord {
  return {
    type: wire.type,
    serial: wire.serial,
    printed: wire.printed,
    identity: wire.objectId ?? null,
    label_id: wire.eslId,
    item_id: wire.itemId ?? null,
    name: wire.nom ?? null,
    scientific_name: wire.nomScientifique ?? null,
    price: wire.prix ?? null,
    price_info: wire.infosPrix ?? null,
    fishing_gear: wire.engin ?? null,
    zone: wire.zone ?? null,
    zone_code: wire.zoneCode ?? null,
    sub_zone: wire.sousZone ?? null,
    sub_zone_code: wire.sousZoneCode ?? null,
    plu: wire.plu ?? null,
    size: wire.taille ?? null,
    freezing_info: wire.congelInfos ?? null,
    origin: wire.origine ?? null,
    allergens: wire.allergenes ?? null,
    label: wire.label ?? null,
    production: wire.production ?? null,
    vat_rate: wire.tva ?? null,
    category_code: wire.codeCategorie ?? null,
    purchase_price: wire.prixAchat ?? null,
    created_at: wire.createdAt ?? null,
  };
}

/**
 * Serializes a record for writing. Backend-owned fields (`objectId`,
 * `createdAt`) are never sent and null descriptive fields are left out.
 */
export function toWire(record: EslRecord): Record<string, string | number | boolean> {
  const descriptive: Record<string, string | number | null> = {
    itemId: record.item_id,
    nom: record.name,
    nomScientifique: record.scientific_name,
    prix: record.price,
    infosPrix: record.price_info,
    engin: record.fishing_gear,
    zone: record.zone,
    zoneCode: record.zone_code,
    sousZone: record.sub_zone,
    sousZoneCode: record.sub_zone_code,
    plu: record.plu,
    taille: record.size,
    congelInfos: record.freezing_info,
    origine: record.origin,
    allergenes: record.allergens,
    label: record.label,
    production: record.production,
    tva: record.vat_rate,
    codeCategorie: record.category_code,
    prixAchat: record.purchase_price,
  };

  const wire: Record<string, string | number | boolean> = {
    type: record.type,
    serial: record.serial,
    printed: record.printed,
    eslId: record.label_id,
  };

  for (const [name, value] of Object.entries(descriptive)) {
    if (value !== null) {
      wire[name] = value;
    }
  }

  return wire;
}
