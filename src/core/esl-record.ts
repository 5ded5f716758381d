import { customAlphabet } from "nanoid";
import type { CreateEslInput, EslRecord } from "../types.js";

const LABEL_ID_LENGTH = 24;

/** Random token for Hanshow labels, which have no printed barcode */
export const generateLabelId = customAlphabet(
  "0123456789abcdefghijklmnopqrstuvwxyz",
  LABEL_ID_LENGTH,
);

/**
 * Builds an unsaved record: not printed, no identity, no creation time.
 */
export function createEslRecord(input: CreateEslInput): EslRecord {
  return {
    type: input.type,
    serial: input.serial,
    printed: false,
    identity: null,
    label_id: input.label_id,
    item_id: input.item_id ?? null,
    name: input.name ?? null,
    scientific_name: input.scientific_name ?? null,
    price: input.price ?? null,
    price_info: input.price_info ?? null,
    fishing_gear: input.fishing_gear ?? null,
    zone: input.zone ?? null,
    zone_code: input.zone_code ?? null,
    sub_zone: input.sub_zone ?? null,
    sub_zone_code: input.sub_zone_code ?? null,
    plu: input.plu ?? null,
    size: input.size ?? null,
    freezing_info: input.freezing_info ?? null,
    origin: input.origin ?? null,
    allergens: input.allergens ?? null,
    label: input.label ?? null,
    production: input.production ?? null,
    vat_rate: input.vat_rate ?? null,
    category_code: input.category_code ?? null,
    purchase_price: input.purchase_price ?? null,
    created_at: null,
  };
}
