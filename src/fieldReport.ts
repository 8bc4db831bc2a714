import { valueToText } from "./feedValue.js";
import type { FeedRecord } from "./record.js";
import type { Diagnostic, FieldReportRow } from "./types.js";

/**
 * Fields shown in a full per-product report, in display order.
 */
export const DISPLAY_FIELDS: readonly string[] = [
  "id", "title", "description", "link", "image_link", "additional_image_link",
  "price", "sale_price", "sale_price_effective_date", "unit_pricing_measure", "pricing_trend",
  "availability", "availability_date", "inventory_quantity", "expiration_date",
  "condition", "product_category", "brand", "material", "dimensions", "length", "width", "height", "weight",
  "item_group_id", "item_group_title", "color", "size", "size_system", "gender", "offer_id",
  "custom_variant1_category", "custom_variant1_option", "custom_variant2_category", "custom_variant2_option",
  "shipping", "shipping_weight", "shipping_label", "tax", "seller_name", "seller_tos", "seller_privacy_policy",
  "enable_search", "enable_checkout", "geo_availability", "geo_price", "language", "updated_at", "created_at",
  "video_link", "model_3d_link", "raw_review_data", "q_and_a", "schema_org_json_ld", "metadata",
];

export const MISSING_PLACEHOLDER = "—";

const escapeRegExp = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * True when `message` names `field` as a whole token: "id" matches "Missing required field: id"
 * but not "item_group_id" or "invalid". Case-insensitive.
 */
export function mentionsField(message: string, field: string): boolean {
  const re = new RegExp(`(^|[^a-z0-9_])${escapeRegExp(field.toLowerCase())}($|[^a-z0-9_])`);
  return re.test(message.toLowerCase());
}

/**
 * One row per field: `invalid` when an error names the field, otherwise `present` or `missing`.
 * The note is the first error naming the field, else the first warning.
 */
export function buildFieldReport(
  record: FeedRecord,
  diagnostics: readonly Diagnostic[],
  fields: readonly string[]
): FieldReportRow[] {
  return fields.map((field) => {
    const value = record.get(field);
    const present = record.has(field);
    const error = diagnostics.find((d) => d.severity === "error" && mentionsField(d.message, field));
    const warning = diagnostics.find((d) => d.severity === "warning" && mentionsField(d.message, field));
    return {
      field,
      present,
      value,
      display: present ? valueToText(value) : MISSING_PLACEHOLDER,
      status: error ? "invalid" : present ? "present" : "missing",
      note: error?.message ?? warning?.message ?? null,
    };
  });
}
