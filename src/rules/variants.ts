import type { Rule } from "../rule.js";
import { checkMaxLength } from "./shared.js";

export const VARIANT_FIELDS = ["color", "size", "offer_id"] as const;

// item_group_id is required as soon as any variant attribute is set on the row
export const variantsRule: Rule = {
  name: "variants",
  fields: ["item_group_id", "item_group_title", "color", "size", "offer_id"],
  evaluate(record, report) {
    const isVariant = VARIANT_FIELDS.some((f) => record.has(f));
    if (isVariant && !record.has("item_group_id")) {
      report.error("item_group_id", "E_REQUIRED_IF", "item_group_id is required when variant rows are present");
    }
    checkMaxLength(record, report, "color", 40);
    checkMaxLength(record, report, "size", 20);
  },
};
