import type { Rule } from "../rule.js";
import { checkOneOf } from "./shared.js";

export const RELATIONSHIP_TYPES = [
  "part_of_set",
  "required_part",
  "often_bought_with",
  "substitute",
  "different_brand",
  "accessory",
] as const;

export const relatedRule: Rule = {
  name: "related",
  fields: ["related_product_id", "relationship_type"],
  evaluate(record, report) {
    checkOneOf(record, report, "relationship_type", RELATIONSHIP_TYPES);
    if (record.has("relationship_type") && !record.has("related_product_id")) {
      report.warn(
        "related_product_id",
        "W_RECOMMENDED_IF",
        "related_product_id is recommended when relationship_type is set"
      );
    }
  },
};
