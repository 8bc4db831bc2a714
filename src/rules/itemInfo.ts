import { valueToText } from "../feedValue.js";
import type { Rule } from "../rule.js";
import { parseNumber } from "../scalars.js";
import { charLength, checkOneOf } from "./shared.js";

const CONDITIONS = ["new", "refurbished", "used"] as const;
const AGE_GROUPS = ["newborn", "infant", "toddler", "kids", "adult"] as const;
const BRAND_MAX = 70;

/**
 * Recommended descriptive attributes. Everything here is warning-tier.
 * - product_category also accepts `category` and `google_product_category`.
 * - weight also accepts `shipping_weight`; the leading token must be numeric ("1.2 kg").
 */
export const itemInfoRule: Rule = {
  name: "itemInfo",
  fields: ["condition", "product_category", "brand", "material", "weight", "age_group"],
  evaluate(record, report) {
    checkOneOf(record, report, "condition", CONDITIONS);

    if (!record.firstPresent("product_category", "category", "google_product_category")) {
      report.warn("product_category", "W_RECOMMENDED", "product_category is recommended for classification and relevance");
    }

    const brand = report.text(record, "brand");
    if (!record.has("brand")) {
      report.warn("brand", "W_RECOMMENDED", `brand is recommended for most products (max ${BRAND_MAX} chars)`);
    } else if (brand !== undefined && charLength(brand) > BRAND_MAX) {
      report.warn("brand", "W_LENGTH", `brand exceeds recommended max length of ${BRAND_MAX} characters`);
    }

    if (!record.has("material")) {
      report.warn("material", "W_RECOMMENDED", "material is recommended");
    }

    const weight = record.firstPresent("weight", "shipping_weight");
    if (!weight) {
      report.warn("weight", "W_RECOMMENDED", "weight (or shipping_weight) is recommended as a positive number with unit");
    } else {
      const [amount] = valueToText(weight.value).trim().split(/\s+/);
      const n = parseNumber(amount);
      if (n === null || n <= 0) {
        report.warn(weight.field, "W_FORMAT", `${weight.field} should start with a positive number, e.g. '1.5 kg'`);
      }
    }

    checkOneOf(record, report, "age_group", AGE_GROUPS);
  },
};
