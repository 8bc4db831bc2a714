import { valueToText } from "../feedValue.js";
import type { Rule } from "../rule.js";

export const geoRule: Rule = {
  name: "geo",
  fields: ["geo_price", "geo_availability"],
  evaluate(record, report) {
    // only a light check: some currency code or region letter must appear
    if (record.has("geo_price") && !/[A-Za-z]/.test(valueToText(record.get("geo_price")))) {
      report.warn("geo_price", "W_FORMAT", "geo_price should include a currency code or region");
    }

    const availability = record.get("geo_availability");
    if (record.has("geo_availability") && typeof availability !== "string") {
      report.warn("geo_availability", "W_TYPE", "geo_availability should be text like 'US:in_stock'");
    }
  },
};
