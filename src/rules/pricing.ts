import type { Rule } from "../rule.js";
import { parseDateRange, parsePrice } from "../scalars.js";

/**
 * Pricing rules. The price parser treats currency as optional; here a missing currency code is an
 * error. sale_price must not exceed price (exact comparison, no tolerance).
 */
export const pricingRule: Rule = {
  name: "pricing",
  fields: ["price", "sale_price", "sale_price_effective_date", "unit_pricing_measure"],
  evaluate(record, report) {
    const price = parsePrice(record.get("price"));
    if (!record.has("price")) {
      report.missing("price");
    } else if (price.amount === null) {
      report.error("price", "E_FORMAT", "price is not parseable (expected 'number CUR', e.g. '79.99 USD')");
    } else {
      if (price.amount < 0) report.error("price", "E_RANGE", "price must be a non-negative number");
      if (!price.currency) {
        report.error("price", "E_CURRENCY", "price must include an ISO 4217 currency code (e.g. USD)");
      }
    }

    if (record.has("sale_price")) {
      const sale = parsePrice(record.get("sale_price"));
      if (sale.amount === null) {
        report.error("sale_price", "E_FORMAT", "sale_price is not parseable as number + optional currency");
      } else if (sale.amount < 0) {
        report.error("sale_price", "E_RANGE", "sale_price must be a non-negative number");
      } else if (price.amount !== null && sale.amount > price.amount) {
        report.error("sale_price", "E_SALE_ABOVE_PRICE", "sale_price must be <= price");
      }
      if (!record.has("sale_price_effective_date")) {
        report.warn(
          "sale_price_effective_date",
          "W_RECOMMENDED",
          "sale_price is set but sale_price_effective_date is missing"
        );
      }
    }

    const effective = report.text(record, "sale_price_effective_date");
    if (effective !== undefined) {
      const range = parseDateRange(effective);
      if (!range.ok) {
        switch (range.reason) {
          case "shape":
            report.error(
              "sale_price_effective_date",
              "E_FORMAT",
              "sale_price_effective_date must be a start/end range 'YYYY-MM-DD / YYYY-MM-DD'"
            );
            break;
          case "date":
            report.error(
              "sale_price_effective_date",
              "E_DATE",
              "sale_price_effective_date start or end is not a valid ISO 8601 date"
            );
            break;
          case "order":
            report.error("sale_price_effective_date", "E_ORDER", "sale_price_effective_date start must be before end");
            break;
        }
      }
    }

    const measure = record.get("unit_pricing_measure");
    if (measure !== undefined && measure !== null && typeof measure !== "string") {
      report.warn("unit_pricing_measure", "W_TYPE", "unit_pricing_measure should be text like '16 oz / 1 oz'");
    }
  },
};
