import { isFeedMap, ownField, valueToText, type FeedMap } from "../feedValue.js";
import type { Rule, RuleReport } from "../rule.js";
import { isIsoDate, isWellFormedShippingEntry, parsePrice, splitListValue, splitShippingEntry } from "../scalars.js";

const SHIPPING_KEYS = ["country", "service", "price"] as const;

// Structured entry, e.g. <shipping><country/><region/><service/><price/></shipping>
function checkShippingMap(entry: FeedMap, report: RuleReport): void {
  const missing = SHIPPING_KEYS.filter((key) => {
    const value = key === "service" ? ownField(entry, "service") ?? ownField(entry, "service_class") : ownField(entry, key);
    return value === undefined || value === null || value === "";
  });
  if (missing.length > 0) {
    report.warn("shipping", "W_FORMAT", `shipping entry is missing ${missing.join(", ")}`);
    return;
  }
  const price = ownField(entry, "price");
  if (parsePrice(price).amount === null) {
    report.warn("shipping", "W_PRICE", `shipping entry price not parseable in '${valueToText(price)}'`);
  }
}

/**
 * Shipping entries are `country:region:service_class:price` text, given as a list or comma-joined
 * text, or maps with `country`, `region`, `service` and `price` keys. Warnings quote the offending
 * entry or price verbatim.
 */
export const fulfillmentRule: Rule = {
  name: "fulfillment",
  fields: ["shipping", "delivery_estimate"],
  evaluate(record, report) {
    for (const item of splitListValue(record.get("shipping"))) {
      if (isFeedMap(item)) {
        checkShippingMap(item, report);
        continue;
      }
      const entry = valueToText(item).trim();
      if (!entry) continue;
      if (!isWellFormedShippingEntry(entry)) {
        report.warn("shipping", "W_FORMAT", `shipping entry '${entry}' expected 'country:region:service_class:price'`);
      } else if (parsePrice(splitShippingEntry(entry)[3]).amount === null) {
        report.warn("shipping", "W_PRICE", `shipping entry price not parseable in '${entry}'`);
      }
    }

    const estimate = report.text(record, "delivery_estimate");
    if (estimate !== undefined && !isIsoDate(estimate)) {
      report.warn("delivery_estimate", "W_DATE", "delivery_estimate should be an ISO 8601 date");
    }
  },
};
