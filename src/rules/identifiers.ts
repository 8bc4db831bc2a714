import type { Rule } from "../rule.js";
import { checkMaxLength } from "./shared.js";

const GTIN_RE = /^[0-9]{8,14}$/;

// gtin or mpn must be present; gtin format is only advisory
export const identifiersRule: Rule = {
  name: "identifiers",
  fields: ["gtin", "mpn"],
  evaluate(record, report) {
    const gtin = report.text(record, "gtin");
    if (!record.has("gtin") && !record.has("mpn")) {
      report.error("gtin", "E_REQUIRED_ONE_OF", "Either 'gtin' or 'mpn' must be provided");
    }
    if (!record.has("gtin")) {
      report.warn("gtin", "W_RECOMMENDED", "gtin is recommended (8-14 digits)");
    } else if (gtin !== undefined && !GTIN_RE.test(gtin)) {
      report.warn("gtin", "W_FORMAT", "gtin should be 8-14 digits with no spaces or dashes");
    }
    checkMaxLength(record, report, "mpn", 70);
  },
};
