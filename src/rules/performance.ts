import type { Rule } from "../rule.js";
import { parseNumber } from "../scalars.js";

export const performanceRule: Rule = {
  name: "performance",
  fields: ["popularity_score", "return_rate"],
  evaluate(record, report) {
    if (record.has("popularity_score") && parseNumber(record.get("popularity_score")) === null) {
      report.warn("popularity_score", "W_FORMAT", "popularity_score should be numeric");
    }

    const rate = record.get("return_rate");
    if (record.has("return_rate")) {
      // "12%" and 12 both mean twelve percent
      const n = parseNumber(typeof rate === "string" ? rate.trim().replace(/%$/, "") : rate);
      if (n === null) {
        report.warn("return_rate", "W_FORMAT", "return_rate should be numeric or a percent string");
      } else if (n < 0 || n > 100) {
        report.warn("return_rate", "W_RANGE", "return_rate should be between 0 and 100%");
      }
    }
  },
};
