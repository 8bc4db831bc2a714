import type { Rule } from "../rule.js";
import { parseInteger } from "../scalars.js";
import { checkOptionalUrl } from "./shared.js";

export const complianceRule: Rule = {
  name: "compliance",
  fields: ["warning", "warning_url", "age_restriction"],
  evaluate(record, report) {
    checkOptionalUrl(record, report, "warning_url");

    if (record.has("age_restriction")) {
      const age = parseInteger(record.get("age_restriction"));
      if (age === null) {
        report.warn("age_restriction", "W_FORMAT", "age_restriction should be an integer");
      } else if (age <= 0) {
        report.warn("age_restriction", "W_RANGE", "age_restriction should be a positive integer");
      }
    }
  },
};
