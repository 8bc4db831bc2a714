import type { Rule } from "../rule.js";
import { parseInteger } from "../scalars.js";
import { checkOptionalUrl } from "./shared.js";

// A malformed return_window is an error: it leaves the policy unusable
export const returnsRule: Rule = {
  name: "returns",
  fields: ["return_policy", "return_window"],
  evaluate(record, report) {
    const policy = record.get("return_policy");
    if (policy !== undefined && policy !== null && policy !== "" && typeof policy !== "string") {
      report.warn("return_policy", "W_TYPE", "return_policy should be a URL string");
    } else {
      checkOptionalUrl(record, report, "return_policy");
    }

    if (record.has("return_window")) {
      const days = parseInteger(record.get("return_window"));
      if (days === null) {
        report.error("return_window", "E_FORMAT", "return_window must be an integer number of days");
      } else if (days <= 0) {
        report.error("return_window", "E_RANGE", "return_window must be a positive integer");
      }
    }
  },
};
