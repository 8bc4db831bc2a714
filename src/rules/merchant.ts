import type { Rule } from "../rule.js";
import { isEnabledFlag } from "./flags.js";
import { checkOptionalUrl } from "./shared.js";

const CHECKOUT_POLICIES = ["seller_privacy_policy", "seller_tos"] as const;

export const merchantRule: Rule = {
  name: "merchant",
  fields: ["seller_name", "seller_url", "seller_privacy_policy", "seller_tos"],
  evaluate(record, report) {
    if (!record.has("seller_name")) {
      report.warn("seller_name", "W_RECOMMENDED", "seller_name is recommended (merchant display name)");
    }
    checkOptionalUrl(record, report, "seller_url");

    const checkout = isEnabledFlag(record.get("enable_checkout"));
    for (const field of CHECKOUT_POLICIES) {
      if (checkout && !record.has(field)) {
        report.warn(field, "W_RECOMMENDED_IF", `${field} is recommended when enable_checkout is true`);
      }
      checkOptionalUrl(record, report, field);
    }
  },
};
