import type { Rule } from "../rule.js";
import { isIsoDate } from "../scalars.js";

const TIMESTAMP_FIELDS = ["updated_at", "created_at"] as const;

/**
 * Feed freshness timestamps plus structured-data presence, which is reported as info only.
 */
export const freshnessRule: Rule = {
  name: "freshness",
  fields: ["updated_at", "created_at", "schema_org_json_ld"],
  evaluate(record, report) {
    if (!TIMESTAMP_FIELDS.some((f) => record.has(f))) {
      report.warn("updated_at", "W_RECOMMENDED", "updated_at or created_at is recommended for feed freshness tracking");
    }
    for (const field of TIMESTAMP_FIELDS) {
      const value = report.text(record, field);
      if (value !== undefined && !isIsoDate(value)) {
        report.warn(field, "W_DATE", `${field} should be an ISO 8601 date-time`);
      }
    }

    if (record.has("schema_org_json_ld")) {
      report.info("schema_org_json_ld", "I_STRUCTURED_DATA", "schema_org_json_ld present (structured data available)");
    }
  },
};
