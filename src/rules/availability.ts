import type { Rule } from "../rule.js";
import { isIsoDate, isNonNegativeInteger, parseIsoDate } from "../scalars.js";

export const AVAILABILITY_VALUES = ["in_stock", "out_of_stock", "preorder"] as const;

/**
 * Availability and inventory.
 * - availability is matched exactly (case-sensitive, no trimming).
 * - preorder makes availability_date required, and it must be strictly after the run's `now`.
 */
export const availabilityRule: Rule = {
  name: "availability",
  fields: ["availability", "availability_date", "inventory_quantity", "expiration_date"],
  evaluate(record, report, { now }) {
    const availability = report.text(record, "availability");
    if (!record.has("availability")) {
      report.missing("availability");
    } else if (!AVAILABILITY_VALUES.some((v) => v === availability)) {
      report.error(
        "availability",
        "E_ENUM",
        `availability must be one of ${AVAILABILITY_VALUES.map((v) => `'${v}'`).join(", ")}`
      );
    }

    if (availability === "preorder") {
      const raw = report.text(record, "availability_date");
      const date = parseIsoDate(raw);
      if (!record.has("availability_date")) {
        report.error("availability_date", "E_REQUIRED_IF", "availability_date is required when availability='preorder'");
      } else if (!date) {
        report.error("availability_date", "E_DATE", "availability_date must be a valid ISO 8601 date");
      } else if (date.getTime() <= now.getTime()) {
        report.error("availability_date", "E_NOT_FUTURE", "availability_date must be a future date for preorder items");
      }
    }

    if (!record.has("inventory_quantity")) {
      report.missing("inventory_quantity");
    } else if (!isNonNegativeInteger(record.get("inventory_quantity"))) {
      report.error("inventory_quantity", "E_FORMAT", "inventory_quantity must be a non-negative integer");
    }

    const expiration = report.text(record, "expiration_date");
    if (expiration !== undefined && !isIsoDate(expiration)) {
      report.warn("expiration_date", "W_DATE", "expiration_date should be an ISO 8601 date");
    }
  },
};
