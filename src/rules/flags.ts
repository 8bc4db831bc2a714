import type { FeedValue } from "../feedValue.js";
import type { Rule } from "../rule.js";

export type FlagValue = boolean | "invalid" | undefined;

/** `true` / `false` (JSON booleans or lower-case text); anything else set is "invalid". */
export function parseFlag(value: FeedValue | undefined): FlagValue {
  if (value === undefined || value === null || value === "") return undefined;
  if (value === true || value === "true") return true;
  if (value === false || value === "false") return false;
  return "invalid";
}

export const isEnabledFlag = (value: FeedValue | undefined): boolean => parseFlag(value) === true;

/**
 * enable_search / enable_checkout. Both flags are read before the cross-field check, so the
 * order they appear in the record does not matter.
 */
export const flagsRule: Rule = {
  name: "flags",
  fields: ["enable_search", "enable_checkout"],
  evaluate(record, report) {
    const search = parseFlag(record.get("enable_search"));
    const checkout = parseFlag(record.get("enable_checkout"));

    for (const [field, flag] of [
      ["enable_search", search],
      ["enable_checkout", checkout],
    ] as const) {
      if (flag === undefined) {
        report.warn(field, "W_RECOMMENDED", `${field} is recommended; use lower-case 'true' or 'false'`);
      } else if (flag === "invalid") {
        report.warn(field, "W_FORMAT", `${field} must be lower-case 'true' or 'false'`);
      }
    }

    if (checkout === true && search !== true) {
      report.error("enable_checkout", "E_DEPENDENCY", "enable_checkout cannot be true when enable_search is not true");
    }
  },
};
