import { FieldTypeError } from "./errors.js";
import { buildFieldReport } from "./fieldReport.js";
import { logger } from "./logger.js";
import type { FeedRecord } from "./record.js";
import { messagesOf, RuleReport, type Rule, type RuleContext } from "./rule.js";
import { RULES } from "./rules/index.js";
import type { Diagnostic, RecordResult } from "./types.js";

export interface ValidateRecordOptions {
  /** Position of the record in its feed; carried into the result and logs. */
  index?: number;
  /** Fields to report rows for; defaults to the fields the rules inspect, in rule order. */
  fields?: readonly string[];
  rules?: readonly Rule[];
}

/**
 * Run every rule over one record, in order, and combine the results.
 * Built-in rules read fields through `RuleReport.text`, which degrades a list or map to a warning for
 * that field only. A rule that throws anyway keeps what it already reported and gets a warning in place
 * of the rest of its checks; the remaining rules still run.
 */
export function validateRecord(
  record: FeedRecord,
  context: RuleContext,
  options: ValidateRecordOptions = {}
): RecordResult {
  const { index = 0, rules = RULES } = options;
  const diagnostics: Diagnostic[] = [];
  const inspected: string[] = [];

  for (const rule of rules) {
    const report = new RuleReport();
    try {
      rule.evaluate(record, report, context);
    } catch (err) {
      reportRuleFailure(rule, report, err, index);
    }
    diagnostics.push(...report.diagnostics);
    for (const field of rule.fields) {
      if (!inspected.includes(field)) inspected.push(field);
    }
  }

  return {
    index,
    errors: messagesOf(diagnostics, "error"),
    warnings: messagesOf(diagnostics, "warning"),
    infos: messagesOf(diagnostics, "info"),
    diagnostics,
    fields: buildFieldReport(record, diagnostics, options.fields ?? inspected),
  };
}

function reportRuleFailure(rule: Rule, report: RuleReport, err: unknown, index: number): void {
  if (err instanceof FieldTypeError) {
    report.warn(
      err.field,
      "W_UNEXPECTED_TYPE",
      `${err.field} has unexpected type (${err.actual}); remaining ${rule.name} checks skipped`
    );
    logger.debug("Rule skipped field with unexpected type", { rule: rule.name, field: err.field, actual: err.actual, record: index });
    return;
  }
  const reason = err instanceof Error ? err.message : String(err);
  const field = rule.fields[0] ?? rule.name;
  report.warn(field, "W_RULE_FAILED", `${field} could not be fully checked: ${rule.name} rule failed (${reason})`);
  logger.warn("Rule failed", { rule: rule.name, reason, record: index });
}
