import { kindOf } from "./feedValue.js";
import type { FeedRecord } from "./record.js";
import type { Diagnostic, Severity } from "./types.js";

/**
 * Module: Rule Contract
 * Purpose: Shared shape of the rule modules. A rule reads one record and reports diagnostics; it
 * never mutates the record and never talks to another rule.
 */
export interface RuleContext {
  /** Reference time for time-relative checks, fixed for the whole run. */
  now: Date;
}

export interface Rule {
  readonly name: string;
  /** Fields the rule inspects, in the order their report rows are shown. */
  readonly fields: readonly string[];
  evaluate(record: FeedRecord, report: RuleReport, context: RuleContext): void;
}

export interface RuleOutput {
  errors: string[];
  warnings: string[];
  infos: string[];
  diagnostics: Diagnostic[];
  fields: readonly string[];
}

/**
 * Collects a rule's diagnostics as it runs, so whatever was reported before a failure is kept.
 */
export class RuleReport {
  readonly diagnostics: Diagnostic[] = [];
  private readonly mistyped = new Set<string>();

  error(field: string, code: string, message: string): void {
    this.push("error", field, code, message);
  }

  warn(field: string, code: string, message: string): void {
    this.push("warning", field, code, message);
  }

  info(field: string, code: string, message: string): void {
    this.push("info", field, code, message);
  }

  /** `Missing required field: <field>` as an error. */
  missing(field: string): void {
    this.error(field, "E_REQUIRED", `Missing required field: ${field}`);
  }

  /**
   * Scalar field as text, `undefined` when absent or empty. A list or map gets one
   * `W_UNEXPECTED_TYPE` warning and also reads as `undefined`, so the caller's other checks still run;
   * use `record.has` to tell it apart from a missing field.
   */
  text(record: FeedRecord, field: string): string | undefined {
    const value = record.get(field);
    if (typeof value === "object" && value !== null) {
      if (!this.mistyped.has(field)) {
        this.mistyped.add(field);
        this.warn(field, "W_UNEXPECTED_TYPE", `${field} has unexpected type (${kindOf(value)})`);
      }
      return undefined;
    }
    return record.text(field);
  }

  private push(severity: Severity, field: string, code: string, message: string): void {
    this.diagnostics.push({ severity, field, code, message });
  }
}

export const messagesOf = (diagnostics: readonly Diagnostic[], severity: Severity): string[] =>
  diagnostics.filter((d) => d.severity === severity).map((d) => d.message);

export function toRuleOutput(rule: Rule, report: RuleReport): RuleOutput {
  const { diagnostics } = report;
  return {
    errors: messagesOf(diagnostics, "error"),
    warnings: messagesOf(diagnostics, "warning"),
    infos: messagesOf(diagnostics, "info"),
    diagnostics,
    fields: rule.fields,
  };
}

/** Run one rule in isolation. Exceptions propagate; the orchestrator is where they are contained. */
export function evaluateRule(rule: Rule, record: FeedRecord, context: RuleContext): RuleOutput {
  const report = new RuleReport();
  rule.evaluate(record, report, context);
  return toRuleOutput(rule, report);
}
