import type { FeedRecord } from "../record.js";
import type { RuleReport } from "../rule.js";
import { isHttpUrl, splitListValue } from "../scalars.js";

export const isHttps = (url: string): boolean => url.toLowerCase().startsWith("https");

/** Length in code points, so an emoji counts as one character. */
export const charLength = (text: string): number => [...text].length;

/**
 * Optional multi-valued URL field (single URL, comma-joined text or list). Every element must be an
 * http(s) URL; the first bad element yields one warning for the field.
 */
export function checkUrlList(record: FeedRecord, report: RuleReport, field: string): void {
  if (!record.has(field)) return;
  const elements = splitListValue(record.get(field));
  if (elements.some((u) => !isHttpUrl(u))) {
    report.warn(field, "W_URL", `${field} contains an invalid URL`);
  }
}

/** Optional single URL field; warns when set to something that is not an http(s) URL. */
export function checkOptionalUrl(record: FeedRecord, report: RuleReport, field: string): void {
  const value = report.text(record, field);
  if (value !== undefined && !isHttpUrl(value)) {
    report.warn(field, "W_URL", `${field} should be a valid http(s) URL`);
  }
}

/** Optional text field with a soft length cap. */
export function checkMaxLength(record: FeedRecord, report: RuleReport, field: string, max: number): void {
  const value = report.text(record, field);
  if (value !== undefined && charLength(value) > max) {
    report.warn(field, "W_LENGTH", `${field} exceeds recommended max length of ${max} characters`);
  }
}

export function checkOneOf(
  record: FeedRecord,
  report: RuleReport,
  field: string,
  allowed: readonly string[]
): void {
  const value = report.text(record, field);
  if (value !== undefined && !allowed.includes(value)) {
    report.warn(field, "W_ENUM", `${field} should be one of ${allowed.map((a) => `'${a}'`).join(", ")}`);
  }
}
