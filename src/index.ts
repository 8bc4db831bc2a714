import { validateResolved } from "./aggregate.js";
import { resolveOptions, type ValidateOptions } from "./config.js";
import { generateRunId, logger, runWithContext, startSpan } from "./logger.js";
import { detectFeedFormat, normalizeFeed } from "./normalize.js";
import type { FeedFormat, FeedResult } from "./types.js";
import type { FeedRecord } from "./record.js";

export * from "./types.js";
export * from "./scalars.js";
export { FeedError, FieldTypeError, FEED_ERROR_CODES, type FeedErrorCode } from "./errors.js";
export { FeedRecord } from "./record.js";
export { isFeedList, isFeedMap, valueToText, type FeedMap, type FeedValue } from "./feedValue.js";
export { resolveOptions, DEFAULT_MAX_DISCOVERY_DEPTH, type ValidateOptions, type ResolvedOptions } from "./config.js";
export { detectFeedFormat, discoverRecords, normalizeFeed, CONTAINER_KEYS, XML_RECORD_TAGS } from "./normalize.js";
export { evaluateRule, RuleReport, type Rule, type RuleContext, type RuleOutput } from "./rule.js";
export * from "./rules/index.js";
export { validateRecord, type ValidateRecordOptions } from "./orchestrator.js";
export { buildFieldReport, mentionsField, DISPLAY_FIELDS, MISSING_PLACEHOLDER } from "./fieldReport.js";
export { validateRecords, buildIssueFrequency } from "./aggregate.js";
export { buildExportRows, exportRowsToCsv, exportRowsToXlsx, EXPORT_COLUMNS } from "./export.js";
export { logger, setLogLevel, type LogLevel } from "./logger.js";

/**
 * Module: Validation Core Entry Point
 * Purpose: Validate a JSON or XML product feed from text or bytes and return per-record diagnostics
 * plus aggregate counts.
 * Notes:
 * - Accepts `ArrayBuffer` / `Uint8Array` so web and server callers can pass upload bytes directly.
 * - Parse failures and unsupported formats throw `FeedError`; nothing is partially reported.
 */
export interface ValidatedFeed {
  records: FeedRecord[];
  result: FeedResult;
}

/**
 * Normalize and validate feed text of a known format.
 */
export function validateFeedText(text: string, format: FeedFormat, options: ValidateOptions = {}): ValidatedFeed {
  const resolved = resolveOptions(options);
  const parseSpan = startSpan("normalize");
  const records = normalizeFeed(text, format, resolved.maxDiscoveryDepth);
  parseSpan.end({ format, records: records.length });
  const result = validateResolved(records, resolved);
  logger.info("Feed validated", {
    format,
    records: result.totalRecords,
    errors: result.totalErrors,
    warnings: result.totalWarnings,
  });
  return { records, result };
}

/**
 * Validate an uploaded feed file.
 *
 * Parameters:
 * - `fileBytes`: raw bytes of the upload (UTF-8).
 * - `filename`: original file name; `.json` / `.xml` picks the format unless `options.format` is set.
 * - `options`: `{ format?, now?, fields?, maxDiscoveryDepth?, signal? }`.
 */
export async function validateFeedFromBuffer(
  fileBytes: ArrayBuffer | Uint8Array,
  filename: string,
  options: ValidateOptions = {}
): Promise<ValidatedFeed> {
  return runWithContext({ runId: generateRunId(), source: filename }, () => {
    const format = options.format ?? detectFeedFormat(filename);
    const text = new TextDecoder("utf-8").decode(fileBytes);
    return validateFeedText(text, format, options);
  });
}
