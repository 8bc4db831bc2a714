import { resolveOptions, type ResolvedOptions, type ValidateOptions } from "./config.js";
import { logger, startSpan } from "./logger.js";
import { validateRecord } from "./orchestrator.js";
import type { FeedRecord } from "./record.js";
import { ENGINE_VERSION, type FeedResult, type IssueCount, type RecordResult } from "./types.js";

/**
 * Module: Feed Aggregation
 * Purpose: Validate every record of a feed in input order and summarise the run.
 * Notes:
 * - `now` is resolved once per run and shared read-only by every record.
 * - Results land in an index-addressed array; an abort (via `signal`) keeps the records already
 *   evaluated, in order, and marks the result `aborted`.
 * - The issue table counts errors and warnings by exact message, most frequent first; ties keep
 *   first-seen order.
 */
export function validateRecords(records: readonly FeedRecord[], options: ValidateOptions = {}): FeedResult {
  return validateResolved(records, resolveOptions(options));
}

export function validateResolved(records: readonly FeedRecord[], options: ResolvedOptions): FeedResult {
  const span = startSpan("evaluate");
  const context = { now: options.now };
  const results: RecordResult[] = new Array<RecordResult>(records.length);

  let evaluated = 0;
  let aborted = false;
  for (let i = 0; i < records.length; i++) {
    if (options.signal?.aborted) {
      aborted = true;
      break;
    }
    results[i] = validateRecord(records[i], context, { index: i, fields: options.fields });
    evaluated = i + 1;
  }

  const done = results.slice(0, evaluated);
  const result: FeedResult = {
    totalRecords: records.length,
    evaluatedRecords: evaluated,
    totalErrors: sum(done, (r) => r.errors.length),
    totalWarnings: sum(done, (r) => r.warnings.length),
    totalInfos: sum(done, (r) => r.infos.length),
    issueFrequency: buildIssueFrequency(done),
    records: done,
    aborted,
    now: options.now.toISOString(),
    engineVersion: ENGINE_VERSION,
  };
  span.end({ records: records.length, evaluated, aborted });
  if (aborted) {
    logger.warn("Feed validation aborted", { evaluated, total: records.length });
  }
  return result;
}

const sum = (results: readonly RecordResult[], count: (r: RecordResult) => number): number =>
  results.reduce((acc, r) => acc + count(r), 0);

export function buildIssueFrequency(results: readonly RecordResult[]): IssueCount[] {
  const counts = new Map<string, number>();
  for (const r of results) {
    for (const message of [...r.errors, ...r.warnings]) {
      counts.set(message, (counts.get(message) ?? 0) + 1);
    }
  }
  // Array#sort is stable, so equal counts stay in first-seen order
  return [...counts.entries()]
    .map(([message, count]) => ({ message, count }))
    .sort((a, b) => b.count - a.count);
}
