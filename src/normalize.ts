import { DEFAULT_MAX_DISCOVERY_DEPTH } from "./config.js";
import { FeedError } from "./errors.js";
import { isFeedMap, setField, toFeedValue, type FeedMap, type FeedValue } from "./feedValue.js";
import { FeedRecord } from "./record.js";
import type { FeedFormat } from "./types.js";
import { findDescendants, parseXmlDocument, type XmlElement } from "./xml.js";

/**
 * Module: Record Normalizer
 * Purpose: Turn raw JSON or XML feed text into an ordered list of `FeedRecord`s.
 * Design:
 * - JSON: root list of objects, else a reserved container key, else breadth-first search for the
 *   first list of objects, else the root object itself as a one-record feed.
 * - XML: `item`, then `product`, then `entry` descendants, else the root's children; one level of
 *   nested elements is kept as a map, repeated child elements become a list.
 * - Syntax errors are fatal for the whole feed (`FeedError` PARSE_ERROR).
 */
export const CONTAINER_KEYS = ["products", "items", "feed", "entries", "data"] as const;
export const XML_RECORD_TAGS = ["item", "product", "entry"] as const;

export function detectFeedFormat(filename: string): FeedFormat {
  const lower = filename.toLowerCase();
  if (lower.endsWith(".json")) return "json";
  if (lower.endsWith(".xml")) return "xml";
  throw new FeedError("UNSUPPORTED_FORMAT", "Unsupported file type. Upload JSON or XML only.", { filename });
}

const isRecordList = (v: FeedValue): v is FeedMap[] => Array.isArray(v) && v.every(isFeedMap);

/**
 * Locate the list of records inside a decoded JSON tree. Returns `[]` when nothing record-like exists.
 */
export function discoverRecords(root: FeedValue, maxDepth = DEFAULT_MAX_DISCOVERY_DEPTH): FeedMap[] {
  if (isRecordList(root)) return root;

  if (isFeedMap(root)) {
    const keys = Object.keys(root);
    for (const container of CONTAINER_KEYS) {
      const key = keys.find((k) => k.toLowerCase() === container);
      if (key === undefined) continue;
      const candidate = root[key];
      if (isRecordList(candidate)) return candidate;
    }
  }

  const queue: Array<{ value: FeedValue; depth: number }> = [{ value: root, depth: 0 }];
  for (let head = 0; head < queue.length; head++) {
    const { value, depth } = queue[head];
    if (Array.isArray(value) && value.length > 0 && isRecordList(value)) return value;
    if (depth >= maxDepth) continue;
    const children = Array.isArray(value) ? value : isFeedMap(value) ? Object.values(value) : [];
    for (const child of children) queue.push({ value: child, depth: depth + 1 });
  }

  return isFeedMap(root) ? [root] : [];
}

export function parseJsonFeed(text: string, maxDepth = DEFAULT_MAX_DISCOVERY_DEPTH): FeedRecord[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FeedError("PARSE_ERROR", `Invalid JSON: ${reason}`);
  }
  return discoverRecords(toFeedValue(decoded), maxDepth).map((m) => FeedRecord.fromMap(m));
}

const elementValue = (el: XmlElement): FeedValue => {
  if (el.children.length === 0) return el.text;
  const inner: FeedMap = {};
  for (const child of el.children) setField(inner, child.name, child.text);
  return inner;
};

const elementToRecord = (el: XmlElement): FeedRecord => {
  const fields = new Map<string, FeedValue>();
  for (const child of el.children) {
    const value = elementValue(child);
    const existing = fields.get(child.name);
    if (existing === undefined) {
      fields.set(child.name, value);
    } else if (Array.isArray(existing)) {
      // element values are text or maps, so a list here is one we folded
      existing.push(value);
    } else {
      fields.set(child.name, [existing, value]);
    }
  }
  return new FeedRecord(fields);
};

export function parseXmlFeed(text: string): FeedRecord[] {
  const root = parseXmlDocument(text);
  let candidates: XmlElement[] = [];
  for (const tag of XML_RECORD_TAGS) {
    candidates = findDescendants(root, tag);
    if (candidates.length > 0) break;
  }
  if (candidates.length === 0) candidates = root.children;
  return candidates.map(elementToRecord);
}

export function normalizeFeed(
  text: string,
  format: FeedFormat,
  maxDepth = DEFAULT_MAX_DISCOVERY_DEPTH
): FeedRecord[] {
  switch (format) {
    case "json":
      return parseJsonFeed(text, maxDepth);
    case "xml":
      return parseXmlFeed(text);
  }
}
