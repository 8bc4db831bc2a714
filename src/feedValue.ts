import { FeedError } from "./errors.js";

/**
 * Module: Feed Value Tree
 * Purpose: Typed view of decoded feed content. JSON and XML both decode into this tree so
 * discovery and rules never touch `unknown`.
 */
export type FeedValue = null | boolean | number | string | FeedValue[] | FeedMap;
export interface FeedMap {
  [key: string]: FeedValue;
}

export type FeedValueKind = "null" | "boolean" | "number" | "string" | "list" | "map";

export const MAX_NESTING = 256;

export const isFeedMap = (v: FeedValue | undefined): v is FeedMap =>
  typeof v === "object" && v !== null && !Array.isArray(v);

export const isFeedList = (v: FeedValue | undefined): v is FeedValue[] => Array.isArray(v);

/** Own data property on a map; a `__proto__` key stays a field instead of replacing the prototype. */
export function setField(map: FeedMap, key: string, value: FeedValue): void {
  Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

export const ownField = (map: FeedMap, key: string): FeedValue | undefined =>
  Object.hasOwn(map, key) ? map[key] : undefined;

export const kindOf = (v: FeedValue): FeedValueKind => {
  if (v === null) return "null";
  if (Array.isArray(v)) return "list";
  switch (typeof v) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    case "string":
      return "string";
    default:
      return "map";
  }
};

/**
 * Convert a decoded JSON value into a `FeedValue`, rejecting nesting deeper than `MAX_NESTING`.
 */
export function toFeedValue(input: unknown, depth = 0): FeedValue {
  if (depth > MAX_NESTING) {
    throw new FeedError("PARSE_ERROR", `JSON nesting exceeds ${MAX_NESTING} levels`);
  }
  if (input === null || input === undefined) return null;
  if (typeof input === "string" || typeof input === "number" || typeof input === "boolean") return input;
  if (Array.isArray(input)) return input.map((item: unknown) => toFeedValue(item, depth + 1));
  if (typeof input === "object") {
    const out: FeedMap = {};
    for (const [key, value] of Object.entries(input)) {
      setField(out, key, toFeedValue(value, depth + 1));
    }
    return out;
  }
  // bigint / function / symbol never come out of JSON.parse
  return String(input);
}

/**
 * Render any value as text: scalars as-is, lists and maps as compact JSON.
 */
export const valueToText = (v: FeedValue | undefined): string => {
  if (v === undefined || v === null) return "";
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return JSON.stringify(v);
};
