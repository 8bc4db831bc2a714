import { isFeedMap, ownField, toFeedValue, valueToText, type FeedMap, type FeedValue } from "./feedValue.js";

/**
 * Module: Scalar Parsers
 * Purpose: Tolerant, pure parsers for the ambiguous scalar encodings found in product feeds.
 * Features:
 * - http(s) URL predicate (absolute, non-empty host).
 * - ISO-8601 date / date-time parse with a predicate that accepts exactly the same inputs.
 * - Three-tier price parse: "79.99 USD" pattern, structured `{value, currency}`, token fallback.
 * - Integer / number coercion from loosely-typed values.
 * - Shipping tuple and list splitting, `start / end` date ranges.
 * Currency is optional here; the pricing rule decides whether its absence is an error.
 */

const ISO_DATE_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?(Z|z|[+-]\d{2}(?::?\d{2})?)?)?$/;
const PRICE_RE = /^\s*([0-9]+(?:\.[0-9]+)?)\s*([A-Z]{3})?\s*$/;
const CURRENCY_RE = /^[A-Z]{3}$/;
const NUMBER_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_RE = /^[+-]?\d+$/;

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
const isLeap = (year: number): boolean => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
const daysInMonth = (year: number, month: number): number => (month === 2 && isLeap(year) ? 29 : MONTH_DAYS[month - 1]);

export function isHttpUrl(value: FeedValue | undefined): boolean {
  if (typeof value !== "string" || !/^https?:\/\/[^/\s]/i.test(value)) return false;
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  return (url.protocol === "http:" || url.protocol === "https:") && url.hostname !== "";
}

/**
 * Parse `YYYY-MM-DD` or an ISO-8601 date-time (`T` or space separator, optional seconds, fraction
 * and offset). A value without an offset is read as UTC. Returns `null` for anything else,
 * including impossible calendar dates such as 2025-02-30.
 */
export function parseIsoDate(value: FeedValue | undefined): Date | null {
  if (typeof value !== "string") return null;
  const m = ISO_DATE_RE.exec(value.trim());
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const hour = m[4] === undefined ? 0 : Number(m[4]);
  const minute = m[5] === undefined ? 0 : Number(m[5]);
  const second = m[6] === undefined ? 0 : Number(m[6]);
  const millis = m[7] === undefined ? 0 : Number(m[7].slice(0, 3).padEnd(3, "0"));
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  let offsetMinutes = 0;
  const zone = m[8];
  if (zone && zone !== "Z" && zone !== "z") {
    const digits = zone.slice(1).replace(":", "");
    const oh = Number(digits.slice(0, 2));
    const om = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
    if (oh > 23 || om > 59) return null;
    offsetMinutes = (zone[0] === "-" ? -1 : 1) * (oh * 60 + om);
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return new Date(date.getTime() - offsetMinutes * 60_000);
}

export const isIsoDate = (value: FeedValue | undefined): boolean => parseIsoDate(value) !== null;

/** Strict decimal number from text or a JSON number; `null` otherwise. */
export function parseNumber(value: FeedValue | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const s = value.trim();
  if (!NUMBER_RE.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** Whole number from integer text (`"12"`, `" +3 "`) or an integral JSON number. */
export function parseInteger(value: FeedValue | undefined): number | null {
  if (typeof value === "number") return Number.isInteger(value) ? value : null;
  if (typeof value !== "string") return null;
  const s = value.trim();
  if (!INTEGER_RE.test(s)) return null;
  return Number.parseInt(s, 10);
}

export const isNonNegativeInteger = (value: FeedValue | undefined): boolean => {
  const n = parseInteger(value);
  return n !== null && n >= 0;
};

export interface ParsedPrice {
  amount: number | null;
  currency: string | null;
}

const NO_PRICE: ParsedPrice = { amount: null, currency: null };

const priceFromMap = (map: FeedMap): ParsedPrice | null => {
  const amount = parseNumber(ownField(map, "value"));
  if (amount === null) return null;
  const cur = ownField(map, "currency");
  const currency = typeof cur === "string" && cur.trim() !== "" ? cur.trim() : null;
  return { amount, currency };
};

const tryParseJson = (text: string): FeedValue | undefined => {
  try {
    return toFeedValue(JSON.parse(text));
  } catch {
    // not JSON; the caller moves on to the next tier
    return undefined;
  }
};

/**
 * Parse a price with tiered tolerance:
 * 1. `<number>[ ]<CUR>?` e.g. "79.99 USD", "79.99", "79.99USD"
 * 2. structured `{ "value": 79.99, "currency": "USD" }` (a nested map, or JSON text)
 * 3. whitespace tokens: first token numeric, second token a 3-letter upper-case code
 */
export function parsePrice(value: FeedValue | undefined): ParsedPrice {
  if (value === undefined || value === null || Array.isArray(value)) return NO_PRICE;
  if (isFeedMap(value)) return priceFromMap(value) ?? NO_PRICE;

  const s = valueToText(value).trim();
  const m = PRICE_RE.exec(s);
  if (m) return { amount: Number(m[1]), currency: m[2] ?? null };

  if (s.startsWith("{")) {
    const parsed = tryParseJson(s);
    if (isFeedMap(parsed)) {
      const structured = priceFromMap(parsed);
      if (structured) return structured;
    }
  }

  const parts = s.split(/\s+/).filter(Boolean);
  if (parts.length === 0) return NO_PRICE;
  const amount = parseNumber(parts[0]);
  if (amount === null) return NO_PRICE;
  const currency = parts.length > 1 && CURRENCY_RE.test(parts[1]) ? parts[1] : null;
  return { amount, currency };
}

/** `country:region:service_class:price` split on every colon. */
export const splitShippingEntry = (entry: string): string[] => entry.split(":");

export const isWellFormedShippingEntry = (entry: string): boolean => splitShippingEntry(entry).length >= 4;

/**
 * Elements of a multi-valued field: a list as-is, a comma-joined string split and trimmed,
 * anything else as a single element.
 */
export function splitListValue(value: FeedValue | undefined): FeedValue[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value;
  if (typeof value === "string" && value.includes(",")) {
    return value.split(",").map((s) => s.trim()).filter(Boolean);
  }
  return [value];
}

export type DateRangeResult =
  | { ok: true; start: Date; end: Date }
  | { ok: false; reason: "shape" | "date" | "order" };

/** `start / end` with optional whitespace around the slash; start must be strictly before end. */
export function parseDateRange(value: string): DateRangeResult {
  const parts = value.trim().split(/\s*\/\s*/);
  if (parts.length !== 2) return { ok: false, reason: "shape" };
  const start = parseIsoDate(parts[0]);
  const end = parseIsoDate(parts[1]);
  if (!start || !end) return { ok: false, reason: "date" };
  if (start.getTime() >= end.getTime()) return { ok: false, reason: "order" };
  return { ok: true, start, end };
}
