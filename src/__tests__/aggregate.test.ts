import { describe, it, expect } from "vitest";
import { buildIssueFrequency, validateRecords } from "../aggregate.js";
import { FeedError } from "../errors.js";
import type { FeedValue } from "../feedValue.js";
import { FeedRecord } from "../record.js";
import { ENGINE_VERSION } from "../types.js";
import { NOW, recordOf, validProduct, validWith, validWithout } from "./fixtures.js";

describe("validateRecords", () => {
  it("returns an empty summary for an empty feed", () => {
    const result = validateRecords([], { now: NOW });
    expect(result).toEqual({
      totalRecords: 0,
      evaluatedRecords: 0,
      totalErrors: 0,
      totalWarnings: 0,
      totalInfos: 0,
      issueFrequency: [],
      records: [],
      aborted: false,
      now: "2025-06-15T12:00:00.000Z",
      engineVersion: ENGINE_VERSION,
    });
  });

  it("counts repeated messages across records", () => {
    const result = validateRecords([validWithout("title"), validWithout("title"), recordOf(validProduct())], { now: NOW });
    expect(result.totalRecords).toBe(3);
    expect(result.totalErrors).toBe(2);
    expect(result.totalWarnings).toBe(0);
    expect(result.issueFrequency).toEqual([{ message: "Missing required field: title", count: 2 }]);
    expect(result.records.map((r) => r.index)).toEqual([0, 1, 2]);
  });

  it("sums errors, warnings and infos per record", () => {
    const result = validateRecords(
      [
        validWith({ link: "http://shop.example.com/p/1", schema_org_json_ld: "{}" }),
        validWith({ price: "79.99", availability: "sold" }),
      ],
      { now: NOW }
    );
    expect(result.totalErrors).toBe(2);
    expect(result.totalWarnings).toBe(1);
    expect(result.totalInfos).toBe(1);
    expect(result.records[1].errors).toEqual([
      "price must include an ISO 4217 currency code (e.g. USD)",
      "availability must be one of 'in_stock', 'out_of_stock', 'preorder'",
    ]);
  });

  it("evaluates time-relative rules against the run's reference time", () => {
    const record = validWith({ availability: "preorder", availability_date: "2025-07-01" });
    expect(validateRecords([record], { now: "2025-06-15T00:00:00Z" }).totalErrors).toBe(0);
    expect(validateRecords([record], { now: "2025-08-01T00:00:00Z" }).records[0].errors).toEqual([
      "availability_date must be a future date for preorder items",
    ]);
  });

  it("stops between records once the signal is aborted", () => {
    const controller = new AbortController();
    class AbortingRecord extends FeedRecord {
      override get(field: string): FeedValue | undefined {
        controller.abort();
        return super.get(field);
      }
    }
    const first = new AbortingRecord(Object.entries(validProduct()));
    const result = validateRecords([first, recordOf(validProduct()), recordOf(validProduct())], {
      now: NOW,
      signal: controller.signal,
    });
    expect(result.aborted).toBe(true);
    expect(result.totalRecords).toBe(3);
    expect(result.evaluatedRecords).toBe(1);
    expect(result.records).toHaveLength(1);
  });

  it("rejects unknown or malformed options", () => {
    expect(() => validateRecords([], { now: "tomorrow" })).toThrowError(FeedError);
    try {
      validateRecords([], { maxDiscoveryDepth: 0 });
      expect.unreachable("invalid options must throw");
    } catch (err) {
      expect(err).toBeInstanceOf(FeedError);
      if (err instanceof FeedError) expect(err.code).toBe("INVALID_OPTIONS");
    }
  });
});

describe("buildIssueFrequency", () => {
  const result = (errors: string[], warnings: string[] = [], infos: string[] = []) => ({
    index: 0,
    errors,
    warnings,
    infos,
    diagnostics: [],
    fields: [],
  });

  it("orders by count and keeps first-seen order for ties", () => {
    const table = buildIssueFrequency([
      result(["b"], ["a"]),
      result(["c"], ["a"]),
      result(["b"], [], ["ignored"]),
    ]);
    expect(table).toEqual([
      { message: "b", count: 2 },
      { message: "a", count: 2 },
      { message: "c", count: 1 },
    ]);
  });
});
