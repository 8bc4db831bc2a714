import { describe, it, expect } from "vitest";
import { FeedError, validateFeedFromBuffer, validateFeedText } from "../index.js";
import { NOW, validProduct } from "./fixtures.js";

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("validateFeedFromBuffer", () => {
  it("validates a JSON upload end to end", async () => {
    const feed = { products: [validProduct(), { ...validProduct(), id: "" }] };
    const { records, result } = await validateFeedFromBuffer(encode(JSON.stringify(feed)), "catalog.json", { now: NOW });
    expect(records).toHaveLength(2);
    expect(result.totalRecords).toBe(2);
    expect(result.totalErrors).toBe(1);
    expect(result.records[1].errors).toEqual(["Missing required field: id"]);
    expect(result.issueFrequency).toEqual([{ message: "Missing required field: id", count: 1 }]);
  });

  it("validates an XML upload passed as an ArrayBuffer", async () => {
    const xml = `<rss><channel><item><id>0001</id><title>Cap</title></item></channel></rss>`;
    const bytes = encode(xml);
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    const { records, result } = await validateFeedFromBuffer(buffer, "catalog.xml", { now: NOW, fields: ["id"] });
    expect(records[0].get("id")).toBe("0001");
    expect(result.records[0].fields).toEqual([
      { field: "id", present: true, value: "0001", display: "0001", status: "present", note: null },
    ]);
  });

  it("rejects unsupported file types", async () => {
    await expect(validateFeedFromBuffer(encode("a,b"), "catalog.csv")).rejects.toMatchObject({
      code: "UNSUPPORTED_FORMAT",
      message: "Unsupported file type. Upload JSON or XML only.",
    });
  });

  it("lets the caller override the detected format", async () => {
    const { result } = await validateFeedFromBuffer(encode("[]"), "export.txt", { format: "json", now: NOW });
    expect(result.totalRecords).toBe(0);
  });

  it("rejects invalid options before reading the feed", async () => {
    await expect(
      validateFeedFromBuffer(encode("not json"), "catalog.json", { maxDiscoveryDepth: 1.5 })
    ).rejects.toBeInstanceOf(FeedError);
  });
});

describe("validateFeedText", () => {
  it("reports parse failures for the whole feed", () => {
    expect(() => validateFeedText("<feed>", "xml", { now: NOW })).toThrowError(FeedError);
  });

  it("stamps the result with the reference time", () => {
    expect(validateFeedText("[]", "json", { now: NOW }).result.now).toBe("2025-06-15T12:00:00.000Z");
  });
});
