import { describe, it, expect, vi, afterEach } from "vitest";
import { logger, runWithContext, setLogLevel, startSpan } from "../logger.js";
import { validateRecord } from "../orchestrator.js";
import type { Rule } from "../rule.js";
import { NOW, recordOf } from "./fixtures.js";

describe("logger", () => {
  const lines = (spy: { mock: { calls: unknown[][] } }): unknown[] =>
    spy.mock.calls.map((call) => JSON.parse(String(call[0])));

  const captureLogs = () => vi.spyOn(console, "log").mockImplementation(() => undefined);

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel("warn");
  });

  it("drops lines below the threshold", () => {
    const spy = captureLogs();
    setLogLevel("warn");
    logger.info("quiet");
    logger.warn("loud", { records: 2 });
    expect(lines(spy)).toEqual([expect.objectContaining({ level: "warn", message: "loud", records: 2 })]);
  });

  it("attaches the run context to every line", () => {
    const spy = captureLogs();
    setLogLevel("info");
    runWithContext({ runId: "run-1", source: "catalog.json" }, () => logger.info("Feed validated"));
    expect(lines(spy)).toEqual([
      expect.objectContaining({ runId: "run-1", source: "catalog.json", message: "Feed validated" }),
    ]);
  });

  it("logs span durations at debug level", () => {
    const spy = captureLogs();
    setLogLevel("debug");
    startSpan("normalize").end({ records: 3 });
    const [started, ended] = lines(spy);
    expect(started).toEqual(expect.objectContaining({ level: "debug", message: "Span started: normalize" }));
    expect(ended).toEqual(expect.objectContaining({ message: "Span ended: normalize", records: 3 }));
    expect(ended).toHaveProperty("durationMs");
  });

  it("keeps unexpected field types out of the default log level", () => {
    const spy = captureLogs();
    const reader: Rule = {
      name: "reader",
      fields: ["tags"],
      evaluate(record) {
        record.text("tags");
      },
    };
    validateRecord(recordOf({ tags: ["a"] }), { now: NOW }, { rules: [reader] });
    expect(lines(spy)).toEqual([]);

    setLogLevel("debug");
    validateRecord(recordOf({ tags: ["a"] }), { now: NOW }, { rules: [reader] });
    expect(lines(spy)).toEqual([
      expect.objectContaining({ level: "debug", message: "Rule skipped field with unexpected type", field: "tags" }),
    ]);
  });
});
