import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Logger, formatEntry } from "./logs.js";
import { MetricsCollector } from "./metrics.js";
import { RecordingSink, loggerSink } from "./events.js";

describe("formatEntry", () => {
  it("should format every part of an entry", () => {
    expect(
      formatEntry({
        timestamp: "2026-01-01T00:00:00.000Z",
        event: "key.miss",
        recordType: "Person",
        key: "names",
        message: "no match",
        details: { value: "Nobody" },
      })
    ).toBe('[2026-01-01T00:00:00.000Z] [DEBUG] [key.miss] Person/names no match {"value":"Nobody"}');
  });

  it("should omit missing parts", () => {
    expect(
      formatEntry({ timestamp: "2026-01-01T00:00:00.000Z", event: "registry.init" })
    ).toBe("[2026-01-01T00:00:00.000Z] [DEBUG] [registry.init]");
  });
});

describe("Logger", () => {
  const previous = process.env.KEYED_REGISTRY_DEBUG;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    if (previous === undefined) {
      delete process.env.KEYED_REGISTRY_DEBUG;
    } else {
      process.env.KEYED_REGISTRY_DEBUG = previous;
    }
  });

  it("should print debug entries only when debugging is on", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new Logger();

    delete process.env.KEYED_REGISTRY_DEBUG;
    logger.debug("registry.init");
    expect(debug).not.toHaveBeenCalled();

    process.env.KEYED_REGISTRY_DEBUG = "1";
    logger.debug("registry.init");
    expect(debug).toHaveBeenCalledWith("[2026-01-01T00:00:00.000Z] [DEBUG] [registry.init]");
  });

  it("should print nothing when disabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new Logger();
    process.env.KEYED_REGISTRY_DEBUG = "1";

    logger.setEnabled(false);
    logger.debug("registry.init");

    expect(debug).not.toHaveBeenCalled();
  });

  it("should include record type, key and details", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new Logger();
    process.env.KEYED_REGISTRY_DEBUG = "1";

    logger.debug("key.resolve", { recordType: "Person", key: "names", details: { index: 0 } });

    expect(debug).toHaveBeenCalledWith(
      '[2026-01-01T00:00:00.000Z] [DEBUG] [key.resolve] Person/names {"index":0}'
    );
  });

  it("should forward sink events as debug entries", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    process.env.KEYED_REGISTRY_DEBUG = "1";

    loggerSink.emit({ type: "record.append", recordType: "Person", index: 0, size: 1 });
    loggerSink.emit({ type: "key.miss", recordType: "Person", key: "names", value: "Nobody" });

    expect(debug.mock.calls).toEqual([
      ['[2026-01-01T00:00:00.000Z] [DEBUG] [record.append] Person/ {"index":0,"size":1}'],
      [
        '[2026-01-01T00:00:00.000Z] [DEBUG] [key.miss] Person/names {"key":"names","value":"Nobody"}',
      ],
    ]);
  });
});

describe("RecordingSink", () => {
  it("should keep events in order until cleared", () => {
    const sink = new RecordingSink();

    sink.emit({ type: "registry.clear", recordType: "Person", removed: 2 });
    sink.emit({ type: "record.replace", recordType: "Person", index: 1 });

    expect(sink.types()).toEqual(["registry.clear", "record.replace"]);
    sink.clear();
    expect(sink.events).toEqual([]);
  });
});

describe("MetricsCollector", () => {
  let collector: MetricsCollector;

  beforeEach(() => {
    collector = new MetricsCollector();
  });

  it("should count hits and misses per key", () => {
    collector.recordHit("Person", "names");
    collector.recordHit("Person", "names");
    collector.recordMiss("Person", "names");
    collector.recordMiss("Person", "ids");

    expect(collector.getMetrics("Person", "names")).toEqual({
      hitCount: 2,
      missCount: 1,
      lookupTimeMs: [],
    });
    expect(collector.getHitRate("Person", "names")).toBeCloseTo(2 / 3);
    expect(collector.getHitRate("Person", "ids")).toBe(0);
    expect(collector.getHitRate("Person", "cities")).toBe(0);
  });

  it("should keep the last 100 lookup samples", () => {
    for (let i = 1; i <= 105; i++) {
      collector.recordLookupTime("Person", "names", i);
    }

    const samples = collector.getMetrics("Person", "names")?.lookupTimeMs ?? [];
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(6);
    expect(samples[99]).toBe(105);
  });

  it("should compute p95", () => {
    for (let i = 20; i >= 1; i--) {
      collector.recordLookupTime("Person", "names", i);
    }

    expect(collector.getP95LookupTime("Person", "names")).toBe(19);
    expect(collector.getP95([])).toBe(0);
    expect(collector.getP95LookupTime("Person", "ids")).toBe(0);
  });

  it("should reset one key or everything", () => {
    collector.recordHit("Person", "names");
    collector.recordHit("Person", "ids");

    collector.reset("Person", "names");
    expect(collector.getMetrics("Person", "names")).toBeUndefined();
    expect(collector.getAllMetrics().size).toBe(1);

    collector.reset();
    expect(collector.getAllMetrics().size).toBe(0);
  });
});
