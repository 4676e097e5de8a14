import { describe, expect, it } from "vitest";
import { OutcomeCollector } from "./collector";
import type { OutcomeRecord } from "./types";

const record = (workerId: number): OutcomeRecord => ({
  workerId,
  query: "copec",
  timestamp: "2025-06-14T09:30:05.000Z",
  responseTimeMs: 100,
  statusCode: 200,
  success: true,
  resultsCount: 1,
  apiStatus: "OK",
});

describe("OutcomeCollector", () => {
  it("stores frozen copies in arrival order", () => {
    const collector = new OutcomeCollector();
    const input = record(2);
    const stored = collector.append(input);
    collector.append(record(1));

    expect(Object.isFrozen(stored)).toBe(true);
    expect(stored).not.toBe(input);
    expect(collector.size).toBe(2);
    expect(collector.snapshot().map((r) => r.workerId)).toEqual([2, 1]);
  });

  it("rejects a second outcome for the same worker", () => {
    const collector = new OutcomeCollector();
    collector.append(record(1));
    expect(() => collector.append(record(1))).toThrow("Worker 1 already reported an outcome");
    expect(collector.size).toBe(1);
  });

  it("hands out snapshots that later appends do not change", () => {
    const collector = new OutcomeCollector();
    collector.append(record(1));
    const before = collector.snapshot();
    collector.append(record(2));
    expect(before).toHaveLength(1);
    expect(Object.isFrozen(before)).toBe(true);
  });
});
