import type { OutcomeRecord } from "./types";

/**
 * Append-only store for one run's outcomes. Records are frozen on the way in
 * and a worker id may only report once.
 */
export class OutcomeCollector {
  private readonly records: OutcomeRecord[] = [];
  private readonly seen = new Set<number>();

  append(record: OutcomeRecord): OutcomeRecord {
    if (this.seen.has(record.workerId)) {
      throw new Error(`Worker ${record.workerId} already reported an outcome`);
    }
    const frozen = Object.freeze({ ...record });
    this.seen.add(record.workerId);
    this.records.push(frozen);
    return frozen;
  }

  get size(): number {
    return this.records.length;
  }

  snapshot(): readonly OutcomeRecord[] {
    return Object.freeze([...this.records]);
  }
}
