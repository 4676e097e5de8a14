import type { AxiosInstance } from "axios";
import _ from "lodash";
import pLimit from "p-limit";
import { OutcomeCollector } from "./collector";
import type { TesterConfig } from "./config";
import { createHttpClient } from "./http";
import { probePlace, transportFailure } from "./probe";
import { buildRequestParams, QUERY_TEMPLATE, type QueryTemplate } from "./queries";
import type { ConcurrencyMode, OutcomeRecord, RunMetrics } from "./types";
import { nowIso } from "./utils";

export type DispatchOptions = {
  /** Called once per stored record; `completed` counts records stored so far. */
  onOutcome?: (record: OutcomeRecord, completed: number) => void;
  /** Aborting stops new requests and cancels the ones in flight. */
  signal?: AbortSignal;
};

export type DispatchResult = {
  outcomes: readonly OutcomeRecord[];
  metrics: RunMetrics;
};

export interface Dispatcher {
  readonly mode: ConcurrencyMode;
  dispatch(count: number, options?: DispatchOptions): Promise<DispatchResult>;
}

export type DispatchTarget = {
  http: AxiosInstance;
  baseUrl: string;
  apiKey: string;
  template?: QueryTemplate;
};

function probeWorker(target: DispatchTarget, workerId: number, signal?: AbortSignal): Promise<OutcomeRecord> {
  const { http, baseUrl, apiKey, template } = target;
  return probePlace(http, { baseUrl, apiKey, template, workerId, signal });
}

function workerIds(count: number): number[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Worker count must be a positive integer, got ${count}`);
  }
  return _.range(1, count + 1);
}

function summarize(collector: OutcomeCollector, requested: number, startedAt: number, signal?: AbortSignal): DispatchResult {
  const totalTimeSeconds = (performance.now() - startedAt) / 1000;
  return {
    outcomes: collector.snapshot(),
    metrics: {
      requested,
      completed: collector.size,
      interrupted: signal?.aborted ?? false,
      totalTimeSeconds: _.round(totalTimeSeconds, 2),
      requestsPerSecond: totalTimeSeconds > 0 ? _.round(collector.size / totalTimeSeconds, 2) : 0,
    },
  };
}

/** A fixed number of pool slots work through the queue; outcomes stream as each request finishes. */
export class BoundedParallelDispatcher implements Dispatcher {
  readonly mode = "bounded_parallel";

  constructor(
    private readonly target: DispatchTarget,
    private readonly poolSize: number
  ) {}

  async dispatch(count: number, { onOutcome, signal }: DispatchOptions = {}): Promise<DispatchResult> {
    const ids = workerIds(count);
    const collector = new OutcomeCollector();
    const limit = pLimit(this.poolSize);
    const startedAt = performance.now();

    const tasks = ids.map((workerId) =>
      limit(async () => {
        if (signal?.aborted) return;
        const record = await probeWorker(this.target, workerId, signal);
        if (signal?.aborted) return;
        const stored = collector.append(record);
        onOutcome?.(stored, collector.size);
      })
    );
    await Promise.all(tasks);

    return summarize(collector, count, startedAt, signal);
  }
}

/**
 * Every request goes out at once over one shared client and the batch is
 * awaited as a whole. A task that rejects is recorded as a transport
 * failure without touching its siblings.
 */
export class CooperativeDispatcher implements Dispatcher {
  readonly mode = "cooperative";

  constructor(private readonly target: DispatchTarget) {}

  async dispatch(count: number, { onOutcome, signal }: DispatchOptions = {}): Promise<DispatchResult> {
    const ids = workerIds(count);
    const collector = new OutcomeCollector();
    const startedAt = performance.now();
    const template = this.target.template ?? QUERY_TEMPLATE;

    const settled = await Promise.allSettled(
      ids.map(async (workerId) => {
        const record = await probeWorker(this.target, workerId, signal);
        return { record, afterAbort: signal?.aborted ?? false };
      })
    );

    settled.forEach((result, i) => {
      const workerId = ids[i];
      let record: OutcomeRecord;
      if (result.status === "fulfilled") {
        if (result.value.afterAbort) return;
        record = result.value.record;
      } else {
        if (signal?.aborted) return;
        const { query } = buildRequestParams(workerId, this.target.apiKey, template);
        record = transportFailure(workerId, query, nowIso(), result.reason);
      }
      const stored = collector.append(record);
      onOutcome?.(stored, collector.size);
    });

    return summarize(collector, count, startedAt, signal);
  }
}

export type DispatcherDeps = {
  http?: AxiosInstance;
  template?: QueryTemplate;
};

export function createDispatcher(config: TesterConfig, deps: DispatcherDeps = {}): Dispatcher {
  const timeoutMs = config.timeoutSeconds * 1000;
  const base = { baseUrl: config.baseUrl, apiKey: config.apiKey, template: deps.template };

  switch (config.concurrencyMode) {
    case "cooperative":
      return new CooperativeDispatcher({
        ...base,
        http: deps.http ?? createHttpClient({ timeoutMs, keepAlive: true }),
      });
    case "bounded_parallel":
      return new BoundedParallelDispatcher(
        { ...base, http: deps.http ?? createHttpClient({ timeoutMs, maxSockets: config.poolSize }) },
        config.poolSize
      );
  }
}
