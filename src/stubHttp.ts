import {
  AxiosError,
  CanceledError,
  type AxiosAdapter,
  type AxiosInstance,
  type GenericAbortSignal,
  type InternalAxiosRequestConfig,
} from "axios";
import { createHttpClient } from "./http";

// In-process stand-in for the places endpoint, used by the tests.

export type StubReply =
  | { status: number; body?: unknown; raw?: string; delayMs?: number }
  | { fail: string; code?: string; delayMs?: number };

export type StubRequest = {
  url?: string;
  query: string;
  params: Record<string, unknown>;
};

function wait(ms: number, signal?: GenericAbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CanceledError());
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener?.("abort", () => {
      clearTimeout(timer);
      reject(new CanceledError());
    });
  });
}

function readParams(config: InternalAxiosRequestConfig): Record<string, unknown> {
  const params: unknown = config.params;
  return typeof params === "object" && params !== null ? { ...params } : {};
}

export type StubHttp = {
  http: AxiosInstance;
  requests: StubRequest[];
  inFlight: () => number;
  maxInFlight: () => number;
};

export function stubHttp(reply: (req: StubRequest) => StubReply): StubHttp {
  const requests: StubRequest[] = [];
  let current = 0;
  let peak = 0;

  const adapter: AxiosAdapter = async (config) => {
    const params = readParams(config);
    const req = { url: config.url, query: String(params.query ?? ""), params };
    requests.push(req);
    const r = reply(req);

    current += 1;
    peak = Math.max(peak, current);
    try {
      await wait(r.delayMs ?? 0, config.signal);
      if ("fail" in r) {
        throw new AxiosError(r.fail, r.code, config);
      }
      const data = r.raw ?? (r.body === undefined ? "" : JSON.stringify(r.body));
      return { data, status: r.status, statusText: String(r.status), headers: {}, config, request: {} };
    } finally {
      current -= 1;
    }
  };

  return {
    http: createHttpClient({ timeoutMs: 30_000, adapter }),
    requests,
    inFlight: () => current,
    maxInFlight: () => peak,
  };
}

export const okReply = (results = 3): StubReply => ({
  status: 200,
  body: { status: "OK", results: Array.from({ length: results }, (_, i) => ({ name: `place ${i}` })) },
});
