import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { Agent as HttpAgent } from "node:http";
import { Agent as HttpsAgent } from "node:https";

export type HttpClientOptions = {
  timeoutMs: number;
  /** Reuse one pool of sockets across every request of the run. */
  keepAlive?: boolean;
  /** Upper bound on open sockets per host. */
  maxSockets?: number;
  /** Replaces the network layer, e.g. with an in-process stub. */
  adapter?: AxiosAdapter;
};

export function createHttpClient({ timeoutMs, keepAlive = false, maxSockets, adapter }: HttpClientOptions): AxiosInstance {
  const agentOptions = { keepAlive, maxSockets: maxSockets ?? Infinity };
  return axios.create({
    headers: {
      "User-Agent": process.env.USER_AGENT ?? "places-load-tester/1.0",
      Accept: "application/json",
    },
    timeout: timeoutMs,
    httpAgent: new HttpAgent(agentOptions),
    httpsAgent: new HttpsAgent(agentOptions),
    // every status is an outcome to classify, and bodies are parsed by the probe
    validateStatus: () => true,
    responseType: "text",
    transformResponse: [(data: unknown) => data],
    ...(adapter ? { adapter } : {}),
  });
}
