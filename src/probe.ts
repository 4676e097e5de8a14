import type { AxiosInstance } from "axios";
import _ from "lodash";
import { z } from "zod";
import { buildRequestParams, QUERY_TEMPLATE, type QueryTemplate } from "./queries";
import type { OutcomeRecord } from "./types";
import { formatError, nowIso } from "./utils";

export const API_STATUS_OK = "OK";
export const API_STATUS_OVER_QUERY_LIMIT = "OVER_QUERY_LIMIT";
const DENIED_STATUSES = ["REQUEST_DENIED", "INVALID_REQUEST"];

// Only a body that is not a JSON object is unreadable; mistyped fields fall back.
const PlacesResponseSchema = z.object({
  status: z.string().catch("UNKNOWN"),
  results: z.array(z.unknown()).catch([]),
  error_message: z.string().optional().catch(undefined),
});

export type Classification = Pick<OutcomeRecord, "success" | "resultsCount" | "apiStatus" | "error">;

function parseBody(data: unknown): unknown {
  return typeof data === "string" ? JSON.parse(data) : data;
}

/** Maps a received response onto the outcome fields. Never throws. */
export function classifyResponse(statusCode: number, data: unknown): Classification {
  const outcome: Classification = { success: false, resultsCount: 0, apiStatus: "UNKNOWN" };

  if (statusCode === 403) return { ...outcome, error: "Forbidden (403)" };
  if (statusCode === 429) return { ...outcome, error: "Too Many Requests (429)" };
  if (statusCode !== 200) return { ...outcome, error: `HTTP ${statusCode}` };

  let body: z.infer<typeof PlacesResponseSchema>;
  try {
    const parsed = PlacesResponseSchema.safeParse(parseBody(data));
    if (!parsed.success) return { ...outcome, error: "Invalid JSON response" };
    body = parsed.data;
  } catch {
    return { ...outcome, error: "Invalid JSON response" };
  }

  const apiStatus = body.status;
  if (apiStatus === API_STATUS_OK) {
    return { success: true, resultsCount: body.results.length, apiStatus };
  }
  if (DENIED_STATUSES.includes(apiStatus)) {
    return { ...outcome, apiStatus, error: body.error_message ?? "API request denied" };
  }
  if (apiStatus === API_STATUS_OVER_QUERY_LIMIT) {
    return { ...outcome, apiStatus, error: "Rate limit exceeded" };
  }
  return { ...outcome, apiStatus };
}

export type ProbeOptions = {
  baseUrl: string;
  apiKey: string;
  workerId: number;
  signal?: AbortSignal;
  template?: QueryTemplate;
};

/**
 * Issues one search request and describes how it went. Transport failures
 * (timeouts, refused connections, DNS, aborts) become a record with status
 * code 0 instead of an exception.
 */
export async function probePlace(http: AxiosInstance, options: ProbeOptions): Promise<OutcomeRecord> {
  const { baseUrl, apiKey, workerId, signal, template = QUERY_TEMPLATE } = options;
  const params = buildRequestParams(workerId, apiKey, template);
  const timestamp = nowIso();
  const start = performance.now();

  try {
    const res = await http.get<unknown>(baseUrl, { params, signal });
    const responseTimeMs = _.round(performance.now() - start, 2);
    return {
      workerId,
      query: params.query,
      timestamp,
      responseTimeMs,
      statusCode: res.status,
      ...classifyResponse(res.status, res.data),
    };
  } catch (error) {
    return transportFailure(workerId, params.query, timestamp, error);
  }
}

export function transportFailure(workerId: number, query: string, timestamp: string, error: unknown): OutcomeRecord {
  return {
    workerId,
    query,
    timestamp,
    responseTimeMs: 0,
    statusCode: 0,
    success: false,
    resultsCount: 0,
    error: formatError(error),
  };
}
