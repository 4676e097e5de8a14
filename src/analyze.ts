import _ from "lodash";
import { DEFAULT_PRICE_PER_REQUEST } from "./config";
import { API_STATUS_OVER_QUERY_LIMIT } from "./probe";
import type { AggregateReport, ConcurrencyMode, OutcomeRecord } from "./types";

export type AnalysisContext = {
  workers: number;
  concurrencyMode: ConcurrencyMode;
  pricePerRequest?: number;
  generatedAt: Date;
};

/**
 * Reduces a run's outcomes to the aggregate report. Returns `null` when
 * there is nothing to analyze. Depends only on its arguments.
 */
export function analyzeOutcomes(
  outcomes: readonly OutcomeRecord[],
  { workers, concurrencyMode, pricePerRequest = DEFAULT_PRICE_PER_REQUEST, generatedAt }: AnalysisContext
): AggregateReport | null {
  if (outcomes.length === 0) return null;

  const [successful, failed] = _.partition(outcomes, (r) => r.success);
  const totalRequests = outcomes.length;
  const successRate = (successful.length * 100) / totalRequests;

  const latencies = successful.map((r) => r.responseTimeMs);

  const errorAnalysis = _.countBy(failed, (r) => r.error ?? "Unknown error");
  const apiStatusDistribution = _.countBy(outcomes, (r) => r.apiStatus ?? "UNKNOWN");

  return {
    timestamp: generatedAt.toISOString(),
    testConfig: {
      workers,
      totalRequests,
      concurrencyMode,
    },
    successMetrics: {
      successfulRequests: successful.length,
      failedRequests: failed.length,
      successRatePercent: _.round(successRate, 2),
    },
    performanceMetrics: {
      avgResponseTimeMs: latencies.length > 0 ? _.mean(latencies) : 0,
      minResponseTimeMs: _.min(latencies) ?? 0,
      maxResponseTimeMs: _.max(latencies) ?? 0,
    },
    errorAnalysis,
    apiStatusDistribution,
    costAnalysis: {
      successfulRequests: successful.length,
      estimatedCostUsd: _.round(successful.length * pricePerRequest, 4),
      costPerRequestUsd: pricePerRequest,
    },
    securityAssessment: {
      rateLimitingDetected: failed.some((r) => (r.error ?? "").toLowerCase().includes("rate limit")),
      apiRestrictionsDetected: failed.some((r) => (r.error ?? "").includes("403")),
      quotaExceeded: outcomes.some((r) => (r.apiStatus ?? "").includes(API_STATUS_OVER_QUERY_LIMIT)),
      fullFunctionality: successRate > 90,
    },
  };
}
