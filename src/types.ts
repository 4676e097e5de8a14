export type ConcurrencyMode = "bounded_parallel" | "cooperative";

export type PlaceRequestParams = {
  query: string;
  key: string;
  location: string; // "lat,lng"
  radius: number; // metres
  language: string;
};

export type OutcomeRecord = {
  workerId: number;
  query: string;
  timestamp: string; // ISO
  responseTimeMs: number;
  statusCode: number; // 0 when no response arrived
  success: boolean;
  resultsCount: number;
  apiStatus?: string;
  error?: string;
};

export type RunMetrics = {
  requested: number;
  completed: number;
  interrupted: boolean;
  totalTimeSeconds: number;
  requestsPerSecond: number;
};

export type AggregateReport = {
  timestamp: string;
  testConfig: {
    workers: number;
    totalRequests: number;
    concurrencyMode: ConcurrencyMode;
  };
  successMetrics: {
    successfulRequests: number;
    failedRequests: number;
    successRatePercent: number;
  };
  performanceMetrics: {
    avgResponseTimeMs: number;
    minResponseTimeMs: number;
    maxResponseTimeMs: number;
  };
  errorAnalysis: Record<string, number>;
  apiStatusDistribution: Record<string, number>;
  costAnalysis: {
    successfulRequests: number;
    estimatedCostUsd: number;
    costPerRequestUsd: number;
  };
  securityAssessment: {
    rateLimitingDetected: boolean;
    apiRestrictionsDetected: boolean;
    quotaExceeded: boolean;
    fullFunctionality: boolean;
  };
};

export type DetailedReport = {
  analysisSummary: AggregateReport;
  runMetrics: RunMetrics;
  detailedResults: readonly OutcomeRecord[];
};
