import chalk from "chalk";
import type { TesterConfig } from "./config";
import type { AggregateReport, OutcomeRecord, RunMetrics } from "./types";

export const RULE = "=".repeat(70);

const yesNo = (flag: boolean) => (flag ? "YES" : "NO");

/** One progress line per finished request, e.g. `✅ Worker  3:    212ms | bank santiago   | OK`. */
export function formatOutcomeLine(record: OutcomeRecord): string {
  const icon = record.success ? "✅" : "❌";
  const worker = String(record.workerId).padStart(2);
  const latency = record.responseTimeMs.toFixed(0).padStart(6);
  const query = record.query.slice(0, 15).padEnd(15);
  return `${icon} Worker ${worker}: ${latency}ms | ${query} | ${record.apiStatus ?? "ERROR"}`;
}

export function printOutcome(record: OutcomeRecord): void {
  const line = formatOutcomeLine(record);
  console.log(record.success ? line : chalk.red(line));
}

export function renderBanner(config: TesterConfig, startedAt: Date): string[] {
  const mode = config.concurrencyMode === "cooperative" ? "cooperative (shared client)" : `bounded parallel (pool of ${config.poolSize})`;
  return [
    RULE,
    "PLACES API PARALLEL LOAD TESTER",
    RULE,
    `Date:    ${startedAt.toISOString()}`,
    `Workers: ${config.workerCount}`,
    `Mode:    ${mode}`,
    `Target:  ${config.baseUrl}`,
    "",
  ];
}

export function renderRunMetrics(metrics: RunMetrics): string[] {
  return [
    "",
    RULE,
    `Total time: ${metrics.totalTimeSeconds.toFixed(2)} seconds`,
    `Requests per second: ${metrics.requestsPerSecond.toFixed(2)}`,
  ];
}

export function renderReport(report: AggregateReport): string[] {
  const { successMetrics, performanceMetrics: perf, costAnalysis: cost, securityAssessment: sec } = report;
  const lines = [
    "",
    "ANALYSIS OF RESULTS",
    RULE,
    `Successful requests: ${successMetrics.successfulRequests}/${report.testConfig.totalRequests}`,
    `Success rate: ${successMetrics.successRatePercent}%`,
    `Average response time: ${perf.avgResponseTimeMs.toFixed(2)}ms`,
    `Minimum response time: ${perf.minResponseTimeMs}ms`,
    `Maximum response time: ${perf.maxResponseTimeMs}ms`,
  ];

  const errors = Object.entries(report.errorAnalysis);
  if (errors.length > 0) {
    lines.push("", "Errors detected:");
    for (const [error, count] of errors) lines.push(`   ${error}: ${count} times`);
  }

  lines.push("", "Status distribution:");
  for (const [status, count] of Object.entries(report.apiStatusDistribution)) {
    lines.push(`   ${status}: ${count}`);
  }

  lines.push(
    "",
    "Economic impact:",
    `   Successful requests: ${cost.successfulRequests}`,
    `   Estimated cost: $${cost.estimatedCostUsd} USD`,
    "",
    "Security assessment:",
    `   Rate limiting detected: ${yesNo(sec.rateLimitingDetected)}`,
    `   API restrictions detected: ${yesNo(sec.apiRestrictionsDetected)}`,
    `   Quota exceeded: ${yesNo(sec.quotaExceeded)}`,
    `   Full functionality: ${yesNo(sec.fullFunctionality)}`
  );

  if (sec.fullFunctionality && !sec.rateLimitingDetected) {
    lines.push(
      "",
      "CRITICAL ALERT:",
      "   API fully functional with no rate limiting",
      "   High risk of abuse and runaway cost",
      "   Requires immediate action"
    );
  }
  return lines;
}

export function printLines(lines: string[], paint: (s: string) => string = (s) => s): void {
  for (const line of lines) console.log(paint(line));
}

export function printReport(report: AggregateReport): void {
  const lines = renderReport(report);
  const alertAt = lines.indexOf("CRITICAL ALERT:");
  if (alertAt < 0) {
    printLines(lines);
    return;
  }
  printLines(lines.slice(0, alertAt));
  printLines(lines.slice(alertAt), chalk.redBright);
}
