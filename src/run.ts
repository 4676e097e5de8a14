import { analyzeOutcomes } from "./analyze";
import type { TesterConfig } from "./config";
import { createDispatcher, type Dispatcher, type DispatchResult } from "./dispatch";
import { createLogger } from "./logger";
import { printLines, printOutcome, printReport, renderRunMetrics } from "./report";
import { reportFilename, saveCsv, saveDetailedReport } from "./save";
import type { AggregateReport, OutcomeRecord } from "./types";

const log = createLogger("run");

export type RunDeps = {
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
  onOutcome?: (record: OutcomeRecord, completed: number) => void;
  now?: () => Date;
};

export type RunResult = {
  dispatch: DispatchResult;
  report: AggregateReport | null;
  reportPath?: string;
  csvPath?: string;
};

export async function runLoadTest(config: TesterConfig, deps: RunDeps = {}): Promise<RunResult> {
  const { dispatcher = createDispatcher(config), signal, onOutcome = printOutcome, now = () => new Date() } = deps;

  log.debug(`Dispatching ${config.workerCount} requests (${dispatcher.mode})`);
  const dispatch = await dispatcher.dispatch(config.workerCount, { onOutcome, signal });
  printLines(renderRunMetrics(dispatch.metrics));

  if (dispatch.metrics.interrupted) {
    log.warn(`Run interrupted: ${dispatch.metrics.completed} of ${dispatch.metrics.requested} requests completed`);
  }

  const finishedAt = now();
  const report = analyzeOutcomes(dispatch.outcomes, {
    workers: config.workerCount,
    concurrencyMode: dispatcher.mode,
    pricePerRequest: config.pricePerRequest,
    generatedAt: finishedAt,
  });
  if (!report) {
    log.warn("No results to analyze");
    return { dispatch, report };
  }
  printReport(report);

  if (!config.saveReport) return { dispatch, report };

  const reportPath = await saveDetailedReport(
    { analysisSummary: report, runMetrics: dispatch.metrics, detailedResults: dispatch.outcomes },
    config.outputDir,
    finishedAt
  );
  log.info(`Detailed report saved to: ${reportPath}`);

  if (!config.csv) return { dispatch, report, reportPath };

  const csvPath = await saveCsv(dispatch.outcomes, reportFilename(config.workerCount, finishedAt, "csv"), config.outputDir);
  log.info(`Raw outcomes saved to: ${csvPath}`);
  return { dispatch, report, reportPath, csvPath };
}
