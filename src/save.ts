import { writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import Papa from "papaparse";
import type { DetailedReport, OutcomeRecord } from "./types";
import { fileStamp } from "./utils";

const CSV_FIELDS: (keyof OutcomeRecord)[] = [
  "workerId",
  "query",
  "timestamp",
  "responseTimeMs",
  "statusCode",
  "success",
  "resultsCount",
  "apiStatus",
  "error",
];

export function reportFilename(workers: number, date: Date, ext: "json" | "csv"): string {
  return `places_load_report_${workers}workers_${fileStamp(date)}.${ext}`;
}

export async function saveJson<T>(data: T, filename: string, dir = "data/out") {
  await mkdir(dir, { recursive: true });
  const path = join(dir, filename);
  await writeFile(path, JSON.stringify(data, null, 2), "utf-8");
  return path;
}

export async function saveCsv(rows: readonly OutcomeRecord[], filename: string, dir = "data/out") {
  await mkdir(dir, { recursive: true });
  const path = join(dir, filename);
  const csv = Papa.unparse(
    {
      fields: CSV_FIELDS,
      data: rows.map((r) => CSV_FIELDS.map((f) => r[f] ?? "")),
    },
    { newline: "\n" }
  );
  await writeFile(path, csv, "utf-8");
  return path;
}

export async function saveDetailedReport(report: DetailedReport, dir: string, date: Date) {
  const filename = reportFilename(report.analysisSummary.testConfig.workers, date, "json");
  return saveJson(report, filename, dir);
}
