import type { ConfigSource } from "./config";

export const USAGE = `Usage: places-load-tester [options]

  -w, --workers <n>      number of requests to dispatch (default 50)
  -a, --async-mode       cooperative mode: every request in flight at once
      --mode <mode>      bounded_parallel | cooperative
      --pool-size <n>    concurrent slots in bounded_parallel mode (default 50)
      --timeout <s>      per-request timeout in seconds (default 30)
      --price <usd>      price per successful request (default 0.017)
      --output-dir <dir> where reports are written (default data/out)
      --no-save          do not write the JSON report
      --csv              also write the raw outcomes as CSV
  -h, --help             show this message`;

function readValue(argv: string[], names: string[]): string | undefined {
  const idx = argv.findIndex((a) => names.includes(a));
  if (idx < 0) return undefined;
  const value = argv[idx + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new Error(`Missing value for ${argv[idx]}`);
  }
  return value;
}

function hasFlag(argv: string[], names: string[]): boolean {
  return argv.some((a) => names.includes(a));
}

export function wantsHelp(argv: string[]): boolean {
  return hasFlag(argv, ["-h", "--help"]);
}

export function parseArgs(argv: string[]): ConfigSource {
  const mode = readValue(argv, ["--mode"]);
  const asyncMode = hasFlag(argv, ["-a", "--async-mode"]);

  return {
    workerCount: readValue(argv, ["-w", "--workers"]),
    concurrencyMode: mode ?? (asyncMode ? "cooperative" : undefined),
    poolSize: readValue(argv, ["--pool-size"]),
    timeoutSeconds: readValue(argv, ["--timeout"]),
    pricePerRequest: readValue(argv, ["--price"]),
    outputDir: readValue(argv, ["--output-dir"]),
    saveReport: hasFlag(argv, ["--no-save"]) ? false : undefined,
    csv: hasFlag(argv, ["--csv"]) ? true : undefined,
  };
}
