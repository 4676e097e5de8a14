import "dotenv/config";
import chalk from "chalk";
import { parseArgs, USAGE, wantsHelp } from "./cli";
import { configFromEnv, resolveConfig } from "./config";
import { createLogger, logError } from "./logger";
import { printLines, renderBanner } from "./report";
import { runLoadTest } from "./run";

const log = createLogger("main");

async function main() {
  const argv = process.argv.slice(2);
  if (wantsHelp(argv)) {
    console.log(USAGE);
    return;
  }

  const config = resolveConfig(configFromEnv(), parseArgs(argv));
  printLines(renderBanner(config, new Date()), chalk.cyan);

  // A second Ctrl+C falls through to the default handler and kills the process.
  const controller = new AbortController();
  const onSigint = () => {
    log.warn("Interrupted by operator, stopping dispatch...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    await runLoadTest(config, { signal: controller.signal });
  } finally {
    process.off("SIGINT", onSigint);
  }
}

main().catch((e) => {
  logError("Unexpected error", e);
  process.exit(1);
});
