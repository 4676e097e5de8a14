import chalk from "chalk";
import { formatError } from "./utils";

type LogLevel = "info" | "warn" | "error" | "debug";

const paint: Record<LogLevel, (s: string) => string> = {
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
  debug: chalk.gray,
};

function log(level: LogLevel, namespace: string, message: string, ...args: unknown[]): void {
  console[level](paint[level](`[${namespace}] ${message}`), ...args);
}

export function createLogger(namespace: string) {
  return {
    info: (message: string, ...args: unknown[]) => log("info", namespace, message, ...args),
    warn: (message: string, ...args: unknown[]) => log("warn", namespace, message, ...args),
    error: (message: string, ...args: unknown[]) => log("error", namespace, message, ...args),
    debug: (message: string, ...args: unknown[]) => {
      if (process.env.DEBUG_MODE === "1") log("debug", namespace, message, ...args);
    },
  };
}

export const logError = (message: string, error?: unknown): void => {
  const suffix = error === undefined ? "" : `: ${formatError(error)}`;
  console.error(`${chalk.gray(`[v${process.env.npm_package_version ?? "dev"}]`)} ${chalk.red(`${message}${suffix}`)}`);
};
