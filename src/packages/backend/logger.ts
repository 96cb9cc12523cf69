/*
Leveled loggers on top of the debug package.

Every logger writes to the namespace nbperf:<level>:<name>, so that e.g.

  DEBUG='nbperf:*' nbperf run ./usecases/example ...

shows everything, while setLogLevel("warn") only enables the error and warn
namespaces. Output goes to stderr, and optionally also to a log file.
*/

import { appendFileSync } from "node:fs";
import { format } from "node:util";
import debug from "debug";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  [level in LogLevel]: (...args: unknown[]) => void;
};

const ROOT_NAMESPACE = "nbperf";
const DEFAULT_LEVEL: LogLevel = "info";

let logFile: string | undefined;

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = `${value ?? ""}`.trim().toLowerCase();
  if (!level) return DEFAULT_LEVEL;
  // common aliases
  if (level === "warning") return "warn";
  if (level === "critical") return "error";
  if (!isLogLevel(level)) {
    throw new Error(
      `invalid log level '${value}' (expected one of ${LOG_LEVELS.join(", ")})`,
    );
  }
  return level;
}

// Namespaces to enable so that `level` and everything more severe is shown.
export function namespacesForLevel(level: LogLevel): string {
  const upTo = LOG_LEVELS.indexOf(level);
  return LOG_LEVELS.slice(0, upTo + 1)
    .map((l) => `${ROOT_NAMESPACE}:${l}:*`)
    .join(",");
}

export function setLogLevel(level: LogLevel): void {
  debug.enable(namespacesForLevel(level));
}

export function setLogFile(path: string | undefined): void {
  logFile = path?.trim() || undefined;
}

function writeLine(this: void, ...args: unknown[]): void {
  const line = format(...args);
  process.stderr.write(`${line}\n`);
  if (logFile != null) {
    appendFileSync(logFile, `${new Date().toISOString()} ${line}\n`);
  }
}

export function getLogger(name: string): Logger {
  const make = (level: LogLevel) => {
    const d = debug(`${ROOT_NAMESPACE}:${level}:${name}`);
    d.log = writeLine;
    return (...args: unknown[]) => {
      if (args.length === 0) return;
      const [first, ...rest] = args;
      d(first, ...rest);
    };
  };
  return {
    error: make("error"),
    warn: make("warn"),
    info: make("info"),
    debug: make("debug"),
  };
}

if (process.env.DEBUG == null) {
  setLogLevel(DEFAULT_LEVEL);
}

export default getLogger;
