import fs from "fs";
import path from "path";
import { format, stripVTControlCharacters } from "util";

const originalConsole = {
  log: console.log.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};

type Level = "debug" | "info" | "warn" | "error";

let isVerbose = false;
let logFilePath: string | null = null;

export function setVerboseMode(verbose: boolean): void {
  isVerbose = verbose;
}

export function isVerboseMode(): boolean {
  return isVerbose;
}

/**
 * Mirror every log line into `filePath` (appended, colors stripped).
 * Debug lines are written to the file even when verbose mode is off.
 */
export function setLogFile(filePath: string | null): void {
  if (filePath) {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  }
  logFilePath = filePath;
}

function writeToFile(level: Level, args: unknown[]): void {
  if (!logFilePath) {
    return;
  }
  const line = stripVTControlCharacters(format(...args)).trim();
  if (!line) {
    return;
  }
  const stamp = new Date().toISOString();
  try {
    fs.appendFileSync(
      logFilePath,
      `${stamp} - ${level.toUpperCase()} - ${line}\n`,
      "utf-8",
    );
  } catch (error) {
    // first failure switches the file sink off
    originalConsole.warn(
      `Warning: could not write log file ${logFilePath}, file logging disabled:`,
      error instanceof Error ? error.message : error,
    );
    logFilePath = null;
  }
}

function logWith(
  method: "log" | "warn" | "error",
  level: Level,
  args: unknown[],
): void {
  writeToFile(level, args);
  if (level === "debug" && !isVerbose) {
    return;
  }
  originalConsole[method](...args);
}

export const logger = {
  debug(...args: unknown[]): void {
    logWith("log", "debug", args);
  },
  info(...args: unknown[]): void {
    logWith("log", "info", args);
  },
  warn(...args: unknown[]): void {
    logWith("warn", "warn", args);
  },
  error(...args: unknown[]): void {
    logWith("error", "error", args);
  },
};

export function installConsoleBridge(): void {
  console.log = (...args: unknown[]) => logger.info(...args);
  console.warn = (...args: unknown[]) => logger.warn(...args);
  console.error = (...args: unknown[]) => logger.error(...args);
}
