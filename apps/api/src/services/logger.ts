/**
 * File-Based Logger
 *
 * Mirrors console output into data/logs/ so that long generation runs keep
 * their full history even when the terminal scrolls away.
 *
 * Usage: call `initLogger()` once at process entry (the demo does).
 * Logs are written to: data/logs/synth-YYYY-MM-DD.log
 *
 * This component does NOT:
 * - Filter or reformat pipeline output
 * - Throw when the log file cannot be written
 */

import { mkdirSync, appendFileSync, existsSync } from "node:fs";
import { join } from "node:path";

let logFilePath: string | null = null;
let restoreConsole: (() => void) | null = null;

export interface LoggerOptions {
  /** Directory for log files (default: <cwd>/data/logs) */
  dir?: string;
}

/**
 * Hook console.log / console.warn / console.error and append each line to
 * the day's log file. Calling it again rotates to the current directory.
 */
export function initLogger(options: LoggerOptions = {}): string {
  const dir = options.dir ?? join(process.cwd(), "data", "logs");
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const date = new Date().toISOString().split("T")[0];
  logFilePath = join(dir, `synth-${date}.log`);

  restoreConsole?.();
  const original = { log: console.log, warn: console.warn, error: console.error };

  console.log = (...args: unknown[]) => {
    original.log.apply(console, args);
    writeToFile("INFO", args);
  };
  console.warn = (...args: unknown[]) => {
    original.warn.apply(console, args);
    writeToFile("WARN", args);
  };
  console.error = (...args: unknown[]) => {
    original.error.apply(console, args);
    writeToFile("ERROR", args);
  };

  restoreConsole = () => {
    console.log = original.log;
    console.warn = original.warn;
    console.error = original.error;
  };

  const banner = `\n${"=".repeat(70)}\n  Synthesis session started: ${new Date().toISOString()}\n${"=".repeat(70)}\n`;
  append(banner);

  return logFilePath;
}

/**
 * Put the original console methods back and stop writing to the file.
 */
export function closeLogger(): void {
  restoreConsole?.();
  restoreConsole = null;
  logFilePath = null;
}

export function formatLogLine(level: string, args: unknown[], now = new Date()): string {
  const timestamp = now.toISOString().substring(11, 23); // HH:mm:ss.SSS
  const message = args
    .map((arg) => {
      if (typeof arg === "string") return arg;
      if (arg instanceof Error) return `${arg.message}\n${arg.stack ?? ""}`;
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    })
    .join(" ");
  return `[${timestamp}] [${level.padEnd(5)}] ${message}\n`;
}

function writeToFile(level: string, args: unknown[]): void {
  append(formatLogLine(level, args));
}

function append(text: string): void {
  if (!logFilePath) return;
  try {
    appendFileSync(logFilePath, text);
  } catch (error) {
    // Report once through the unhooked console and stop mirroring
    const path = logFilePath;
    closeLogger();
    console.error(`[Logger] Disabled file logging for ${path}: ${String(error)}`);
  }
}

export function getLogFilePath(): string | null {
  return logFilePath;
}
