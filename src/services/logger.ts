/**
 * Tagged console logging.
 *
 * Lines go to the console as `[Tag] message`. When a file sink is installed
 * (the CLI points one at the day's archive folder) every line is also
 * appended there with a timestamp and level.
 */

import * as fs from "node:fs";
import { format } from "date-fns";
import { describeError } from "../types/errors.js";

export type LogLevel = "INFO" | "WARNING" | "ERROR";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export interface LogSink {
  write(level: LogLevel, line: string): void;
}

let activeSink: LogSink | null = null;

/**
 * Install (or clear, with null) the sink every logger tees into.
 */
export function setLogSink(sink: LogSink | null): void {
  activeSink = sink;
}

export function formatLogLine(level: LogLevel, line: string, at: Date = new Date()): string {
  return `${format(at, "yyyy-MM-dd HH:mm:ss")} - ${level} - ${line}`;
}

/**
 * Sink that appends formatted lines to a file.
 */
export function createFileSink(filePath: string): LogSink {
  return {
    write(level, line) {
      fs.appendFileSync(filePath, `${formatLogLine(level, line)}\n`, "utf-8");
    },
  };
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    info(message) {
      console.log(`${prefix} ${message}`);
      activeSink?.write("INFO", `${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
      activeSink?.write("WARNING", `${prefix} ${message}`);
    },
    error(message, err) {
      if (err === undefined) {
        console.error(`${prefix} ${message}`);
        activeSink?.write("ERROR", `${prefix} ${message}`);
        return;
      }
      console.error(`${prefix} ${message}`, err);
      activeSink?.write("ERROR", `${prefix} ${message}: ${describeError(err)}`);
    },
  };
}

/**
 * Logger that drops everything. Used by tests that assert on results only.
 */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};

/**
 * Logger that records lines in memory, for tests that assert on logging.
 */
export function createMemoryLogger(): Logger & { lines: Array<{ level: LogLevel; message: string }> } {
  const lines: Array<{ level: LogLevel; message: string }> = [];
  return {
    lines,
    info(message) {
      lines.push({ level: "INFO", message });
    },
    warn(message) {
      lines.push({ level: "WARNING", message });
    },
    error(message, err) {
      lines.push({
        level: "ERROR",
        message: err === undefined ? message : `${message}: ${describeError(err)}`,
      });
    },
  };
}
