// src/logger.ts — stderr logger
// Same line format the CLI has always used: "[INFO] ...", "[warn] module: ...", "[error] ...".

import type { Warning } from "./types.js";

export type LogLevel = "quiet" | "normal" | "verbose";

export interface Logger {
  /** Timing and progress detail; shown only in verbose mode. */
  debug(msg: string): void;
  info(msg: string): void;
  warn(module: string, msg: string): void;
  error(msg: string): void;
}

type Write = (line: string) => void;

const stderrWrite: Write = (line) => {
  process.stderr.write(line + "\n");
};

export function createLogger(level: LogLevel, write: Write = stderrWrite): Logger {
  return {
    debug(msg) {
      if (level === "verbose") write(`[INFO] ${msg}`);
    },
    info(msg) {
      if (level !== "quiet") write(msg);
    },
    warn(module, msg) {
      if (level !== "quiet") write(`[warn] ${module}: ${msg}`);
    },
    error(msg) {
      write(`[error] ${msg}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function logWarnings(logger: Logger, warnings: Warning[]): void {
  for (const w of warnings) {
    const where = w.file ? ` (${w.file})` : "";
    if (w.level === "error") logger.error(`${w.module}: ${w.message}${where}`);
    else if (w.level === "warn") logger.warn(w.module, `${w.message}${where}`);
    else logger.debug(`${w.module}: ${w.message}${where}`);
  }
}
