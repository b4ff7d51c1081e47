import { clipForLog, sanitizeMeta } from "./utils/logSafe.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

function formatMeta(meta: Record<string, unknown> | undefined): string {
  if (!meta || Object.keys(meta).length === 0) return "";
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return " [meta_unserializable]";
  }
}

export function createStderrLogger(opts: {
  debugEnabled: boolean;
  write?: (line: string) => void;
}): Logger {
  // stdout carries JSON-RPC when serving over stdio.
  const sink = opts.write ?? ((line: string) => void process.stderr.write(line));
  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (level === "debug" && !opts.debugEnabled) return;
    sink(`[${level}] ${clipForLog(message)}${formatMeta(sanitizeMeta(meta))}\n`);
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
