import fs from "node:fs/promises";
import path from "node:path";
import type { LogLevel } from "../shared/contracts.js";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  message: string;
  taskId?: string;
} & LogMeta;

export type LoggerConfig = {
  level?: string;
  echo?: (entry: LogEntry) => void;
};

export type Logger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

export type RunLogger = Logger & {
  /** Entries go to the run log tagged with `taskId`, and to `taskLogPath` when given. */
  forTask: (taskId: string, taskLogPath?: string) => Logger;
  flush: () => Promise<void>;
};

export const normalizeLevel = (value: string | undefined): LogLevel => {
  const normalized = String(value ?? "info").toLowerCase();
  if (normalized === "debug") return "debug";
  if (normalized === "warn" || normalized === "warning") return "warn";
  if (normalized === "error") return "error";
  return "info";
};

const safeStringify = (payload: unknown): string => {
  try {
    return JSON.stringify(payload);
  } catch {
    return JSON.stringify({ message: "Failed to serialize log payload" });
  }
};

export const createRunLogger = (runLogPath: string, config?: LoggerConfig): RunLogger => {
  const level = normalizeLevel(config?.level);
  const knownDirs = new Set<string>();
  let queue: Promise<void> = Promise.resolve();

  const shouldLog = (entryLevel: LogLevel): boolean =>
    LEVEL_WEIGHT[entryLevel] >= LEVEL_WEIGHT[level];

  const appendLine = async (filePath: string, line: string): Promise<void> => {
    const dir = path.dirname(filePath);
    if (!knownDirs.has(dir)) {
      await fs.mkdir(dir, { recursive: true });
      knownDirs.add(dir);
    }
    await fs.appendFile(filePath, line);
  };

  // One queue for every file keeps run-log lines whole and in emit order.
  const enqueue = (targets: string[], entry: LogEntry): void => {
    const line = `${safeStringify(entry)}\n`;
    queue = queue
      .then(async () => {
        for (const target of targets) {
          await appendLine(target, line);
        }
      })
      .catch((error: unknown) => {
        console.warn(`Failed to write log entry to ${targets.join(", ")}`, error);
      });
  };

  const log = (
    entryLevel: LogLevel,
    message: string,
    meta: LogMeta | undefined,
    scope?: { taskId: string; taskLogPath?: string }
  ): void => {
    if (!shouldLog(entryLevel)) return;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      ...(scope ? { taskId: scope.taskId } : {}),
      message,
      ...(meta ?? {}),
    };
    const targets = scope?.taskLogPath ? [runLogPath, scope.taskLogPath] : [runLogPath];
    enqueue(targets, entry);
    config?.echo?.(entry);
  };

  const forTask = (taskId: string, taskLogPath?: string): Logger => {
    const scope = { taskId, taskLogPath };
    return {
      debug: (message, meta) => log("debug", message, meta, scope),
      info: (message, meta) => log("info", message, meta, scope),
      warn: (message, meta) => log("warn", message, meta, scope),
      error: (message, meta) => log("error", message, meta, scope),
    };
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    forTask,
    flush: async () => {
      await queue;
    },
  };
};
