import { describe, it, expect } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { createRunLogger, normalizeLevel, type LogEntry } from "./logger.js";

const readEntries = async (filePath: string): Promise<LogEntry[]> => {
  const raw = await fs.readFile(filePath, "utf-8");
  return raw
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as LogEntry);
};

describe("run logger", () => {
  it("writes run and task logs", async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "blipflow-log-"));
    const runLogPath = path.join(tempDir, "batch.log");
    const taskLogPath = path.join(tempDir, "work", "sub-01", "nos", "rest", "task.log");

    const logger = createRunLogger(runLogPath, { level: "info" });
    logger.info("batch-start", { tasks: 2 });
    logger.forTask("sub-01/nos/rest", taskLogPath).warn("readout defaulted", { readoutTime: 0.05 });
    await logger.flush();

    const runEntries = await readEntries(runLogPath);
    const taskEntries = await readEntries(taskLogPath);

    expect(runEntries.map((entry) => entry.message)).toEqual(["batch-start", "readout defaulted"]);
    expect(runEntries[1]).toMatchObject({
      level: "warn",
      taskId: "sub-01/nos/rest",
      readoutTime: 0.05,
    });
    expect(taskEntries).toHaveLength(1);
    expect(taskEntries[0].message).toBe("readout defaulted");
  });

  it("keeps lines whole under many concurrent writers", async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "blipflow-log-"));
    const runLogPath = path.join(tempDir, "batch.log");
    const logger = createRunLogger(runLogPath);

    await Promise.all(
      Array.from({ length: 50 }, async (_, index) => {
        logger.forTask(`task-${index}`).info("step", { payload: "x".repeat(500) });
      })
    );
    await logger.flush();

    const entries = await readEntries(runLogPath);
    expect(entries).toHaveLength(50);
    expect(entries.map((entry) => entry.taskId)).toEqual(
      Array.from({ length: 50 }, (_, index) => `task-${index}`)
    );
  });

  it("respects log levels", async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "blipflow-log-"));
    const runLogPath = path.join(tempDir, "batch.log");

    const logger = createRunLogger(runLogPath, { level: "error" });
    logger.info("ignored");
    logger.forTask("task-1").warn("ignored-task");
    await logger.flush();

    await expect(fs.stat(runLogPath)).rejects.toBeDefined();
  });

  it("mirrors entries to the echo sink", async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "blipflow-log-"));
    const echoed: LogEntry[] = [];
    const logger = createRunLogger(path.join(tempDir, "batch.log"), {
      level: "debug",
      echo: (entry) => echoed.push(entry),
    });

    logger.debug("level check", { step: 1 });
    await logger.flush();

    expect(echoed).toHaveLength(1);
    expect(echoed[0]).toMatchObject({ level: "debug", message: "level check", step: 1 });
  });

  it("normalizes level names", () => {
    expect(normalizeLevel("WARNING")).toBe("warn");
    expect(normalizeLevel("debug")).toBe("debug");
    expect(normalizeLevel("error")).toBe("error");
    expect(normalizeLevel(undefined)).toBe("info");
    expect(normalizeLevel("verbose")).toBe("info");
  });
});
