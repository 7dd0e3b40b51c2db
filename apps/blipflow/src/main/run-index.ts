import fs from "node:fs/promises";
import { z } from "zod";
import { writeJsonAtomic } from "./file-utils.js";
import { getRunIndexPath } from "./run-paths.js";

export type RunIndexStatus = "running" | "completed" | "error";

const tallySchema = z.object({
  ok: z.number(),
  skip: z.number(),
  fail: z.number(),
  total: z.number(),
});

const runIndexEntrySchema = z.object({
  runId: z.string(),
  status: z.enum(["running", "completed", "error"]).optional(),
  root: z.string().optional(),
  dryRun: z.boolean().optional(),
  startedAt: z.string().optional(),
  updatedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  ledgerPath: z.string().optional(),
  logPath: z.string().optional(),
  workers: z.number().optional(),
  taskCount: z.number().optional(),
  tally: tallySchema.optional(),
  error: z.string().optional(),
});

const runIndexSchema = z.object({ runs: z.array(runIndexEntrySchema) });

export type RunIndexEntry = z.infer<typeof runIndexEntrySchema>;

const definedFields = <T extends object>(value: T): Partial<T> => {
  const output: Partial<T> = {};
  (Object.keys(value) as Array<keyof T>).forEach((key) => {
    if (value[key] !== undefined) {
      output[key] = value[key];
    }
  });
  return output;
};

const mergeEntry = (base: RunIndexEntry, update: RunIndexEntry): RunIndexEntry => ({
  ...base,
  ...definedFields(update),
  runId: base.runId,
});

// Serialize concurrent write operations per-file to avoid read-modify-write races.
const pendingWrites = new Map<string, Promise<void>>();

const serialize = async (key: string, fn: () => Promise<void>): Promise<void> => {
  const previous = pendingWrites.get(key) ?? Promise.resolve();
  const next = previous.then(fn, fn);
  pendingWrites.set(key, next);
  try {
    await next;
  } finally {
    if (pendingWrites.get(key) === next) {
      pendingWrites.delete(key);
    }
  }
};

/** Newest batch first. A missing or unreadable index reads as empty. */
export const readRunIndex = async (logRoot: string): Promise<RunIndexEntry[]> => {
  const indexPath = getRunIndexPath(logRoot);
  let raw: string;
  try {
    raw = await fs.readFile(indexPath, "utf-8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException | undefined)?.code;
    if (code !== "ENOENT") {
      console.warn(`Failed to read run index at ${indexPath}`, error);
    }
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    console.warn(`Run index at ${indexPath} is not valid JSON`, error);
    return [];
  }
  const result = runIndexSchema.safeParse(parsed);
  if (!result.success) {
    console.warn(`Run index at ${indexPath} has an unexpected shape`);
    return [];
  }
  return result.data.runs;
};

export const updateRunIndex = async (logRoot: string, entry: RunIndexEntry): Promise<void> => {
  const indexPath = getRunIndexPath(logRoot);
  await serialize(indexPath, async () => {
    const runs = await readRunIndex(logRoot);
    const existingIndex = runs.findIndex((run) => run.runId === entry.runId);
    const stamped = { ...entry, updatedAt: entry.updatedAt ?? new Date().toISOString() };
    if (existingIndex >= 0) {
      runs[existingIndex] = mergeEntry(runs[existingIndex], stamped);
    } else {
      runs.unshift(stamped);
    }
    await writeJsonAtomic(indexPath, { runs });
  });
};
