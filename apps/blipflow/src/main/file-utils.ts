import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";

const writeFileAtomic = async (filePath: string, data: string): Promise<void> => {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  await fs.writeFile(tempPath, data);
  await fs.rename(tempPath, filePath);
};

export const writeJsonAtomic = async (filePath: string, payload: unknown): Promise<void> =>
  writeFileAtomic(filePath, JSON.stringify(payload, null, 2));

export const writeTextAtomic = async (filePath: string, text: string): Promise<void> =>
  writeFileAtomic(filePath, text);

/** Stat failures other than a missing path go to `logger`, or the console without one. */
export const fileExists = async (
  target: string,
  logger?: Pick<Logger, "warn">
): Promise<boolean> => {
  try {
    const stats = await fs.stat(target);
    return stats.isFile();
  } catch (error) {
    const code = (error as NodeJS.ErrnoException | undefined)?.code;
    if (code && code !== "ENOENT" && code !== "ENOTDIR") {
      if (logger) {
        logger.warn("stat failed", { path: target, error: describeError(error) });
      } else {
        console.warn(`Failed to stat ${target}`, error);
      }
    }
    return false;
  }
};

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Items start in list order; results keep list order regardless of completion order.
 */
export const runWithConcurrency = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let next = 0;
  const workerCount = Math.max(1, Math.min(concurrency, items.length));

  const workers = Array.from({ length: workerCount }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  });

  await Promise.all(workers);
  return results;
};

export type KeyedLock = {
  run: <R>(key: string, fn: () => Promise<R>) => Promise<R>;
};

// Callers sharing a key run one at a time, in arrival order.
export const createKeyedLock = (): KeyedLock => {
  const tails = new Map<string, Promise<void>>();

  const run = async <R>(key: string, fn: () => Promise<R>): Promise<R> => {
    const previous = tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    tails.set(key, tail);
    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (tails.get(key) === tail) {
        tails.delete(key);
      }
    }
  };

  return { run };
};
