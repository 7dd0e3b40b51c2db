import fs from "node:fs/promises";
import path from "node:path";
import type { AuxSide, ResolvedInputs, Task } from "../shared/contracts.js";
import { describeError } from "./errors.js";
import { fileExists } from "./file-utils.js";
import type { Logger } from "./logger.js";
import { getDatasetDir, getDatasetPath, getEntityPrefix, isNiftiFile } from "./run-paths.js";

export type ResolveContext = {
  root: string;
  task: Task;
  /** Receives filesystem errors other than a missing path; the console without one. */
  logger?: Pick<Logger, "warn">;
};

/** One way of finding a file; `null` hands over to the next strategy. */
export type ResolverStrategy = {
  name: string;
  resolve: (context: ResolveContext) => Promise<string | null>;
};

export type KeywordSets = {
  apKeywords: readonly string[];
  paKeywords: readonly string[];
};

const DIRECTION_LABEL: Record<AuxSide, string> = { A: "ap", B: "pa" };

const firstExisting = async (
  candidates: string[],
  logger?: Pick<Logger, "warn">
): Promise<string | null> => {
  for (const candidate of candidates) {
    if (await fileExists(candidate, logger)) return candidate;
  }
  return null;
};

const withNiftiExtensions = (base: string): string[] => [`${base}.nii`, `${base}.nii.gz`];

export const canonicalPrimaryStrategy: ResolverStrategy = {
  name: "canonical-bold",
  resolve: async ({ root, task, logger }) => {
    const base = `${getEntityPrefix(task)}_task-${task.runLabel}_bold`;
    return firstExisting(
      withNiftiExtensions(base).map((name) => getDatasetPath(root, task, "func", name)),
      logger
    );
  },
};

export const canonicalAuxStrategy = (side: AuxSide): ResolverStrategy => ({
  name: `canonical-dir-${DIRECTION_LABEL[side]}`,
  resolve: async ({ root, task, logger }) => {
    const base = `${getEntityPrefix(task)}_dir-${DIRECTION_LABEL[side]}_task-${task.runLabel}_epi`;
    return firstExisting(
      withNiftiExtensions(base).map((name) => getDatasetPath(root, task, "fmap", name)),
      logger
    );
  },
});

/**
 * Picks, among NIfTI files whose name contains a keyword (case-insensitive), the
 * shortest name; equal lengths fall back to name order.
 */
export const pickKeywordMatch = (
  filenames: readonly string[],
  keywords: readonly string[]
): string | null => {
  const needles = keywords.map((keyword) => keyword.toLowerCase()).filter(Boolean);
  const hits = filenames.filter((name) => {
    const lower = name.toLowerCase();
    return isNiftiFile(name) && needles.some((needle) => lower.includes(needle));
  });
  if (hits.length === 0) return null;
  const sorted = hits
    .slice()
    .sort((a, b) => (a.length !== b.length ? a.length - b.length : a.localeCompare(b)));
  return sorted[0] ?? null;
};

export const keywordScanStrategy = (keywords: readonly string[]): ResolverStrategy => ({
  name: "keyword-scan",
  resolve: async ({ root, task, logger }) => {
    const fmapDir = getDatasetDir(root, task, "fmap");
    let filenames: string[];
    try {
      const entries = await fs.readdir(fmapDir, { withFileTypes: true });
      filenames = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    } catch (error) {
      const code = (error as NodeJS.ErrnoException | undefined)?.code;
      if (code !== "ENOENT" && code !== "ENOTDIR") {
        if (logger) {
          logger.warn("fmap listing failed", { path: fmapDir, error: describeError(error) });
        } else {
          console.warn(`Failed to list ${fmapDir}`, error);
        }
      }
      return null;
    }
    const match = pickKeywordMatch(filenames, keywords);
    return match ? path.join(fmapDir, match) : null;
  },
});

export const resolveFirst = async (
  strategies: readonly ResolverStrategy[],
  context: ResolveContext
): Promise<{ path: string; strategy: string } | null> => {
  for (const strategy of strategies) {
    const found = await strategy.resolve(context);
    if (found) return { path: found, strategy: strategy.name };
  }
  return null;
};

export const auxStrategies = (side: AuxSide, keywords: KeywordSets): ResolverStrategy[] => [
  canonicalAuxStrategy(side),
  keywordScanStrategy(side === "A" ? keywords.apKeywords : keywords.paKeywords),
];

/**
 * Locates the primary series and both blip images for a task. Returns `null` when
 * the primary series is absent; unresolved blips are `null` fields.
 */
export const resolveInputs = async (
  root: string,
  task: Task,
  keywords: KeywordSets,
  logger?: Pick<Logger, "warn">
): Promise<ResolvedInputs | null> => {
  const context: ResolveContext = { root, task, logger };
  const primary = await resolveFirst([canonicalPrimaryStrategy], context);
  if (!primary) return null;

  const [auxA, auxB] = await Promise.all([
    resolveFirst(auxStrategies("A", keywords), context),
    resolveFirst(auxStrategies("B", keywords), context),
  ]);

  return {
    primarySeriesPath: primary.path,
    auxImageAPath: auxA?.path ?? null,
    auxImageBPath: auxB?.path ?? null,
    auxSearchDir: getDatasetDir(root, task, "fmap"),
  };
};
