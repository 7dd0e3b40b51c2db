import fs from "node:fs/promises";
import path from "node:path";
import picomatch from "picomatch";
import type { Task } from "../shared/contracts.js";
import { DatasetScanError } from "./errors.js";

export type ScanDatasetOptions = {
  subjectPattern?: string;
  sessionPattern?: string;
};

const DEFAULT_SUBJECT_PATTERN = "sub-*";
const DEFAULT_SESSION_PATTERN = "ses-*";

const listMatchingDirs = async (dir: string, pattern: string): Promise<string[]> => {
  const isMatch = picomatch(pattern);
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && isMatch(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));
};

/**
 * Expands the dataset into (subject, session, run) tasks: subjects sorted, sessions
 * sorted, runs in the order given. Subjects without session folders get `sessionId: null`.
 */
export const scanDataset = async (
  root: string,
  runs: readonly string[],
  options?: ScanDatasetOptions
): Promise<Task[]> => {
  const subjectPattern = options?.subjectPattern ?? DEFAULT_SUBJECT_PATTERN;
  const sessionPattern = options?.sessionPattern ?? DEFAULT_SESSION_PATTERN;
  const resolvedRoot = path.resolve(root);

  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(resolvedRoot)).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    throw new DatasetScanError(`Dataset root not found: ${resolvedRoot}`);
  }

  const subjects = await listMatchingDirs(resolvedRoot, subjectPattern);
  if (subjects.length === 0) {
    throw new DatasetScanError(`No ${subjectPattern} directories under ${resolvedRoot}`);
  }

  const tasks: Task[] = [];
  for (const subjectId of subjects) {
    const sessions = await listMatchingDirs(path.join(resolvedRoot, subjectId), sessionPattern);
    const sessionIds: Array<string | null> = sessions.length > 0 ? sessions : [null];
    for (const sessionId of sessionIds) {
      for (const runLabel of runs) {
        tasks.push({ subjectId, sessionId, runLabel });
      }
    }
  }
  return tasks;
};
