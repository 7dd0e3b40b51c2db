import path from "node:path";
import type { Task } from "../shared/contracts.js";

type DatasetCategory = "func" | "fmap";

const NIFTI_EXTENSIONS = [".nii.gz", ".nii"];

export const CORRECTED_SUFFIX = "_blipUp_blipDown";
export const SUMMARY_SUFFIX = "_blipAnB.txt";

const getTaskKeyParts = (task: Task): string[] => [
  task.subjectId,
  task.sessionId ?? "nos",
  task.runLabel,
];

/** `sub/ses|nos/run`; labels are directory names or validated run labels, so never hold `/`. */
export const getTaskId = (task: Task): string => getTaskKeyParts(task).join("/");

export const getTaskLabel = (task: Task): string =>
  `${task.subjectId} ${task.sessionId ?? "(nos)"} ${task.runLabel}`;

/** Filename prefix shared by every file of a subject/session, e.g. `sub-01_ses-02`. */
export const getEntityPrefix = (task: Task): string =>
  task.sessionId ? `${task.subjectId}_${task.sessionId}` : task.subjectId;

export const getDatasetDir = (root: string, task: Task, category: DatasetCategory): string =>
  task.sessionId
    ? path.join(root, task.subjectId, task.sessionId, category)
    : path.join(root, task.subjectId, category);

export const getDatasetPath = (
  root: string,
  task: Task,
  category: DatasetCategory,
  filename: string
): string => path.join(getDatasetDir(root, task, category), filename);

export const isNiftiFile = (filename: string): boolean =>
  NIFTI_EXTENSIONS.some((ext) => filename.toLowerCase().endsWith(ext));

export const getSeriesStem = (imagePath: string): string => {
  const base = path.basename(imagePath);
  const ext = NIFTI_EXTENSIONS.find((candidate) => base.endsWith(candidate));
  return ext ? base.slice(0, -ext.length) : base;
};

export const getSidecarPath = (imagePath: string): string =>
  path.join(path.dirname(imagePath), `${getSeriesStem(imagePath)}.json`);

export const getCorrectedBaseName = (stem: string): string => `${stem}${CORRECTED_SUFFIX}`;

export const getCorrectedFileName = (stem: string): string =>
  `${getCorrectedBaseName(stem)}.nii.gz`;

export const getSummaryFileName = (stem: string): string => `${stem}${SUMMARY_SUFFIX}`;

export const getMissingReportFileName = (stem: string): string => `blipMissing_${stem}.txt`;

export const getWorkRoot = (root: string, workDir?: string): string =>
  workDir ?? path.join(root, "blipflow_work");

export const getWorkspaceDir = (workRoot: string, task: Task): string =>
  path.join(workRoot, ...getTaskKeyParts(task));

export const getTaskLogPath = (workspaceDir: string): string =>
  path.join(workspaceDir, "task.log");

export const getLogRoot = (root: string, logDir?: string): string => logDir ?? root;

export const getLedgerPath = (logRoot: string, stamp: string): string =>
  path.join(logRoot, `blipflow_status_${stamp}.tsv`);

export const getBatchLogPath = (logRoot: string, stamp: string): string =>
  path.join(logRoot, `blipflow_batch_${stamp}.log`);

export const getRunIndexPath = (logRoot: string): string => path.join(logRoot, "run-index.json");

export const formatBatchTimestamp = (date: Date = new Date()): string => {
  const pad = (value: number) => value.toString().padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
};
