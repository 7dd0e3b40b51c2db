import type {
  BatchConfig,
  ExecutionResult,
  OutcomeTally,
  PlannedTask,
  Task,
} from "../shared/contracts.js";
import { scanDataset } from "./dataset-scanner.js";
import { describeError } from "./errors.js";
import { createKeyedLock, runWithConcurrency } from "./file-utils.js";
import type { Toolkit } from "./image-toolkit.js";
import { resolveInputs } from "./input-resolver.js";
import { createRunLogger, type LogEntry } from "./logger.js";
import { updateRunIndex } from "./run-index.js";
import {
  formatBatchTimestamp,
  getBatchLogPath,
  getLedgerPath,
  getLogRoot,
  getTaskLabel,
} from "./run-paths.js";
import { openStatusLedger, tallyRecords, type StatusLedger } from "./status-ledger.js";
import { executeTask } from "./task-pipeline.js";

export type BatchHooks = {
  onTaskStart?: (task: Task, index: number, total: number) => void;
  onTaskComplete?: (result: ExecutionResult, completed: number, total: number) => void;
};

export type BatchRunOptions = BatchHooks & {
  config: BatchConfig;
  toolkit: Toolkit;
  echo?: (entry: LogEntry) => void;
  now?: () => Date;
  clock?: () => number;
};

export type BatchSummary = {
  runId: string;
  taskCount: number;
  tally: OutcomeTally;
  results: ExecutionResult[];
  ledgerPath: string;
  logPath: string;
  durationMs: number;
};

const scanTasks = (config: BatchConfig): Promise<Task[]> =>
  scanDataset(config.root, config.runs, {
    subjectPattern: config.subjectPattern,
    sessionPattern: config.sessionPattern,
  });

const isAlreadyTaken = (error: unknown): boolean =>
  (error as NodeJS.ErrnoException | undefined)?.code === "EEXIST";

/**
 * Creates the ledger for a new run. The run id is the start stamp, suffixed `_2`, `_3`, ...
 * when a batch started in the same second already owns that ledger in `logRoot`.
 */
const claimRun = async (
  logRoot: string,
  stamp: string,
  now: () => Date
): Promise<{ runId: string; ledger: StatusLedger }> => {
  for (let attempt = 1; ; attempt += 1) {
    const runId = attempt === 1 ? stamp : `${stamp}_${attempt}`;
    try {
      return { runId, ledger: await openStatusLedger(getLedgerPath(logRoot, runId), { now }) };
    } catch (error) {
      if (!isAlreadyTaken(error)) throw error;
    }
  }
};

/** Dry run: every task with its resolved inputs. Touches nothing on disk. */
export const planBatch = async (config: BatchConfig): Promise<PlannedTask[]> => {
  const tasks = await scanTasks(config);
  return runWithConcurrency(tasks, config.workers, async (task) => ({
    task,
    inputs: await resolveInputs(config.root, task, config),
  }));
};

/**
 * Runs every task of the dataset with at most `config.workers` in flight and
 * records each terminal outcome in the batch ledger. Task failures never reject;
 * scan and setup errors do, before any task starts.
 */
export const runBatch = async (options: BatchRunOptions): Promise<BatchSummary> => {
  const { config, toolkit } = options;
  const now = options.now ?? (() => new Date());
  const clock = options.clock ?? Date.now;
  const startedAt = clock();

  const tasks = await scanTasks(config);

  const logRoot = getLogRoot(config.root, config.logDir);
  const { runId, ledger } = await claimRun(logRoot, formatBatchTimestamp(now()), now);
  const logPath = getBatchLogPath(logRoot, runId);
  const logger = createRunLogger(logPath, { level: config.logLevel, echo: options.echo });

  logger.info("batch started", {
    runId,
    root: config.root,
    runs: config.runs,
    workers: config.workers,
    engineThreads: config.engineThreads,
    phaseEncodeOverride: config.phaseEncodeOverride ?? null,
    tasks: tasks.length,
  });
  await updateRunIndex(logRoot, {
    runId,
    status: "running",
    root: config.root,
    dryRun: false,
    startedAt: now().toISOString(),
    ledgerPath: ledger.path,
    logPath,
    workers: config.workers,
    taskCount: tasks.length,
  });

  const workspaceLock = createKeyedLock();
  let completed = 0;

  try {
    const results = await runWithConcurrency(tasks, config.workers, async (task, index) => {
      options.onTaskStart?.(task, index, tasks.length);
      logger.debug("task started", { task: getTaskLabel(task), index });
      const result = await executeTask(task, {
        config,
        toolkit,
        logger,
        workspaceLock,
        now,
        clock,
      });
      try {
        await ledger.append(result);
      } catch (error) {
        logger.error("ledger append failed", {
          task: getTaskLabel(task),
          error: describeError(error),
        });
      }
      completed += 1;
      options.onTaskComplete?.(result, completed, tasks.length);
      return result;
    });

    await ledger.flush();
    const tally = tallyRecords(results);
    const durationMs = clock() - startedAt;
    logger.info("batch finished", { ...tally, durationMs, ledgerPath: ledger.path });
    await updateRunIndex(logRoot, {
      runId,
      status: "completed",
      finishedAt: now().toISOString(),
      tally,
    });
    return {
      runId,
      taskCount: tasks.length,
      tally,
      results,
      ledgerPath: ledger.path,
      logPath,
      durationMs,
    };
  } catch (error) {
    logger.error("batch aborted", { error: describeError(error) });
    await updateRunIndex(logRoot, {
      runId,
      status: "error",
      finishedAt: now().toISOString(),
      error: describeError(error),
    });
    throw error;
  } finally {
    await logger.flush();
  }
};
