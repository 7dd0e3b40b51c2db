import fs from "node:fs/promises";
import path from "node:path";
import type {
  AfterDivergence,
  AuxSide,
  BatchConfig,
  EngineAttempt,
  ExecutionResult,
  ResolvedInputs,
  Task,
  TaskOutcome,
} from "../shared/contracts.js";
import { buildEnginePlans, runEnginePlans } from "./engine-plans.js";
import { TaskFailure, describeError } from "./errors.js";
import { fileExists, writeTextAtomic, type KeyedLock } from "./file-utils.js";
import type { ImageToolkit, CorrectionEngine } from "./image-toolkit.js";
import { resolveInputs } from "./input-resolver.js";
import type { Logger, RunLogger } from "./logger.js";
import { extractAcquisitionParams } from "./metadata-extractor.js";
import { computeDivergence, computeFieldStats, computeShiftMaps } from "./qa-metrics.js";
import {
  getCorrectedBaseName,
  getCorrectedFileName,
  getMissingReportFileName,
  getSeriesStem,
  getSummaryFileName,
  getTaskId,
  getTaskLogPath,
  getWorkRoot,
  getWorkspaceDir,
} from "./run-paths.js";
import {
  describeMissingSides,
  renderAcquisitionTable,
  renderMissingReport,
  renderSummary,
} from "./summary-report.js";

export const FAILURE_REASONS = {
  workspace: "workspace directory failure",
  unreadableInput: "cannot read input",
  volumeMismatch: "volume-count mismatch",
  engine: "engine failed after retry",
  metrics: "quality metrics failed",
  apply: "apply step failed",
  placement: "output placement failed",
} as const;

export const NO_PRIMARY_REASON = "no primary series";

export const WORKSPACE_FILES = {
  blipA: "blipA_1vol.nii.gz",
  blipB: "blipB_1vol.nii.gz",
  acqp: "acqp.txt",
  merged: "blips.nii.gz",
  pairBase: "hifi_b0_pair",
  pairA: "hifi0.nii.gz",
  pairB: "hifi1.nii.gz",
} as const;

export type TaskPipelineConfig = Pick<
  BatchConfig,
  "root" | "engineThreads" | "phaseEncodeOverride" | "apKeywords" | "paKeywords" | "workDir"
>;

export type TaskPipelineContext = {
  config: TaskPipelineConfig;
  toolkit: ImageToolkit & CorrectionEngine;
  logger: RunLogger;
  workspaceLock: KeyedLock;
  now?: () => Date;
  clock?: () => number;
};

type TaskProgress = {
  primarySeriesPath: string | null;
  primaryOutputPath: string | null;
  summaryArtifactPath: string | null;
  missingReportPath?: string;
  taskLogPath?: string;
  attempts: EngineAttempt[];
};

type StepResult = { outcome: TaskOutcome; reason: string | null };

const attemptStep = async <T>(reason: string, step: () => Promise<T>): Promise<T> => {
  try {
    return await step();
  } catch (error) {
    if (error instanceof TaskFailure) throw error;
    throw new TaskFailure(reason, describeError(error));
  }
};

const reduceToSingleVolume = async (
  toolkit: ImageToolkit,
  input: string,
  output: string,
  logger: Logger
): Promise<void> => {
  const volumes = await toolkit.countVolumes(input);
  if (volumes > 1) {
    logger.info("averaging auxiliary volumes", { input, volumes, output });
    await toolkit.temporalMean(input, output);
  } else {
    await toolkit.normalizeFormat(input, output);
  }
};

const logHeaders = async (
  toolkit: ImageToolkit,
  images: Record<string, string>,
  logger: Logger
): Promise<void> => {
  for (const [label, image] of Object.entries(images)) {
    try {
      logger.debug("image header", { label, image, header: await toolkit.headerSummary(image) });
    } catch (error) {
      logger.warn("image header unreadable", { label, image, error: describeError(error) });
    }
  }
};

const measureAfterDivergence = async (
  toolkit: ImageToolkit & CorrectionEngine,
  params: { workspaceDir: string; acqpPath: string; resultsBase: string },
  logger: Logger
): Promise<AfterDivergence> => {
  const inWorkspace = (name: string) => path.join(params.workspaceDir, name);
  let pairPath: string;
  try {
    pairPath = await toolkit.applyCorrection({
      workspaceDir: params.workspaceDir,
      inputs: [inWorkspace(WORKSPACE_FILES.blipA), inWorkspace(WORKSPACE_FILES.blipB)],
      indices: [1, 2],
      acqpPath: params.acqpPath,
      resultsBase: params.resultsBase,
      outputBase: inWorkspace(WORKSPACE_FILES.pairBase),
    });
  } catch (error) {
    logger.warn("corrected blip pair unavailable", { error: describeError(error) });
    return { status: "missing" };
  }
  if (!(await fileExists(pairPath))) {
    logger.warn("corrected blip pair unavailable", { pairPath });
    return { status: "missing" };
  }

  try {
    const volumes = await toolkit.countVolumes(pairPath);
    if (volumes < 2) {
      logger.warn("corrected blip pair too short", { pairPath, volumes });
      return { status: "skipped", volumes };
    }
    await toolkit.extractVolume(pairPath, 0, inWorkspace(WORKSPACE_FILES.pairA));
    await toolkit.extractVolume(pairPath, 1, inWorkspace(WORKSPACE_FILES.pairB));
    const stats = await computeDivergence(toolkit, {
      imageA: inWorkspace(WORKSPACE_FILES.pairA),
      imageB: inWorkspace(WORKSPACE_FILES.pairB),
      workspaceDir: params.workspaceDir,
      label: "after",
    });
    return { status: "computed", stats };
  } catch (error) {
    logger.warn("after-correction divergence failed", { error: describeError(error) });
    return { status: "missing" };
  }
};

const runInWorkspace = async (
  task: Task,
  inputs: ResolvedInputs,
  context: TaskPipelineContext,
  progress: TaskProgress
): Promise<StepResult> => {
  const { config, toolkit } = context;
  const taskId = getTaskId(task);
  const workspaceDir = getWorkspaceDir(getWorkRoot(config.root, config.workDir), task);
  await attemptStep(FAILURE_REASONS.workspace, () => fs.mkdir(workspaceDir, { recursive: true }));

  progress.taskLogPath = getTaskLogPath(workspaceDir);
  const logger = context.logger.forTask(taskId, progress.taskLogPath);
  const stem = getSeriesStem(inputs.primarySeriesPath);
  logger.info("task inputs", {
    workspaceDir,
    primarySeriesPath: inputs.primarySeriesPath,
    auxImageAPath: inputs.auxImageAPath,
    auxImageBPath: inputs.auxImageBPath,
  });

  const { auxImageAPath, auxImageBPath } = inputs;
  if (!auxImageAPath || !auxImageBPath) {
    const missingSides: AuxSide[] = [];
    if (!auxImageAPath) missingSides.push("A");
    if (!auxImageBPath) missingSides.push("B");
    const reportPath = path.join(workspaceDir, getMissingReportFileName(stem));
    await attemptStep(FAILURE_REASONS.workspace, () =>
      writeTextAtomic(
        reportPath,
        renderMissingReport({
          timestamp: (context.now ?? (() => new Date()))().toISOString(),
          task,
          primarySeriesPath: inputs.primarySeriesPath,
          missingSides,
          searchDir: inputs.auxSearchDir,
          keywords: config,
        })
      )
    );
    progress.missingReportPath = reportPath;
    const reason = describeMissingSides(missingSides);
    logger.warn("auxiliary inputs missing", { missingSides, reportPath });
    return { outcome: "SKIP", reason };
  }

  const params = await extractAcquisitionParams({
    primarySeriesPath: inputs.primarySeriesPath,
    auxImageAPath,
    phaseEncodeOverride: config.phaseEncodeOverride,
    logger,
  });
  await logHeaders(
    toolkit,
    { A: auxImageAPath, B: auxImageBPath, primary: inputs.primarySeriesPath },
    logger
  );

  const inWorkspace = (name: string) => path.join(workspaceDir, name);
  const blipA = inWorkspace(WORKSPACE_FILES.blipA);
  const blipB = inWorkspace(WORKSPACE_FILES.blipB);
  await attemptStep(FAILURE_REASONS.unreadableInput, () =>
    reduceToSingleVolume(toolkit, auxImageAPath, blipA, logger)
  );
  await attemptStep(FAILURE_REASONS.unreadableInput, () =>
    reduceToSingleVolume(toolkit, auxImageBPath, blipB, logger)
  );

  const before = await attemptStep(FAILURE_REASONS.metrics, () =>
    computeDivergence(toolkit, { imageA: blipA, imageB: blipB, workspaceDir, label: "before" })
  );

  const acqpPath = inWorkspace(WORKSPACE_FILES.acqp);
  await attemptStep(FAILURE_REASONS.workspace, () =>
    writeTextAtomic(acqpPath, renderAcquisitionTable(params.readoutTime))
  );

  const mergedPath = inWorkspace(WORKSPACE_FILES.merged);
  const mergedVolumes = await attemptStep(FAILURE_REASONS.volumeMismatch, async () => {
    await toolkit.mergeVolumes([blipA, blipB], mergedPath);
    return toolkit.countVolumes(mergedPath);
  });
  if (mergedVolumes !== 2) {
    throw new TaskFailure(
      FAILURE_REASONS.volumeMismatch,
      `merged image has ${mergedVolumes} volumes`
    );
  }

  const plans = buildEnginePlans(await toolkit.locateProfile());
  const engine = await runEnginePlans(
    plans,
    (plan) =>
      toolkit.estimateField({
        workspaceDir,
        mergedPath,
        acqpPath,
        plan,
        threads: config.engineThreads,
      }),
    logger,
    context.clock
  );
  progress.attempts = engine.attempts;
  if (!engine.ok) {
    throw new TaskFailure(FAILURE_REASONS.engine);
  }
  const { resultsBase, fieldPath } = engine.value;

  const { fieldStats, shiftMaps } = await attemptStep(FAILURE_REASONS.metrics, async () => ({
    fieldStats: await computeFieldStats(toolkit, fieldPath),
    shiftMaps: await computeShiftMaps(toolkit, {
      fieldPath,
      readoutTime: params.readoutTime,
      spacingSource: blipA,
      workspaceDir,
    }),
  }));

  logger.info("applying correction", { phaseEncodeIndex: params.phaseEncodeIndex });
  const correctedPath = await attemptStep(FAILURE_REASONS.apply, async () => {
    const output = await toolkit.applyCorrection({
      workspaceDir,
      inputs: [inputs.primarySeriesPath],
      indices: [params.phaseEncodeIndex],
      acqpPath,
      resultsBase,
      outputBase: inWorkspace(getCorrectedBaseName(stem)),
    });
    if (!(await fileExists(output))) {
      throw new TaskFailure(FAILURE_REASONS.apply, `corrected output missing: ${output}`);
    }
    return output;
  });

  const after = await measureAfterDivergence(
    toolkit,
    { workspaceDir, acqpPath, resultsBase },
    logger
  );

  const outputDir = path.dirname(inputs.primarySeriesPath);
  const placedOutput = path.join(outputDir, getCorrectedFileName(stem));
  const placedSummary = path.join(outputDir, getSummaryFileName(stem));
  const summaryPath = inWorkspace(getSummaryFileName(stem));
  await attemptStep(FAILURE_REASONS.workspace, () =>
    writeTextAtomic(
      summaryPath,
      renderSummary({
        primarySeriesPath: inputs.primarySeriesPath,
        auxImageAPath,
        auxImageBPath,
        readoutTime: params.readoutTime,
        fieldStats,
        shiftVoxels: shiftMaps.voxels,
        shiftMillimetres: shiftMaps.millimetres,
        before,
        after,
        correctedPath: placedOutput,
      })
    )
  );

  await attemptStep(FAILURE_REASONS.placement, async () => {
    await fs.copyFile(correctedPath, placedOutput);
    await fs.copyFile(summaryPath, placedSummary);
  });
  progress.primaryOutputPath = placedOutput;
  progress.summaryArtifactPath = placedSummary;
  logger.info("outputs placed", { placedOutput, placedSummary });
  return { outcome: "OK", reason: null };
};

/**
 * Runs one task to a terminal outcome. Never rejects: every error is classified
 * into a FAIL result with a reason.
 */
export const executeTask = async (
  task: Task,
  context: TaskPipelineContext
): Promise<ExecutionResult> => {
  const clock = context.clock ?? Date.now;
  const startedAt = clock();
  const taskId = getTaskId(task);
  const progress: TaskProgress = {
    primarySeriesPath: null,
    primaryOutputPath: null,
    summaryArtifactPath: null,
    attempts: [],
  };

  let step: StepResult;
  try {
    const inputs = await resolveInputs(
      context.config.root,
      task,
      context.config,
      context.logger.forTask(taskId)
    );
    if (!inputs) {
      step = { outcome: "SKIP", reason: NO_PRIMARY_REASON };
    } else {
      progress.primarySeriesPath = inputs.primarySeriesPath;
      step = await context.workspaceLock.run(taskId, () =>
        runInWorkspace(task, inputs, context, progress)
      );
    }
  } catch (error) {
    const reason =
      error instanceof TaskFailure ? error.reason : `unexpected error: ${describeError(error)}`;
    context.logger
      .forTask(taskId, progress.taskLogPath)
      .error("task failed", { reason, error: describeError(error) });
    step = { outcome: "FAIL", reason };
    progress.primaryOutputPath = null;
    progress.summaryArtifactPath = null;
  }

  const durationMs = clock() - startedAt;
  context.logger.forTask(taskId, progress.taskLogPath).info("task finished", {
    outcome: step.outcome,
    reason: step.reason,
    durationMs,
  });
  return {
    task,
    outcome: step.outcome,
    reason: step.reason,
    primarySeriesPath: progress.primarySeriesPath,
    primaryOutputPath: progress.primaryOutputPath,
    summaryArtifactPath: progress.summaryArtifactPath,
    ...(progress.missingReportPath ? { missingReportPath: progress.missingReportPath } : {}),
    attempts: progress.attempts,
    durationMs,
  };
};
