/**
 * Command-line front end: resolves the layered config, then lists, plans or runs a batch.
 * Exit codes: 0 after a completed batch (task failures included), 1 for fatal
 * configuration or dataset errors, 2 for usage errors.
 */

import {
  ConfigError,
  DatasetScanError,
  createFslToolkit,
  describeError,
  getTaskLabel,
  loadBatchConfigFile,
  parseCliArgs,
  planBatch,
  readRunIndex,
  resolveBatchConfig,
  resolveLogRoot,
  runBatch,
  type BatchConfig,
  type Toolkit,
} from "../src/index.js";
import {
  createTaskProgress,
  devLog,
  failure,
  formatDuration,
  info,
  note,
  section,
  startStep,
  warn,
} from "./cli.js";

export type CliDependencies = {
  env?: NodeJS.ProcessEnv;
  createToolkit?: (env: NodeJS.ProcessEnv) => Toolkit;
};

const listRuns = async (logRoot: string): Promise<number> => {
  const runs = await readRunIndex(logRoot);
  section("BATCH RUNS");
  if (runs.length === 0) {
    info(`No batch runs recorded in ${logRoot}`);
    return 0;
  }
  for (const run of runs) {
    const tally = run.tally
      ? `  OK ${run.tally.ok}  SKIP ${run.tally.skip}  FAIL ${run.tally.fail}`
      : "";
    info(`${run.runId}  ${run.status ?? "unknown"}${tally}`);
    if (run.ledgerPath) note(`ledger: ${run.ledgerPath}`);
    if (run.error) note(`error: ${run.error}`);
  }
  return 0;
};

const printPlan = async (config: BatchConfig): Promise<number> => {
  const planned = await planBatch(config);
  section("DRY RUN");
  info(`Total tasks: ${planned.length} (workers=${config.workers})`);
  for (const { task, inputs } of planned) {
    info(`[DRY] ${task.subjectId} ${task.sessionId ?? "(nos)"} ${task.runLabel}`);
    info(`      BOLD: ${inputs?.primarySeriesPath ?? "<none>"}`);
    info(`      AP: ${inputs?.auxImageAPath ?? "<none>"}`);
    info(`      PA: ${inputs?.auxImageBPath ?? "<none>"}`);
  }
  return 0;
};

const checkToolchain = async (toolkit: Toolkit): Promise<void> => {
  const step = startStep("Check toolchain");
  const report = await toolkit.preflight();
  info(`FSLDIR: ${report.toolchainDir ?? "(unset)"}`);
  info(`Engine version: ${report.version ?? "unknown"}`);
  for (const command of report.missingCommands) {
    warn(`${command} not found on PATH`);
  }
  if (report.profilePath) {
    info(`Engine profile: ${report.profilePath}`);
  } else {
    warn("No bundled engine profile found; only the degraded plan will run");
  }
  step.end(report.missingCommands.length > 0 ? "warn" : "ok");
};

const executeBatch = async (config: BatchConfig, toolkit: Toolkit): Promise<number> => {
  const step = startStep("Run batch");
  const progress = createTaskProgress();
  const summary = await runBatch({
    config,
    toolkit,
    echo: (entry) => {
      if (entry.level === "warn" || entry.level === "error") {
        devLog(`${entry.level} ${entry.taskId ?? "batch"}: ${entry.message}`);
      }
    },
    onTaskComplete: (result, completed, total) => {
      progress.record(result.outcome, getTaskLabel(result.task), completed, total);
    },
  });
  progress.end();
  step.end(summary.tally.fail > 0 ? "warn" : "ok", `${summary.taskCount} tasks`);

  section("BATCH SUMMARY");
  const { ok, skip, fail, total } = summary.tally;
  info(`OK: ${ok}  SKIP: ${skip}  FAIL: ${fail}  (total ${total})`);
  for (const result of summary.results) {
    if (result.outcome === "FAIL") {
      warn(`${getTaskLabel(result.task)}: ${result.reason ?? "failed"}`);
    }
  }
  info(`Ledger: ${summary.ledgerPath}`);
  info(`Log: ${summary.logPath}`);
  info(`Duration: ${formatDuration(summary.durationMs)}`);
  return 0;
};

export const runCli = async (argv: string[], deps: CliDependencies = {}): Promise<number> => {
  const env = deps.env ?? process.env;
  const parsed = parseCliArgs(argv);
  if (parsed.kind === "help") {
    process.stdout.write(parsed.text);
    return 0;
  }
  if (parsed.kind === "error") {
    process.stderr.write(parsed.message);
    return 2;
  }

  try {
    const file = await loadBatchConfigFile(parsed.configPath, env);
    if (parsed.listRuns) {
      return await listRuns(resolveLogRoot({ file, env, cli: parsed.overrides }));
    }
    const { config, sources } = resolveBatchConfig({ file, env, cli: parsed.overrides });

    section("BLIPFLOW BATCH");
    info(`Root: ${config.root}`);
    info(`Runs: ${config.runs.join(" ")}`);
    info(`Workers: ${config.workers}  Engine threads: ${config.engineThreads}`);
    if (config.phaseEncodeOverride) {
      info(`Phase-encode override: ${config.phaseEncodeOverride}`);
    }
    note(sources.loadedFromFile ? `Config: ${sources.configPath}` : "Config: no config file");

    if (config.dryRun) {
      return await printPlan(config);
    }
    const toolkit = deps.createToolkit?.(env) ?? createFslToolkit({ env });
    await checkToolchain(toolkit);
    return await executeBatch(config, toolkit);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof DatasetScanError) {
      failure(`${error.name}: ${error.message}`);
      return 1;
    }
    failure("Batch execution failed:");
    failure(describeError(error));
    return 1;
  }
};
