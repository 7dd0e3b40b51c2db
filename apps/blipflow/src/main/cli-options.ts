import { Command, CommanderError } from "commander";
import type { BatchConfigInput } from "./batch-config.js";

type CliFlags = {
  root?: string;
  runs?: string[];
  workers?: string;
  engineThreads?: string;
  pedirOverride?: string;
  apKeys?: string[];
  paKeys?: string[];
  dryRun?: boolean;
  config?: string;
  workDir?: string;
  logDir?: string;
  logLevel?: string;
  listRuns?: boolean;
};

export type CliParseResult =
  | { kind: "run"; overrides: BatchConfigInput; configPath?: string; listRuns: boolean }
  | { kind: "help"; text: string }
  | { kind: "error"; message: string };

const joinList = (values?: string[]): string | undefined =>
  values && values.length > 0 ? values.join(" ") : undefined;

export const buildProgram = (write: { out: (text: string) => void; err: (text: string) => void }) =>
  new Command()
    .name("blipflow")
    .description("Batch blip-up/blip-down distortion correction over a BIDS dataset")
    .option("--root <dir>", "dataset root")
    .option("--runs <labels...>", "run labels to process (space or comma separated)")
    .option("--workers <n>", "tasks processed concurrently")
    .option("--engine-threads <n>", "threads given to each field estimation")
    .option("--pedir-override <dir>", "force the primary phase-encode direction (j or j-)")
    .option("--ap-keys <keywords...>", "filename keywords identifying the AP auxiliary image")
    .option("--pa-keys <keywords...>", "filename keywords identifying the PA auxiliary image")
    .option("--dry-run", "list tasks and resolved inputs without running anything")
    .option("--config <file>", "YAML config file")
    .option("--work-dir <dir>", "workspace root (default: <root>/blipflow_work)")
    .option("--log-dir <dir>", "directory for the ledger, batch log and run index")
    .option("--log-level <level>", "debug, info, warn or error")
    .option("--list-runs", "print recorded batch runs and exit")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: write.out, writeErr: write.err })
    .showHelpAfterError();

/** Parses user arguments (no node/script prefix). Never exits the process. */
export const parseCliArgs = (argv: string[]): CliParseResult => {
  let out = "";
  let err = "";
  const program = buildProgram({
    out: (text) => {
      out += text;
    },
    err: (text) => {
      err += text;
    },
  });

  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;
    if (error.exitCode === 0) {
      return { kind: "help", text: out };
    }
    return { kind: "error", message: err || `${error.message}\n` };
  }

  const flags = program.opts<CliFlags>();
  return {
    kind: "run",
    configPath: flags.config,
    listRuns: flags.listRuns ?? false,
    overrides: {
      root: flags.root,
      runs: joinList(flags.runs),
      workers: flags.workers,
      engineThreads: flags.engineThreads,
      phaseEncodeOverride: flags.pedirOverride,
      apKeywords: joinList(flags.apKeys),
      paKeywords: joinList(flags.paKeys),
      dryRun: flags.dryRun,
      workDir: flags.workDir,
      logDir: flags.logDir,
      logLevel: flags.logLevel,
    },
  };
};
