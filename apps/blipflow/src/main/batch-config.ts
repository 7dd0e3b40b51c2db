import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import type { BatchConfig } from "../shared/contracts.js";
import { ConfigError } from "./errors.js";
import { normalizeLevel } from "./logger.js";

export type { BatchConfig };

/** One configuration layer; values are raw until the merged result is validated. */
export type BatchConfigInput = { [K in keyof BatchConfig]?: unknown };

export type BatchConfigSources = {
  configPath: string;
  loadedFromFile: boolean;
  fileOverrides: BatchConfigInput;
  envOverrides: BatchConfigInput;
  cliOverrides: BatchConfigInput;
};

export const CONFIG_FILE_NAME = "blipflow.config.yaml";

export const defaultBatchConfig: BatchConfigInput = {
  workers: 1,
  engineThreads: 1,
  apKeywords: ["ap", "blipa"],
  paKeywords: ["pa", "blipb"],
  dryRun: false,
  subjectPattern: "sub-*",
  sessionPattern: "ses-*",
  logLevel: "info",
};

/** Accepts `"a b"`, `"a,b"` or `["a", "b"]`. */
export const splitList = (value: unknown): unknown => {
  if (typeof value === "string") {
    return value.split(/[\s,]+/).filter((item) => item.length > 0);
  }
  if (Array.isArray(value)) {
    return value.map((item) => String(item).trim()).filter((item) => item.length > 0);
  }
  return value;
};

const listSchema = (label: string) =>
  z.preprocess(
    splitList,
    z.array(z.string().min(1)).min(1, { message: `${label} must list at least one value` })
  );

const runLabelSchema = z
  .string()
  .min(1)
  .refine((label) => !/[\\/]/.test(label) && label !== "." && label !== "..", {
    message: "run labels cannot contain path separators or be . or ..",
  });

const countSchema = (label: string) =>
  z.coerce
    .number({ invalid_type_error: `${label} must be a number` })
    .int({ message: `${label} must be an integer` })
    .positive({ message: `${label} must be at least 1` });

const batchConfigSchema = z.object({
  root: z.string({ required_error: "dataset root is required" }).min(1),
  runs: z.preprocess(
    splitList,
    z.array(runLabelSchema).min(1, { message: "runs must list at least one value" })
  ),
  workers: countSchema("workers"),
  engineThreads: countSchema("engineThreads"),
  phaseEncodeOverride: z
    .enum(["j", "j-"], {
      errorMap: () => ({ message: "phase-encode override must be j or j-" }),
    })
    .optional(),
  apKeywords: listSchema("apKeywords"),
  paKeywords: listSchema("paKeywords"),
  dryRun: z.boolean(),
  subjectPattern: z.string().min(1),
  sessionPattern: z.string().min(1),
  workDir: z.string().min(1).optional(),
  logDir: z.string().min(1).optional(),
  logLevel: z.preprocess(
    (value) => (typeof value === "string" ? normalizeLevel(value) : value),
    z.enum(["debug", "info", "warn", "error"])
  ),
});

const configFileSchema = z
  .object({
    root: z.string(),
    runs: z.union([z.string(), z.array(z.string())]),
    workers: z.number(),
    engine_threads: z.number(),
    pedir_override: z.string(),
    ap_keys: z.union([z.string(), z.array(z.string())]),
    pa_keys: z.union([z.string(), z.array(z.string())]),
    subject_pattern: z.string(),
    session_pattern: z.string(),
    work_dir: z.string(),
    log_dir: z.string(),
    log_level: z.string(),
  })
  .partial()
  .strict();

const formatIssues = (issues: z.ZodIssue[]): string =>
  issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");

export const resolveConfigPath = (
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): string =>
  configPath ?? env.BLIPFLOW_CONFIG_PATH ?? path.join(process.cwd(), CONFIG_FILE_NAME);

export type LoadedConfigFile = {
  overrides: BatchConfigInput;
  configPath: string;
  loadedFromFile: boolean;
};

/**
 * Reads the YAML config file. A missing file is only an error when the path was
 * given explicitly.
 */
export const loadBatchConfigFile = async (
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedConfigFile> => {
  const explicit = Boolean(configPath ?? env.BLIPFLOW_CONFIG_PATH);
  const resolvedPath = resolveConfigPath(configPath, env);
  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf-8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException | undefined)?.code;
    if (code === "ENOENT" && !explicit) {
      return { overrides: {}, configPath: resolvedPath, loadedFromFile: false };
    }
    throw new ConfigError(`Cannot read config file ${resolvedPath}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${resolvedPath}: ${detail}`);
  }
  if (parsed === null || parsed === undefined) {
    return { overrides: {}, configPath: resolvedPath, loadedFromFile: true };
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const detail = formatIssues(result.error.issues);
    throw new ConfigError(`Invalid config file ${resolvedPath}: ${detail}`);
  }
  const file = result.data;
  return {
    overrides: {
      root: file.root,
      runs: file.runs,
      workers: file.workers,
      engineThreads: file.engine_threads,
      phaseEncodeOverride: file.pedir_override,
      apKeywords: file.ap_keys,
      paKeywords: file.pa_keys,
      subjectPattern: file.subject_pattern,
      sessionPattern: file.session_pattern,
      workDir: file.work_dir,
      logDir: file.log_dir,
      logLevel: file.log_level,
    },
    configPath: resolvedPath,
    loadedFromFile: true,
  };
};

export const readEnvOverrides = (env: Record<string, string | undefined>): BatchConfigInput => {
  const pick = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };
  return {
    root: pick("BLIPFLOW_ROOT"),
    runs: pick("BLIPFLOW_RUNS"),
    workers: pick("BLIPFLOW_WORKERS"),
    engineThreads: pick("BLIPFLOW_ENGINE_THREADS"),
    phaseEncodeOverride: pick("BLIPFLOW_PEDIR_OVERRIDE"),
    apKeywords: pick("BLIPFLOW_AP_KEYS"),
    paKeywords: pick("BLIPFLOW_PA_KEYS"),
    workDir: pick("BLIPFLOW_WORK_DIR"),
    logDir: pick("BLIPFLOW_LOG_DIR"),
    logLevel: pick("BLIPFLOW_LOG_LEVEL"),
  };
};

const mergeLayers = (...layers: BatchConfigInput[]): BatchConfigInput => {
  const output: Record<string, unknown> = {};
  for (const layer of layers) {
    Object.entries(layer).forEach(([key, value]) => {
      if (value !== undefined) {
        output[key] = value;
      }
    });
  }
  return output;
};

/** Later layers win: defaults, then the config file, then the environment, then CLI flags. */
export const resolveBatchConfig = (options: {
  file?: LoadedConfigFile;
  env?: Record<string, string | undefined>;
  cli?: BatchConfigInput;
}): { config: BatchConfig; sources: BatchConfigSources } => {
  const fileOverrides = options.file?.overrides ?? {};
  const envOverrides = readEnvOverrides(options.env ?? {});
  const cliOverrides = options.cli ?? {};
  const merged = mergeLayers(defaultBatchConfig, fileOverrides, envOverrides, cliOverrides);

  const result = batchConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error.issues));
  }
  const parsed = result.data;
  const config: BatchConfig = {
    ...parsed,
    root: path.resolve(parsed.root),
    workDir: parsed.workDir ? path.resolve(parsed.workDir) : undefined,
    logDir: parsed.logDir ? path.resolve(parsed.logDir) : undefined,
  };

  return {
    config,
    sources: {
      configPath: options.file?.configPath ?? resolveConfigPath(undefined, {}),
      loadedFromFile: options.file?.loadedFromFile ?? false,
      fileOverrides,
      envOverrides,
      cliOverrides,
    },
  };
};

/** Where ledgers and the run index live. Needs only `logDir` or `root`, not a full config. */
export const resolveLogRoot = (options: {
  file?: LoadedConfigFile;
  env?: Record<string, string | undefined>;
  cli?: BatchConfigInput;
}): string => {
  const merged = mergeLayers(
    options.file?.overrides ?? {},
    readEnvOverrides(options.env ?? {}),
    options.cli ?? {}
  );
  const pick = (value: unknown): string | undefined =>
    typeof value === "string" && value.trim().length > 0 ? value : undefined;
  const dir = pick(merged.logDir) ?? pick(merged.root);
  if (!dir) {
    throw new ConfigError("listing runs needs a log directory or dataset root");
  }
  return path.resolve(dir);
};
