import path from "node:path";
import {
  CommandError,
  commandExists,
  runChecked,
  runCommand,
  type CommandOptions,
  type CommandRunner,
} from "./command-runner.js";
import { fileExists } from "./file-utils.js";
import type {
  ApplyCorrectionRequest,
  FieldEstimate,
  FieldEstimateRequest,
  StatisticTerm,
  Toolkit,
  ToolchainReport,
} from "./image-toolkit.js";

export const REQUIRED_COMMANDS = [
  "topup",
  "applytopup",
  "fslmaths",
  "fslmerge",
  "fslroi",
  "fslstats",
  "fslhd",
  "fslval",
  "fslnvols",
  "fslchfiletype",
] as const;

export const PROFILE_FILE_NAME = "b02b0.cnf";

export const FIELD_OUTPUTS = {
  results: "topup_results",
  field: "field_Hz",
  unwarped: "unwarped_blips",
  warp: "warpfield_mm",
  jacobian: "jac_det",
  log: "topup_run.log",
} as const;

export const profileCandidates = (env: NodeJS.ProcessEnv): string[] => {
  const fslDir = env.FSLDIR?.trim();
  const bundled = fslDir
    ? [
        path.join(fslDir, "etc", "flirtsch", PROFILE_FILE_NAME),
        path.join(fslDir, "etc", PROFILE_FILE_NAME),
      ]
    : [];
  return [
    ...bundled,
    `/usr/share/fsl/etc/flirtsch/${PROFILE_FILE_NAME}`,
    `/usr/local/fsl/etc/flirtsch/${PROFILE_FILE_NAME}`,
  ];
};

const HEADER_LINE = /^\s*(pix)?dim[1-4]\b/;

export const statisticFlags = (terms: readonly StatisticTerm[]): string[] =>
  terms.flatMap((term) => {
    if (term === "mean") return ["-M"];
    if (term === "std") return ["-S"];
    if (term === "range") return ["-R"];
    return ["-P", String(term.percentile)];
  });

const expectedValueCount = (terms: readonly StatisticTerm[]): number =>
  terms.reduce((count, term) => count + (term === "range" ? 2 : 1), 0);

export const parseStatistics = (output: string, terms: readonly StatisticTerm[]): number[] => {
  const values = output
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map((token) => Number(token));
  const expected = expectedValueCount(terms);
  if (values.length !== expected || values.some((value) => !Number.isFinite(value))) {
    throw new Error(`Expected ${expected} statistics, got "${output.trim()}"`);
  }
  return values;
};

export const parseVolumeCount = (output: string, image: string): number => {
  const count = Number.parseInt(output.trim(), 10);
  if (!Number.isFinite(count) || count <= 0) {
    throw new Error(`Cannot read volume count for ${image}`);
  }
  return count;
};

export type FslToolkitOptions = {
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  hasCommand?: (command: string) => Promise<boolean>;
};

/** FSL-backed toolkit: each operation is one FSL command line. */
export const createFslToolkit = (options: FslToolkitOptions = {}): Toolkit => {
  const runner = options.runner ?? runCommand;
  const env = options.env ?? process.env;
  const hasCommand = options.hasCommand ?? ((command: string) => commandExists(command, env));
  const commandOptions = (cwd?: string): CommandOptions => ({ cwd, env });

  const run = (command: string, args: readonly string[], cwd?: string) =>
    runChecked(runner, command, args, commandOptions(cwd));

  let nvolsAvailable: Promise<boolean> | null = null;

  const readDim4 = async (image: string): Promise<number> =>
    parseVolumeCount((await run("fslval", [image, "dim4"])).stdout, image);

  // fslnvols first; the dim4 header field when it is missing or exits non-zero.
  const countVolumes = async (image: string): Promise<number> => {
    nvolsAvailable ??= hasCommand("fslnvols");
    if (!(await nvolsAvailable)) return readDim4(image);
    let output: string;
    try {
      output = (await run("fslnvols", [image])).stdout;
    } catch (error) {
      if (!(error instanceof CommandError)) throw error;
      return readDim4(image);
    }
    return parseVolumeCount(output, image);
  };

  const locateProfile = async (): Promise<string | null> => {
    for (const candidate of profileCandidates(env)) {
      if (await fileExists(candidate)) return candidate;
    }
    return null;
  };

  const estimateField = async (request: FieldEstimateRequest): Promise<FieldEstimate> => {
    const inWorkspace = (name: string) => path.join(request.workspaceDir, name);
    const planArgs =
      request.plan.name === "profile"
        ? [`--config=${request.plan.profilePath}`]
        : [`--warpres=${request.plan.warpResolution}`, `--subsamp=${request.plan.subsampling}`];
    const resultsBase = inWorkspace(FIELD_OUTPUTS.results);
    const fieldBase = inWorkspace(FIELD_OUTPUTS.field);
    await run(
      "topup",
      [
        `--imain=${request.mergedPath}`,
        `--datain=${request.acqpPath}`,
        ...planArgs,
        `--nthr=${request.threads}`,
        `--out=${resultsBase}`,
        `--fout=${fieldBase}`,
        `--iout=${inWorkspace(FIELD_OUTPUTS.unwarped)}`,
        `--dfout=${inWorkspace(FIELD_OUTPUTS.warp)}`,
        `--jacout=${inWorkspace(FIELD_OUTPUTS.jacobian)}`,
        `--logout=${inWorkspace(FIELD_OUTPUTS.log)}`,
        "-v",
      ],
      request.workspaceDir
    );
    return { resultsBase, fieldPath: `${fieldBase}.nii.gz` };
  };

  const applyCorrection = async (request: ApplyCorrectionRequest): Promise<string> => {
    await run(
      "applytopup",
      [
        `--imain=${request.inputs.join(",")}`,
        `--datain=${request.acqpPath}`,
        `--inindex=${request.indices.join(",")}`,
        `--topup=${request.resultsBase}`,
        "--method=jac",
        `--out=${request.outputBase}`,
      ],
      request.workspaceDir
    );
    return `${request.outputBase}.nii.gz`;
  };

  const preflight = async (): Promise<ToolchainReport> => {
    const missingCommands: string[] = [];
    for (const command of REQUIRED_COMMANDS) {
      if (!(await hasCommand(command))) missingCommands.push(command);
    }
    let version: string | null = null;
    if (await hasCommand("fslversion")) {
      const result = await runner("fslversion", [], commandOptions());
      version = result.exitCode === 0 ? result.stdout.trim() || null : null;
    }
    return {
      toolchainDir: env.FSLDIR?.trim() || null,
      version,
      missingCommands,
      profilePath: await locateProfile(),
    };
  };

  return {
    countVolumes,
    temporalMean: async (input, output) => {
      await run("fslmaths", [input, "-Tmean", output]);
    },
    normalizeFormat: async (input, output) => {
      await run("fslchfiletype", ["NIFTI_GZ", input, output]);
    },
    subtract: async (minuend, subtrahend, output) => {
      await run("fslmaths", [minuend, "-sub", subtrahend, output]);
    },
    absolute: async (input, output) => {
      await run("fslmaths", [input, "-abs", output]);
    },
    multiply: async (input, factor, output) => {
      await run("fslmaths", [input, "-mul", String(factor), output]);
    },
    mergeVolumes: async (inputs, output) => {
      await run("fslmerge", ["-t", output, ...inputs]);
    },
    extractVolume: async (input, index, output) => {
      await run("fslroi", [input, output, String(index), "1"]);
    },
    statistics: async (image, terms) => {
      const result = await run("fslstats", [image, ...statisticFlags(terms)]);
      return parseStatistics(result.stdout, terms);
    },
    headerValue: async (image, key) => {
      const result = await run("fslval", [image, key]);
      return result.stdout.trim();
    },
    headerSummary: async (image) => {
      const result = await run("fslhd", [image]);
      return result.stdout
        .split(/\r?\n/)
        .filter((line) => HEADER_LINE.test(line))
        .map((line) => line.trim().replace(/\s+/g, " "));
    },
    locateProfile,
    estimateField,
    applyCorrection,
    preflight,
  };
};
