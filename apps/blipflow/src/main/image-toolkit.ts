import type { EnginePlan } from "./engine-plans.js";

/** One requested statistic; results come back in request order, `range` as two values. */
export type StatisticTerm = "mean" | "std" | "range" | { percentile: number };

/**
 * Black-box image operations over file paths. Outputs are written where asked;
 * every method rejects when the underlying tool fails.
 */
export interface ImageToolkit {
  countVolumes(image: string): Promise<number>;
  temporalMean(input: string, output: string): Promise<void>;
  /** Rewrites a single-volume image in the compressed working format. */
  normalizeFormat(input: string, output: string): Promise<void>;
  subtract(minuend: string, subtrahend: string, output: string): Promise<void>;
  absolute(input: string, output: string): Promise<void>;
  multiply(input: string, factor: number, output: string): Promise<void>;
  mergeVolumes(inputs: readonly string[], output: string): Promise<void>;
  extractVolume(input: string, index: number, output: string): Promise<void>;
  statistics(image: string, terms: readonly StatisticTerm[]): Promise<number[]>;
  headerValue(image: string, key: string): Promise<string>;
  /** Dimension and voxel-size header lines, for the task log. */
  headerSummary(image: string): Promise<string[]>;
}

export type FieldEstimateRequest = {
  workspaceDir: string;
  mergedPath: string;
  acqpPath: string;
  plan: EnginePlan;
  threads: number;
};

export type FieldEstimate = {
  /** Basename the apply step reads the estimated coefficients from. */
  resultsBase: string;
  fieldPath: string;
};

export type ApplyCorrectionRequest = {
  workspaceDir: string;
  inputs: readonly string[];
  indices: readonly number[];
  acqpPath: string;
  resultsBase: string;
  /** Output path without extension. */
  outputBase: string;
};

export interface CorrectionEngine {
  locateProfile(): Promise<string | null>;
  estimateField(request: FieldEstimateRequest): Promise<FieldEstimate>;
  /** Resolves with the written image path. */
  applyCorrection(request: ApplyCorrectionRequest): Promise<string>;
}

export type ToolchainReport = {
  toolchainDir: string | null;
  version: string | null;
  missingCommands: string[];
  profilePath: string | null;
};

export type Toolkit = ImageToolkit &
  CorrectionEngine & {
    preflight(): Promise<ToolchainReport>;
  };
