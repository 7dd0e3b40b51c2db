import path from "node:path";
import type {
  DivergenceStats,
  FieldStats,
  ShiftMapStats,
} from "../shared/contracts.js";
import type { ImageToolkit, StatisticTerm } from "./image-toolkit.js";

export const FIELD_TERMS: readonly StatisticTerm[] = ["range", "mean", "std"];

export const SHIFT_TERMS: readonly StatisticTerm[] = [
  "mean",
  { percentile: 50 },
  { percentile: 95 },
  { percentile: 99 },
  "range",
];

export const DIVERGENCE_TERMS: readonly StatisticTerm[] = [
  "mean",
  { percentile: 95 },
  { percentile: 99 },
  "range",
];

const pick = (values: readonly number[], index: number): number => {
  const value = values[index];
  if (value === undefined) {
    throw new Error(`Missing statistic at position ${index}`);
  }
  return value;
};

export const toFieldStats = (values: readonly number[]): FieldStats => ({
  min: pick(values, 0),
  max: pick(values, 1),
  mean: pick(values, 2),
  std: pick(values, 3),
});

export const toShiftMapStats = (values: readonly number[]): ShiftMapStats => ({
  mean: pick(values, 0),
  median: pick(values, 1),
  p95: pick(values, 2),
  p99: pick(values, 3),
  min: pick(values, 4),
  max: pick(values, 5),
});

export const toDivergenceStats = (values: readonly number[]): DivergenceStats => ({
  mean: pick(values, 0),
  p95: pick(values, 1),
  p99: pick(values, 2),
  min: pick(values, 3),
  max: pick(values, 4),
});

export const computeFieldStats = async (
  toolkit: ImageToolkit,
  fieldPath: string
): Promise<FieldStats> => toFieldStats(await toolkit.statistics(fieldPath, FIELD_TERMS));

/** Voxel-wise |A - B|; keeps the signed and absolute maps in the workspace. */
export const computeDivergence = async (
  toolkit: ImageToolkit,
  params: { imageA: string; imageB: string; workspaceDir: string; label: string }
): Promise<DivergenceStats> => {
  const diffPath = path.join(params.workspaceDir, `${params.label}_diff.nii.gz`);
  const absPath = path.join(params.workspaceDir, `${params.label}_diff_abs.nii.gz`);
  await toolkit.subtract(params.imageA, params.imageB, diffPath);
  await toolkit.absolute(diffPath, absPath);
  return toDivergenceStats(await toolkit.statistics(absPath, DIVERGENCE_TERMS));
};

export type ShiftMaps = {
  voxels: ShiftMapStats;
  millimetres: ShiftMapStats;
  pixelSpacing: number;
};

/**
 * Voxel-shift maps: field (Hz) x readout time gives voxels, times the
 * phase-encode pixel spacing of `spacingSource` gives millimetres.
 */
export const computeShiftMaps = async (
  toolkit: ImageToolkit,
  params: {
    fieldPath: string;
    readoutTime: number;
    spacingSource: string;
    workspaceDir: string;
  }
): Promise<ShiftMaps> => {
  const inWorkspace = (name: string) => path.join(params.workspaceDir, name);
  const rawSpacing = await toolkit.headerValue(params.spacingSource, "pixdim2");
  const pixelSpacing = Number(rawSpacing);
  if (!Number.isFinite(pixelSpacing) || pixelSpacing <= 0) {
    throw new Error(`Invalid phase-encode pixel spacing "${rawSpacing}"`);
  }

  await toolkit.multiply(params.fieldPath, params.readoutTime, inWorkspace("vsm_vox.nii.gz"));
  await toolkit.absolute(inWorkspace("vsm_vox.nii.gz"), inWorkspace("vsm_vox_abs.nii.gz"));
  await toolkit.multiply(inWorkspace("vsm_vox.nii.gz"), pixelSpacing, inWorkspace("vsm_mm.nii.gz"));
  await toolkit.absolute(inWorkspace("vsm_mm.nii.gz"), inWorkspace("vsm_mm_abs.nii.gz"));

  const [voxels, millimetres] = await Promise.all([
    toolkit.statistics(inWorkspace("vsm_vox_abs.nii.gz"), SHIFT_TERMS),
    toolkit.statistics(inWorkspace("vsm_mm_abs.nii.gz"), SHIFT_TERMS),
  ]);
  return {
    voxels: toShiftMapStats(voxels),
    millimetres: toShiftMapStats(millimetres),
    pixelSpacing,
  };
};
