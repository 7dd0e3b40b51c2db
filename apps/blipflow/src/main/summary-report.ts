import type {
  AfterDivergence,
  AuxSide,
  CorrectionSummary,
  DivergenceStats,
  FieldStats,
  ShiftMapStats,
  Task,
} from "../shared/contracts.js";
import type { KeywordSets } from "./input-resolver.js";

const SIDE_LABEL: Record<AuxSide, string> = { A: "AP", B: "PA" };

/** Plain decimals get at least three places (0.05 -> "0.050"); exponent forms stay. */
export const formatReadoutTime = (value: number): string => {
  const text = String(value);
  if (/e/i.test(text)) return text;
  const decimals = text.split(".")[1]?.length ?? 0;
  return decimals >= 3 ? text : value.toFixed(3);
};

/** The two-row acquisition-parameter table: A is phase-encoded j-, B is j. */
export const renderAcquisitionTable = (readoutTime: number): string => {
  const readout = formatReadoutTime(readoutTime);
  return `0 -1 0 ${readout}\n0 1 0 ${readout}\n`;
};

const joinValues = (values: readonly number[]): string => values.map(String).join(" ");

const formatField = (stats: FieldStats): string =>
  joinValues([stats.min, stats.max, stats.mean, stats.std]);

const formatShift = (stats: ShiftMapStats): string =>
  joinValues([stats.mean, stats.median, stats.p95, stats.p99, stats.min, stats.max]);

const formatDivergence = (stats: DivergenceStats): string =>
  joinValues([stats.mean, stats.p95, stats.p99, stats.min, stats.max]);

export const formatAfterDivergence = (after: AfterDivergence): string => {
  if (after.status === "missing") return "(missing)";
  if (after.status === "skipped") return `(skipped: ${after.volumes} vol)`;
  return formatDivergence(after.stats);
};

export const renderSummary = (summary: CorrectionSummary): string =>
  [
    `BOLD: ${summary.primarySeriesPath}`,
    `AP blip: ${summary.auxImageAPath}`,
    `PA blip: ${summary.auxImageBPath}`,
    `TRT (s): ${formatReadoutTime(summary.readoutTime)}`,
    `Field_Hz stats (min max mean std): ${formatField(summary.fieldStats)}`,
    `VSM_vox abs (mean median P95 P99 min max): ${formatShift(summary.shiftVoxels)}`,
    `VSM_mm abs (mean median P95 P99 min max): ${formatShift(summary.shiftMillimetres)}`,
    `Before |A-B| abs (mean P95 P99 min max): ${formatDivergence(summary.before)}`,
    `After |A-B| abs (mean P95 P99 min max): ${formatAfterDivergence(summary.after)}`,
    `Corrected BOLD: ${summary.correctedPath}`,
    "",
  ].join("\n");

export type MissingInputsReport = {
  timestamp: string;
  task: Task;
  primarySeriesPath: string;
  missingSides: readonly AuxSide[];
  searchDir: string;
  keywords: KeywordSets;
};

export const describeMissingSides = (sides: readonly AuxSide[]): string =>
  `missing auxiliary ${sides.map((side) => `${side} (${SIDE_LABEL[side]})`).join(" and ")}`;

export const renderMissingReport = (report: MissingInputsReport): string =>
  [
    `Timestamp: ${report.timestamp}`,
    `Subject: ${report.task.subjectId}`,
    `Session: ${report.task.sessionId ?? ""}`,
    `Run: ${report.task.runLabel}`,
    `BOLD: ${report.primarySeriesPath}`,
    "",
    "Missing fmap(s):",
    ...report.missingSides.map(
      (side) => `  - ${side} (${SIDE_LABEL[side]} or ${SIDE_LABEL[side]}-keyword match) is missing`
    ),
    "",
    `Searched in: ${report.searchDir}`,
    `AP keywords: ${report.keywords.apKeywords.join(" ")}`,
    `PA keywords: ${report.keywords.paKeywords.join(" ")}`,
    "",
  ].join("\n");
