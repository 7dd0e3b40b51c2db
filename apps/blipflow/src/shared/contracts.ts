/**
 * Shared types for blipflow.
 * Describes batch configuration, work items, and per-task outcomes.
 */

export type PhaseEncodeDirection = "j" | "j-";

export type PhaseEncodeIndex = 1 | 2;

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Which auxiliary image of the blip pair: A is acquired AP, B is acquired PA. */
export type AuxSide = "A" | "B";

export interface BatchConfig {
  root: string;
  runs: string[];
  workers: number;
  engineThreads: number;
  phaseEncodeOverride?: PhaseEncodeDirection;
  apKeywords: string[];
  paKeywords: string[];
  dryRun: boolean;
  subjectPattern: string;
  sessionPattern: string;
  workDir?: string;
  logDir?: string;
  logLevel: LogLevel;
}

export interface Task {
  readonly subjectId: string;
  readonly sessionId: string | null;
  readonly runLabel: string;
}

export interface ResolvedInputs {
  primarySeriesPath: string;
  auxImageAPath: string | null;
  auxImageBPath: string | null;
  auxSearchDir: string;
}

export interface AcquisitionParams {
  readoutTime: number;
  readoutTimeSource: "sidecar" | "default";
  phaseEncodeIndex: PhaseEncodeIndex;
  phaseEncodeSource: "override" | "sidecar" | "default";
}

export type TaskOutcome = "OK" | "SKIP" | "FAIL";

export interface EngineAttempt {
  plan: string;
  ok: boolean;
  durationMs: number;
  error?: string;
}

export interface ExecutionResult {
  task: Task;
  outcome: TaskOutcome;
  reason: string | null;
  primarySeriesPath: string | null;
  primaryOutputPath: string | null;
  summaryArtifactPath: string | null;
  missingReportPath?: string;
  attempts: EngineAttempt[];
  durationMs: number;
}

export interface LedgerRecord {
  timestamp: string;
  outcome: TaskOutcome;
  subject: string;
  session: string;
  run: string;
  primary: string;
  output: string;
  reason: string;
}

export interface OutcomeTally {
  ok: number;
  skip: number;
  fail: number;
  total: number;
}

/** Absolute-value percentile summary of a voxel map. */
export interface ShiftMapStats {
  mean: number;
  median: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
}

export interface FieldStats {
  min: number;
  max: number;
  mean: number;
  std: number;
}

export interface DivergenceStats {
  mean: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
}

export type AfterDivergence =
  | { status: "computed"; stats: DivergenceStats }
  | { status: "skipped"; volumes: number }
  | { status: "missing" };

export interface CorrectionSummary {
  primarySeriesPath: string;
  auxImageAPath: string;
  auxImageBPath: string;
  readoutTime: number;
  fieldStats: FieldStats;
  shiftVoxels: ShiftMapStats;
  shiftMillimetres: ShiftMapStats;
  before: DivergenceStats;
  after: AfterDivergence;
  correctedPath: string;
}

export interface PlannedTask {
  task: Task;
  inputs: ResolvedInputs | null;
}
