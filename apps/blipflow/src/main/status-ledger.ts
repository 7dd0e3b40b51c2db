import fs from "node:fs/promises";
import path from "node:path";
import type {
  ExecutionResult,
  LedgerRecord,
  OutcomeTally,
  TaskOutcome,
} from "../shared/contracts.js";

export const LEDGER_COLUMNS = [
  "STATUS",
  "subject",
  "session",
  "run",
  "primary",
  "output",
  "reason",
  "timestamp",
] as const;

export const LEDGER_HEADER = `${LEDGER_COLUMNS.join("\t")}\n`;

const NOT_AVAILABLE = "(na)";

const OUTCOMES: readonly TaskOutcome[] = ["OK", "SKIP", "FAIL"];

const isOutcome = (value: string): value is TaskOutcome =>
  OUTCOMES.some((outcome) => outcome === value);

// Tabs and line breaks inside a field would split the record.
const cleanField = (value: string): string => value.replace(/[\t\r\n]+/g, " ");

export const toLedgerRecord = (result: ExecutionResult, timestamp: string): LedgerRecord => ({
  timestamp,
  outcome: result.outcome,
  subject: result.task.subjectId,
  session: result.task.sessionId ?? "",
  run: result.task.runLabel,
  primary: result.primarySeriesPath ?? NOT_AVAILABLE,
  output: result.primaryOutputPath ?? result.missingReportPath ?? NOT_AVAILABLE,
  reason: result.reason ?? "",
});

export const formatLedgerLine = (record: LedgerRecord): string =>
  `${[
    record.outcome,
    record.subject,
    record.session,
    record.run,
    record.primary,
    record.output,
    record.reason,
    record.timestamp,
  ]
    .map(cleanField)
    .join("\t")}\n`;

export const parseLedgerLine = (line: string): LedgerRecord | null => {
  const fields = line.replace(/\r$/, "").split("\t");
  if (fields.length !== LEDGER_COLUMNS.length) return null;
  const [outcome, subject, session, run, primary, output, reason, timestamp] = fields;
  if (!isOutcome(outcome)) return null;
  return { outcome, subject, session, run, primary, output, reason, timestamp };
};

export const tallyRecords = (records: readonly { outcome: TaskOutcome }[]): OutcomeTally => {
  const tally: OutcomeTally = { ok: 0, skip: 0, fail: 0, total: 0 };
  for (const record of records) {
    if (record.outcome === "OK") tally.ok += 1;
    else if (record.outcome === "SKIP") tally.skip += 1;
    else tally.fail += 1;
    tally.total += 1;
  }
  return tally;
};

/** Parses a ledger file; the header and malformed lines are ignored. */
export const readLedger = async (ledgerPath: string): Promise<LedgerRecord[]> => {
  const raw = await fs.readFile(ledgerPath, "utf-8");
  return raw
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map(parseLedgerLine)
    .filter((record): record is LedgerRecord => record !== null);
};

export type StatusLedger = {
  readonly path: string;
  /** Resolves once the record is on disk. */
  append: (result: ExecutionResult) => Promise<LedgerRecord>;
  /** Waits for every queued append. */
  flush: () => Promise<void>;
};

/**
 * Creates the ledger file with its header; rejects with `EEXIST` when the file is
 * already there. The returned ledger is the only writer; appends are queued so
 * concurrent callers never interleave.
 */
export const openStatusLedger = async (
  ledgerPath: string,
  options: { now?: () => Date } = {}
): Promise<StatusLedger> => {
  const now = options.now ?? (() => new Date());
  await fs.mkdir(path.dirname(ledgerPath), { recursive: true });
  await fs.writeFile(ledgerPath, LEDGER_HEADER, { flag: "wx" });

  let queue: Promise<void> = Promise.resolve();

  const append = (result: ExecutionResult): Promise<LedgerRecord> => {
    const record = toLedgerRecord(result, now().toISOString());
    const write = queue.then(async () => {
      await fs.appendFile(ledgerPath, formatLedgerLine(record));
      return record;
    });
    // A failed write is reported to its caller; later appends still run.
    queue = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  };

  return {
    path: ledgerPath,
    append,
    flush: async () => {
      await queue;
    },
  };
};
