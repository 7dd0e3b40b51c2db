/* eslint-disable no-console */
import type { TaskOutcome } from "../src/index.js";

type StepStatus = "ok" | "warn" | "fail";

type Step = {
  end: (status?: StepStatus, detail?: string) => void;
};

const useColor = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
const devLogs =
  ["1", "true"].includes(process.env.BLIPFLOW_DEV_LOGS ?? "") || process.env.DEBUG === "1";

const paint = (code: string) => (value: string) =>
  useColor ? `\u001b[${code}m${value}\u001b[0m` : value;

const palette = {
  dim: paint("2"),
  green: paint("32"),
  yellow: paint("33"),
  red: paint("31"),
  cyan: paint("36"),
};

const STATUS_LABEL: Record<StepStatus, string> = {
  ok: palette.green("ok"),
  warn: palette.yellow("warn"),
  fail: palette.red("fail"),
};

const clock = (): string => palette.dim(new Date().toTimeString().slice(0, 8));

export const formatDuration = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
  const minutes = Math.floor(ms / 60_000);
  return `${minutes}m ${((ms - minutes * 60_000) / 1000).toFixed(1)}s`;
};

export const section = (title: string): void => {
  const rule = "=".repeat(Math.max(48, Math.min(80, title.length + 12)));
  console.log(`\n${rule}\n${palette.cyan(title)}\n${rule}`);
};

export const info = (message: string): void => {
  console.log(`  ${message}`);
};

export const note = (message: string): void => {
  console.log(palette.dim(`  ${message}`));
};

export const warn = (message: string): void => {
  console.log(palette.yellow(`  ! ${message}`));
};

export const failure = (message: string): void => {
  console.error(palette.red(message));
};

export const devLog = (message: string): void => {
  if (devLogs) console.log(palette.dim(`  [dev] ${message}`));
};

export const startStep = (label: string): Step => {
  const startedAt = Date.now();
  console.log(`${clock()} [start] ${label}`);
  return {
    end: (status = "ok", detail) => {
      const suffix = detail ? ` - ${detail}` : "";
      const took = palette.dim(`(${formatDuration(Date.now() - startedAt)})`);
      console.log(`${clock()} [${STATUS_LABEL[status]}] ${label}${suffix} ${took}`);
    },
  };
};

type TaskProgress = {
  record: (outcome: TaskOutcome, label: string, done: number, total: number) => void;
  end: () => void;
};

/**
 * One status line for a batch: finished count, running outcome tally and the last task.
 * Rewrites in place on a TTY; otherwise prints at most every `minIntervalMs` and on the
 * last task.
 */
export const createTaskProgress = (options?: { minIntervalMs?: number }): TaskProgress => {
  const minIntervalMs = options?.minIntervalMs ?? 250;
  const counts: Record<TaskOutcome, number> = { OK: 0, SKIP: 0, FAIL: 0 };
  let position = { done: 0, total: 0 };
  let lastEmit = 0;

  const render = (label: string): string => {
    const { done, total } = position;
    const pct = total > 0 ? ((done / total) * 100).toFixed(1) : "0.0";
    const tally = `ok ${counts.OK} skip ${counts.SKIP} fail ${counts.FAIL}`;
    return `Tasks ${done}/${total} (${pct}%) • ${tally} • ${label}`;
  };

  const clearLine = (): void => {
    if (!process.stdout.isTTY) return;
    process.stdout.clearLine(0);
    process.stdout.cursorTo(0);
  };

  return {
    record: (outcome, label, done, total) => {
      counts[outcome] += 1;
      position = { done, total };
      const now = Date.now();
      if (done < total && now - lastEmit < minIntervalMs) return;
      lastEmit = now;
      if (process.stdout.isTTY) {
        clearLine();
        process.stdout.write(render(`${outcome} ${label}`));
      } else {
        console.log(`  ${render(`${outcome} ${label}`)}`);
      }
    },
    end: () => {
      clearLine();
      const status: StepStatus = counts.FAIL > 0 ? "warn" : "ok";
      console.log(`${clock()} [${STATUS_LABEL[status]}] Tasks ${position.done}/${position.total}`);
    },
  };
};
