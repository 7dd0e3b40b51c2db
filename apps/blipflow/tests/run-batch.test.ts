import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { runCli } from "../scripts/run-batch.js";
import { addTask, makeTempRoot } from "./dataset-fixture.js";
import { createFakeToolkit } from "./fake-toolkit.js";

const buildDataset = async (): Promise<string> => {
  const root = await makeTempRoot("blipflow-cli-");
  await addTask(root, { subject: "sub-S1", run: "taskA" });
  await addTask(root, { subject: "sub-S2", session: "ses-visit1", run: "taskA", ap: null });
  return root;
};

describe("runCli", () => {
  let logged: string[];
  let errors: string[];

  beforeEach(() => {
    logged = [];
    errors = [];
    vi.spyOn(console, "log").mockImplementation((message?: unknown) => {
      logged.push(String(message));
    });
    vi.spyOn(console, "error").mockImplementation((message?: unknown) => {
      errors.push(String(message));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints usage and exits 0 for --help", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    expect(await runCli(["--help"], { env: {} })).toBe(0);
    expect(String(write.mock.calls[0]?.[0])).toContain("Usage: blipflow [options]");
  });

  it("exits 2 on an unknown flag", async () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    expect(await runCli(["--nope"], { env: {} })).toBe(2);
    expect(String(write.mock.calls[0]?.[0])).toContain("unknown option '--nope'");
  });

  it("exits 1 when the root is missing", async () => {
    expect(await runCli(["--runs", "taskA"], { env: {} })).toBe(1);
    expect(errors).toEqual(["ConfigError: root: dataset root is required"]);
  });

  it("exits 1 when the dataset has no subjects", async () => {
    const root = await makeTempRoot("blipflow-cli-");

    const code = await runCli(["--root", root, "--runs", "taskA"], {
      env: {},
      createToolkit: () => createFakeToolkit(),
    });

    expect(code).toBe(1);
    expect(errors[0]).toMatch(/^DatasetScanError: /);
  });

  it("lists planned tasks on a dry run without writing anything", async () => {
    const root = await buildDataset();
    const createToolkit = vi.fn(() => createFakeToolkit());

    const code = await runCli(["--dry-run"], {
      env: { BLIPFLOW_ROOT: root, BLIPFLOW_RUNS: "taskA" },
      createToolkit,
    });

    expect(code).toBe(0);
    expect(createToolkit).not.toHaveBeenCalled();
    expect(logged).toContain("  Total tasks: 2 (workers=1)");
    expect(logged).toContain("  [DRY] sub-S2 ses-visit1 taskA");
    expect(logged).toContain("        AP: <none>");
    expect((await fs.readdir(root)).sort()).toEqual(["sub-S1", "sub-S2"]);
  });

  it("runs the batch, prints the tally and exits 0", async () => {
    const root = await buildDataset();

    const code = await runCli(["--root", root, "--runs", "taskA", "--workers", "2"], {
      env: {},
      createToolkit: () => createFakeToolkit(),
    });

    expect(code).toBe(0);
    expect(logged).toContain("  OK: 1  SKIP: 1  FAIL: 0  (total 2)");
    expect(
      logged.filter((line) => line.startsWith("  Tasks 2/2 (100.0%) • ok 1 skip 1 fail 0 • "))
    ).toHaveLength(1);
    expect(logged).toContain(
      "  ! No bundled engine profile found; only the degraded plan will run"
    );
    const entries = await fs.readdir(root);
    expect(entries.some((entry) => /^blipflow_status_\d{8}_\d{6}\.tsv$/.test(entry))).toBe(true);
    expect(entries).toContain("run-index.json");
    expect(
      await fs.stat(path.join(root, "sub-S1", "func", "sub-S1_task-taskA_bold_blipAnB.txt"))
    ).toBeTruthy();
  });

  it("lists recorded batch runs", async () => {
    const root = await buildDataset();
    await runCli(["--root", root, "--runs", "taskA"], {
      env: {},
      createToolkit: () => createFakeToolkit(),
    });
    logged = [];

    expect(await runCli(["--list-runs", "--root", root], { env: {} })).toBe(0);
    const runLine = /^ {2}\d{8}_\d{6} {2}completed {2}OK 1 {2}SKIP 1 {2}FAIL 0$/;
    expect(logged.filter((line) => runLine.test(line))).toHaveLength(1);
  });
});
