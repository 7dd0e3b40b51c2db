import { describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { scanDataset } from "./dataset-scanner.js";
import { DatasetScanError } from "./errors.js";

const makeDataset = async (dirs: string[]): Promise<string> => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "blipflow-scan-"));
  for (const dir of dirs) {
    await fs.mkdir(path.join(root, dir), { recursive: true });
  }
  return root;
};

describe("scanDataset", () => {
  it("expands subjects, sessions and runs in order", async () => {
    const root = await makeDataset([
      "sub-02/ses-b",
      "sub-02/ses-a",
      "sub-01/func",
      "sub-03/ses-x/func",
      "derivatives",
    ]);
    await fs.writeFile(path.join(root, "sub-04"), "not a directory");

    const tasks = await scanDataset(root, ["rest", "motor"]);

    expect(tasks).toEqual([
      { subjectId: "sub-01", sessionId: null, runLabel: "rest" },
      { subjectId: "sub-01", sessionId: null, runLabel: "motor" },
      { subjectId: "sub-02", sessionId: "ses-a", runLabel: "rest" },
      { subjectId: "sub-02", sessionId: "ses-a", runLabel: "motor" },
      { subjectId: "sub-02", sessionId: "ses-b", runLabel: "rest" },
      { subjectId: "sub-02", sessionId: "ses-b", runLabel: "motor" },
      { subjectId: "sub-03", sessionId: "ses-x", runLabel: "rest" },
      { subjectId: "sub-03", sessionId: "ses-x", runLabel: "motor" },
    ]);
  });

  it("honours custom naming patterns", async () => {
    const root = await makeDataset(["S1/visit1", "S1/anat", "S2"]);

    const tasks = await scanDataset(root, ["taskA"], {
      subjectPattern: "S*",
      sessionPattern: "visit*",
    });

    expect(tasks).toEqual([
      { subjectId: "S1", sessionId: "visit1", runLabel: "taskA" },
      { subjectId: "S2", sessionId: null, runLabel: "taskA" },
    ]);
  });

  it("fails when no subject directories exist", async () => {
    const root = await makeDataset(["derivatives", "code"]);
    await expect(scanDataset(root, ["rest"])).rejects.toBeInstanceOf(DatasetScanError);
    await expect(scanDataset(root, ["rest"])).rejects.toThrow(`No sub-* directories under`);
  });

  it("fails when the root does not exist", async () => {
    const root = path.join(os.tmpdir(), "blipflow-scan-missing", "nowhere");
    await expect(scanDataset(root, ["rest"])).rejects.toThrow(`Dataset root not found: ${root}`);
  });
});
