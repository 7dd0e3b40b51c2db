import { describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  auxStrategies,
  pickKeywordMatch,
  resolveFirst,
  resolveInputs,
  type ResolverStrategy,
} from "./input-resolver.js";

const keywords = { apKeywords: ["ap", "blipa"], paKeywords: ["pa", "blipb"] };

const touch = async (root: string, relative: string): Promise<string> => {
  const filePath = path.join(root, relative);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, "");
  return filePath;
};

const makeRoot = async (): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), "blipflow-resolve-"));

describe("resolveInputs", () => {
  it("resolves canonical names for a sessionless subject", async () => {
    const root = await makeRoot();
    const bold = await touch(root, "sub-01/func/sub-01_task-rest_bold.nii.gz");
    const ap = await touch(root, "sub-01/fmap/sub-01_dir-ap_task-rest_epi.nii.gz");
    const pa = await touch(root, "sub-01/fmap/sub-01_dir-pa_task-rest_epi.nii");

    const task = { subjectId: "sub-01", sessionId: null, runLabel: "rest" };
    const inputs = await resolveInputs(root, task, keywords);

    expect(inputs).toEqual({
      primarySeriesPath: bold,
      auxImageAPath: ap,
      auxImageBPath: pa,
      auxSearchDir: path.join(root, "sub-01", "fmap"),
    });
  });

  it("prefers the uncompressed variant when both exist", async () => {
    const root = await makeRoot();
    const plain = await touch(root, "sub-01/ses-1/func/sub-01_ses-1_task-rest_bold.nii");
    await touch(root, "sub-01/ses-1/func/sub-01_ses-1_task-rest_bold.nii.gz");

    const task = { subjectId: "sub-01", sessionId: "ses-1", runLabel: "rest" };
    const inputs = await resolveInputs(root, task, keywords);

    expect(inputs?.primarySeriesPath).toBe(plain);
  });

  it("returns null without a primary series", async () => {
    const root = await makeRoot();
    await touch(root, "sub-01/fmap/sub-01_dir-ap_task-rest_epi.nii.gz");

    const task = { subjectId: "sub-01", sessionId: null, runLabel: "rest" };
    expect(await resolveInputs(root, task, keywords)).toBeNull();
  });

  it("falls back to a keyword scan and resolves each side independently", async () => {
    const root = await makeRoot();
    await touch(root, "sub-02/ses-visit1/func/sub-02_ses-visit1_task-taskB_bold.nii.gz");
    await touch(root, "sub-02/ses-visit1/fmap/sub-02_ses-visit1_acq-BLIPB_long_epi.nii.gz");
    const shortB = await touch(root, "sub-02/ses-visit1/fmap/sub-02_PA_epi.nii.gz");
    await touch(root, "sub-02/ses-visit1/fmap/PA.json");

    const task = { subjectId: "sub-02", sessionId: "ses-visit1", runLabel: "taskB" };
    const first = await resolveInputs(root, task, keywords);
    const second = await resolveInputs(root, task, keywords);

    expect(first?.auxImageAPath).toBeNull();
    expect(first?.auxImageBPath).toBe(shortB);
    expect(second).toEqual(first);
  });

  it("leaves both sides unresolved when the fmap directory is absent", async () => {
    const root = await makeRoot();
    await touch(root, "sub-03/func/sub-03_task-rest_bold.nii");

    const task = { subjectId: "sub-03", sessionId: null, runLabel: "rest" };
    const inputs = await resolveInputs(root, task, keywords);

    expect(inputs?.auxImageAPath).toBeNull();
    expect(inputs?.auxImageBPath).toBeNull();
    expect(inputs?.auxSearchDir).toBe(path.join(root, "sub-03", "fmap"));
  });
});

describe("pickKeywordMatch", () => {
  it("chooses the shortest name, then name order", () => {
    expect(
      pickKeywordMatch(["x_blipa_epi.nii.gz", "ap_b.nii", "ap_a.nii", "AP.json"], ["ap", "blipa"])
    ).toBe("ap_a.nii");
  });

  it("matches case-insensitively and ignores non-image files", () => {
    expect(pickKeywordMatch(["sub-01_BlipA.nii.gz"], ["blipa"])).toBe("sub-01_BlipA.nii.gz");
    expect(pickKeywordMatch(["ap.json", "ap.txt"], ["ap"])).toBeNull();
  });
});

describe("resolveFirst", () => {
  it("stops at the first strategy that finds a file", async () => {
    const calls: string[] = [];
    const strategy = (name: string, result: string | null): ResolverStrategy => ({
      name,
      resolve: async () => {
        calls.push(name);
        return result;
      },
    });

    const found = await resolveFirst(
      [strategy("one", null), strategy("two", "/b.nii"), strategy("three", "/c.nii")],
      { root: "/", task: { subjectId: "sub-01", sessionId: null, runLabel: "rest" } }
    );

    expect(found).toEqual({ path: "/b.nii", strategy: "two" });
    expect(calls).toEqual(["one", "two"]);
  });

  it("reports unreadable fmap paths to the task logger", async () => {
    const root = await makeRoot();
    const task = { subjectId: `sub-${"x".repeat(300)}`, sessionId: null, runLabel: "rest" };
    const logger = { warn: vi.fn() };
    const consoleWarn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const found = await resolveFirst(auxStrategies("A", keywords), { root, task, logger });

    expect(found).toBeNull();
    expect(logger.warn.mock.calls.map(([message]) => message)).toEqual([
      "stat failed",
      "stat failed",
      "fmap listing failed",
    ]);
    expect(logger.warn).toHaveBeenLastCalledWith("fmap listing failed", {
      path: path.join(root, task.subjectId, "fmap"),
      error: expect.stringContaining("ENAMETOOLONG"),
    });
    expect(consoleWarn).not.toHaveBeenCalled();
    consoleWarn.mockRestore();
  });

  it("orders canonical names ahead of the keyword scan", () => {
    expect(auxStrategies("A", keywords).map((strategy) => strategy.name)).toEqual([
      "canonical-dir-ap",
      "keyword-scan",
    ]);
    expect(auxStrategies("B", keywords)[0]?.name).toBe("canonical-dir-pa");
  });
});
