import { describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadEnv, parseEnvLine } from "./config.js";

const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), "blipflow-env-"));

describe("parseEnvLine", () => {
  it("reads plain, exported, quoted and commented values", () => {
    expect(parseEnvLine("BLIPFLOW_ROOT=/data/bids")).toEqual(["BLIPFLOW_ROOT", "/data/bids"]);
    expect(parseEnvLine('export BLIPFLOW_RUNS="rest motor"')).toEqual([
      "BLIPFLOW_RUNS",
      "rest motor",
    ]);
    expect(parseEnvLine("BLIPFLOW_WORKERS=4 # four jobs")).toEqual(["BLIPFLOW_WORKERS", "4"]);
    expect(parseEnvLine("BLIPFLOW_AP_KEYS='ap # blipa'")).toEqual([
      "BLIPFLOW_AP_KEYS",
      "ap # blipa",
    ]);
    expect(parseEnvLine("EMPTY=")).toEqual(["EMPTY", ""]);
  });

  it("ignores comments, blanks and malformed lines", () => {
    expect(parseEnvLine("# BLIPFLOW_ROOT=/x")).toBeNull();
    expect(parseEnvLine("   ")).toBeNull();
    expect(parseEnvLine("INVALIDLINE")).toBeNull();
    expect(parseEnvLine("1BAD=value")).toBeNull();
  });
});

describe("loadEnv", () => {
  it("prefers .env.local over .env and keeps variables already set", () => {
    const root = makeTempDir();
    fs.writeFileSync(path.join(root, "package.json"), "{}");
    const envPath = path.join(root, ".env");
    const localPath = path.join(root, ".env.local");
    fs.writeFileSync(envPath, "BLIPFLOW_ROOT=/data/bids\nBLIPFLOW_WORKERS=4\nBLIPFLOW_RUNS=rest\n");
    fs.writeFileSync(localPath, "BLIPFLOW_ROOT=/scratch/bids\nBLIPFLOW_LOG_LEVEL=debug\n");
    const cwd = path.join(root, "nested", "deeper");
    fs.mkdirSync(cwd, { recursive: true });

    const env: NodeJS.ProcessEnv = { BLIPFLOW_WORKERS: "2" };
    const result = loadEnv({ cwd, env });

    expect(result.loadedFiles).toEqual([localPath, envPath]);
    expect(result.appliedKeys).toEqual(["BLIPFLOW_ROOT", "BLIPFLOW_LOG_LEVEL", "BLIPFLOW_RUNS"]);
    expect(env).toEqual({
      BLIPFLOW_ROOT: "/scratch/bids",
      BLIPFLOW_WORKERS: "2",
      BLIPFLOW_RUNS: "rest",
      BLIPFLOW_LOG_LEVEL: "debug",
    });
  });

  it("reads an explicitly named env file first", () => {
    const root = makeTempDir();
    fs.writeFileSync(path.join(root, "package.json"), "{}");
    fs.writeFileSync(path.join(root, "site.env"), "BLIPFLOW_ROOT=/site/bids\n");
    fs.writeFileSync(path.join(root, ".env"), "BLIPFLOW_ROOT=/data/bids\n");

    const env: NodeJS.ProcessEnv = { BLIPFLOW_ENV_FILE: "site.env" };
    const result = loadEnv({ cwd: root, env });

    expect(result.loadedFiles).toEqual([path.join(root, "site.env"), path.join(root, ".env")]);
    expect(env.BLIPFLOW_ROOT).toBe("/site/bids");
  });

  it("skips unreadable files without a package directory", () => {
    const root = makeTempDir();
    const cwd = path.join(root, "nested");
    fs.mkdirSync(cwd, { recursive: true });
    fs.mkdirSync(path.join(cwd, ".env"));
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const env: NodeJS.ProcessEnv = {};
    const result = loadEnv({ cwd, env });

    expect(result).toEqual({ loadedFiles: [], appliedKeys: [] });
    expect(Object.keys(env)).toHaveLength(0);
    expect(warnSpy).toHaveBeenCalledOnce();
    warnSpy.mockRestore();
  });
});
