import { describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CommandError, commandExists, runChecked, runCommand } from "./command-runner.js";

describe("command runner", () => {
  it("captures output and exit codes", async () => {
    const result = await runCommand(process.execPath, [
      "-e",
      "process.stdout.write('42\\n'); process.stderr.write('warn'); process.exit(3)",
    ]);

    expect(result).toEqual({ exitCode: 3, stdout: "42\n", stderr: "warn" });
  });

  it("rejects when the command cannot start", async () => {
    await expect(runCommand("blipflow-no-such-command", [])).rejects.toThrow();
  });

  it("raises CommandError on a non-zero exit", async () => {
    const runner = async () => ({ exitCode: 2, stdout: "", stderr: "bad image\n" });

    const failure = runChecked(runner, "fslmaths", ["a", "-abs", "b"]);

    await expect(failure).rejects.toBeInstanceOf(CommandError);
    await expect(failure).rejects.toThrow("fslmaths exited with code 2: bad image");
  });

  it("finds executables on PATH", async () => {
    const binDir = await fs.mkdtemp(path.join(os.tmpdir(), "blipflow-bin-"));
    const toolPath = path.join(binDir, "fslnvols");
    await fs.writeFile(toolPath, "#!/bin/sh\necho 1\n");
    await fs.chmod(toolPath, 0o755);
    await fs.writeFile(path.join(binDir, "fslval"), "not executable");

    const env = { PATH: binDir };
    expect(await commandExists("fslnvols", env)).toBe(true);
    expect(await commandExists("fslval", env)).toBe(false);
    expect(await commandExists("topup", env)).toBe(false);
    expect(await commandExists("topup", {})).toBe(false);
  });
});
