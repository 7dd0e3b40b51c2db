import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandResult>;

const STDERR_TAIL = 2_000;

export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, result: CommandResult) {
    const tail = result.stderr.trim().slice(-STDERR_TAIL);
    super(`${command} exited with code ${result.exitCode}${tail ? `: ${tail}` : ""}`);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = result.exitCode;
    this.stderr = result.stderr;
  }
}

/**
 * Spawns `command` without a shell and buffers its output. Resolves with any exit
 * code; rejects only when the process cannot be started.
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options?.cwd,
      env: options?.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", reject);
    child.on("close", (code, signal) => {
      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout,
        stderr,
      });
    });
  });

/** Runs a command and throws `CommandError` on a non-zero exit. */
export const runChecked = async (
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: CommandOptions
): Promise<CommandResult> => {
  const result = await runner(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandError(command, result);
  }
  return result;
};

export const commandExists = async (
  command: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<boolean> => {
  const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  for (const dir of dirs) {
    const executable = await fs.access(path.join(dir, command), fs.constants.X_OK).then(
      () => true,
      () => false
    );
    if (executable) return true;
  }
  return false;
};
