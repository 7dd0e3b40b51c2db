import fs from "node:fs";
import path from "node:path";

export type LoadEnvOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type LoadEnvResult = {
  loadedFiles: string[];
  appliedKeys: string[];
};

const ENV_LINE = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

const unquote = (raw: string): string => {
  const quote = raw[0];
  if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
    return raw.slice(1, -1);
  }
  const comment = raw.search(/\s#/);
  return (comment === -1 ? raw : raw.slice(0, comment)).trim();
};

/** `KEY=value`, optionally prefixed with `export`; blank lines and comments yield null. */
export const parseEnvLine = (line: string): [string, string] | null => {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  const match = ENV_LINE.exec(trimmed);
  if (!match) return null;
  return [match[1], unquote(match[2].trim())];
};

const findPackageDir = (startDir: string): string => {
  let current = path.resolve(startDir);
  for (;;) {
    if (fs.existsSync(path.join(current, "package.json"))) return current;
    const parent = path.dirname(current);
    if (parent === current) return path.resolve(startDir);
    current = parent;
  }
};

/**
 * Applies `BLIPFLOW_ENV_FILE`, then `.env.local`, then `.env` from the nearest package
 * directory. The first file to set a key wins, and variables already present are kept.
 */
export const loadEnv = (options: LoadEnvOptions = {}): LoadEnvResult => {
  const env = options.env ?? process.env;
  const packageDir = findPackageDir(options.cwd ?? process.cwd());
  const explicit = env.BLIPFLOW_ENV_FILE?.trim();
  const candidates = [
    ...(explicit ? [path.resolve(packageDir, explicit)] : []),
    path.join(packageDir, ".env.local"),
    path.join(packageDir, ".env"),
  ];
  const result: LoadEnvResult = { loadedFiles: [], appliedKeys: [] };

  for (const filePath of candidates) {
    if (!fs.existsSync(filePath)) continue;
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, "utf-8");
    } catch (error) {
      console.warn(`Skipping unreadable env file ${filePath}`, error);
      continue;
    }
    for (const line of raw.split(/\r?\n/)) {
      const entry = parseEnvLine(line);
      if (!entry || env[entry[0]] !== undefined) continue;
      env[entry[0]] = entry[1];
      result.appliedKeys.push(entry[0]);
    }
    result.loadedFiles.push(filePath);
  }

  return result;
};
