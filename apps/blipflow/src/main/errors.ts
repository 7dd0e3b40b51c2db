/** Invalid or incomplete batch configuration. Fatal before any task runs. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** The dataset root cannot be walked or holds no subjects. Fatal before any task runs. */
export class DatasetScanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetScanError";
  }
}

/** A required pipeline step failed; `reason` is the ledger-facing classification. */
export class TaskFailure extends Error {
  readonly reason: string;

  constructor(reason: string, detail?: string) {
    super(detail ? `${reason}: ${detail}` : reason);
    this.name = "TaskFailure";
    this.reason = reason;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
