export type * from "./shared/contracts.js";
export {
  CONFIG_FILE_NAME,
  loadBatchConfigFile,
  resolveBatchConfig,
  resolveLogRoot,
} from "./main/batch-config.js";
export {
  planBatch,
  runBatch,
  type BatchRunOptions,
  type BatchSummary,
} from "./main/batch-runner.js";
export { parseCliArgs, type CliParseResult } from "./main/cli-options.js";
export { loadEnv } from "./main/config.js";
export { ConfigError, DatasetScanError, TaskFailure, describeError } from "./main/errors.js";
export { createFslToolkit, type FslToolkitOptions } from "./main/fsl-toolkit.js";
export type { Toolkit, ToolchainReport } from "./main/image-toolkit.js";
export { readRunIndex, type RunIndexEntry } from "./main/run-index.js";
export { getLogRoot, getTaskLabel } from "./main/run-paths.js";
export { readLedger, tallyRecords } from "./main/status-ledger.js";
