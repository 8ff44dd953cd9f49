export { DownloadManager } from "./download-manager.js";
export type { DownloadManagerOptions, DownloadStats } from "./download-manager.js";
export { Task } from "./task.js";
export type { TaskState, TaskOptions } from "./task.js";
export { createContractFactory } from "./contract.js";
export type { Contract, ContractFactory } from "./contract.js";
export {
  CompletionObserver,
  ProgressObserver,
  computePercentage,
  computeRateMBps,
  formatStatus,
} from "./observer.js";
export type { Listener, Notifier, TransferView } from "./observer.js";
export { Connection, ConnectionPool } from "./connection-pool.js";
export type { ConnectionPoolOptions } from "./connection-pool.js";
export { ProgressTracker } from "./progress-tracker.js";
export type { ProgressTrackerOptions } from "./progress-tracker.js";
export { ProgressMap } from "./progress-map.js";
export { createTaskQueue } from "./task-queue.js";
export type { TaskQueue } from "./task-queue.js";
export { createLogger, createNoopLogger } from "./logger.js";
export type { Logger, LogLevel, LoggerOptions } from "./logger.js";
export {
  loadConfig,
  loadStorageEnv,
  resolveConfig,
  toStorageConfig,
  CONFIG_DEFAULTS,
} from "./config.js";
export type { FailurePolicy, ResolvedConfig, StorageConfig } from "./config.js";
export { DownloadError, isDownloadError, hasErrorCode } from "./errors/types.js";
export type { ErrorCode } from "./errors/types.js";
export * from "./adapters/index.js";
export type * from "./ports/index.js";
