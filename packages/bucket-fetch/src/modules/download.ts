import { Command } from "commander";
import chalk from "chalk";
import { join } from "path";
import { loadConfig, loadStorageEnv, toStorageConfig, type StorageConfig } from "../lib/config.js";
import { createContractFactory, type Contract, type ContractFactory } from "../lib/contract.js";
import { DownloadManager } from "../lib/download-manager.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { getOutputMode, type OutputMode } from "../lib/output/mode.js";
import type { ProgressSink, SignalHandler, StorageClientFactory } from "../lib/ports/index.js";
import {
  createLogProgressSink,
  createOraProgressSink,
  createProcessSignalHandler,
  createS3ClientFactory,
  silentProgressSink,
} from "../lib/adapters/index.js";
import { invalidOption, missingArgument } from "../lib/errors/catalog.js";
import { renderError } from "../lib/errors/renderer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadOptions {
  bucket?: string;
  outputDir: string;
  workers?: string;
  config?: string;
  storageConfig?: string;
  versionId?: string;
  json?: boolean;
  quiet?: boolean;
}

/** Collaborators swapped out in tests */
export interface DownloadDeps {
  createClientFactory?: (storage: StorageConfig, logger: Logger) => StorageClientFactory;
  signalHandler?: SignalHandler;
  sink?: ProgressSink;
  logger?: Logger;
}

export interface DownloadSummary {
  bucket: string;
  total: number;
  complete: number;
  failed: number;
  incomplete: number;
  /** Still queued when the manager stopped */
  notStarted: number;
  failures: Array<{ key: string; code: string; message: string }>;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommands(program: Command): void {
  program
    .command("download")
    .description("Download objects from an S3-compatible bucket")
    .argument("<keys...>", "Object keys to download")
    .option("-b, --bucket <name>", "Bucket name (defaults to SPACES_NAME)")
    .option("-o, --output-dir <dir>", "Directory to write objects into", ".")
    .option("-w, --workers <n>", "Number of concurrent connections")
    .option("-c, --config <path>", "Settings file to use")
    .option("-s, --storage-config <path>", "Storage credentials file")
    .option("--version-id <id>", "Object version to fetch")
    .option("--json", "Output JSON")
    .option("--quiet", "Hide progress output")
    .action(async (keys: string[], options: DownloadOptions) => {
      try {
        const summary = await runDownload(keys, options);
        const unfinished = summary.failed + summary.incomplete + summary.notStarted;
        // a shutdown signal has already set its own code
        if (unfinished > 0 && process.exitCode === undefined) {
          process.exitCode = 1;
        }
      } catch (error) {
        renderError(error, options.json ? "json" : "text");
        process.exitCode = 1;
      }
    });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Parse the --workers flag. Undefined leaves the setting to the config files.
 */
export function parseWorkers(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;

  const workers = Number(value);
  if (!Number.isInteger(workers) || workers < 1 || workers > 32) {
    throw invalidOption("workers", `Expected an integer between 1 and 32, got "${value}"`);
  }
  return workers;
}

/**
 * One contract per key, written to `<outputDir>/<key>`.
 */
export function buildContracts(
  factory: ContractFactory,
  keys: string[],
  outputDir: string,
  options: Record<string, string> = {}
): Contract[] {
  return keys.map((key) => factory.create(key, join(outputDir, key), options));
}

function sinkFor(mode: OutputMode, logger: Logger): ProgressSink {
  switch (mode) {
    case "tui":
      return createOraProgressSink();
    case "static":
    case "json":
      return createLogProgressSink(logger.child({ component: "progress" }));
    case "quiet":
      return silentProgressSink;
  }
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/**
 * Resolve settings, submit one contract per key and wait until every
 * download has settled or a shutdown signal stops the manager.
 */
export async function runDownload(
  keys: string[],
  options: DownloadOptions,
  deps: DownloadDeps = {}
): Promise<DownloadSummary> {
  if (keys.length === 0) {
    throw missingArgument("keys", "Pass at least one object key to download");
  }

  const { config } = loadConfig(options.config, {
    workers: parseWorkers(options.workers),
    storageConfigPath: options.storageConfig,
    logJson: options.json,
  });

  const logger = deps.logger ?? createLogger({ level: config.logLevel, json: config.logJson });
  const storage = toStorageConfig(loadStorageEnv(config.storageConfigPath, logger), options.bucket);
  const mode = getOutputMode(options);

  const createClientFactory = deps.createClientFactory ?? createS3ClientFactory;
  const manager = new DownloadManager({
    workers: config.workers,
    createClient: createClientFactory(storage, logger),
    logger,
    sink: deps.sink ?? sinkFor(mode, logger),
    pollTimeoutMs: config.pollTimeoutMs,
    joinTimeoutMs: config.joinTimeoutMs,
    progressIntervalMs: config.progressIntervalMs,
    failurePolicy: config.failurePolicy,
  });

  const requestOptions: Record<string, string> = {};
  if (options.versionId) requestOptions.VersionId = options.versionId;

  const factory = createContractFactory(storage.bucket);
  for (const contract of buildContracts(factory, keys, options.outputDir, requestOptions)) {
    manager.submit(contract);
  }

  const signals = deps.signalHandler ?? createProcessSignalHandler(logger);
  signals.onShutdown((signal) => manager.stop(signal));

  try {
    manager.start();
    await manager.waitForIdle();
    await manager.stop();
  } finally {
    signals.removeAll();
  }

  const stats = manager.getStats();
  const summary: DownloadSummary = {
    bucket: storage.bucket,
    total: stats.total,
    complete: stats.complete,
    failed: stats.failed,
    incomplete: stats.incomplete,
    notStarted: stats.pending + stats.ready,
    failures: manager
      .getTasks()
      .flatMap((task) =>
        task.error ? [{ key: task.key, code: task.error.code, message: task.error.message }] : []
      ),
  };

  printSummary(summary, mode);
  return summary;
}

function printSummary(summary: DownloadSummary, mode: OutputMode): void {
  if (mode === "json") {
    console.log(JSON.stringify(summary));
    return;
  }
  if (mode === "quiet" && summary.failed === 0 && summary.incomplete === 0) {
    return;
  }

  console.log();
  console.log(chalk.bold(`Downloaded ${summary.complete}/${summary.total} from ${summary.bucket}`));
  if (summary.failed > 0) {
    console.log(chalk.red(`  failed:      ${summary.failed}`));
  }
  if (summary.incomplete > 0) {
    console.log(chalk.yellow(`  incomplete:  ${summary.incomplete}`));
  }
  if (summary.notStarted > 0) {
    console.log(chalk.gray(`  not started: ${summary.notStarted}`));
  }
  for (const failure of summary.failures) {
    console.log(chalk.red(`  ✗ ${failure.key}: ${failure.message}`));
  }
}
