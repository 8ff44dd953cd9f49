import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import { stringify } from "yaml";
import {
  loadConfig,
  loadConfigFile,
  loadStorageEnv,
  toStorageConfig,
  CONFIG_DEFAULTS,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
  type ConfigFile,
  type ResolvedConfig,
} from "../lib/config.js";
import { createNoopLogger, errorMessage } from "../lib/logger.js";

// ---------------------------------------------------------------------------
// Settings Template
// ---------------------------------------------------------------------------

const SETTINGS_TEMPLATE = `# bucket-fetch settings
#
# Read from ${SYSTEM_CONFIG_PATH}, then ${USER_CONFIG_PATH}.
# Command-line flags win over both; keys left out keep the values below.

transfer:
  workers: ${CONFIG_DEFAULTS.workers}  # parallel connections, 1 to 32
  # mark-failed, or leave-in-flight to report failed downloads as incomplete
  failurePolicy: ${CONFIG_DEFAULTS.failurePolicy}
  progressIntervalMs: ${CONFIG_DEFAULTS.progressIntervalMs}
  pollTimeoutMs: ${CONFIG_DEFAULTS.pollTimeoutMs}  # idle wait between shutdown checks
  joinTimeoutMs: ${CONFIG_DEFAULTS.joinTimeoutMs}  # grace period per connection on stop

storage:
  # SPACES_NAME, ACCESS_KEY, SECRET_KEY, REGION_NAME and ENDPOINT, one per line
  configPath: ${CONFIG_DEFAULTS.storageConfigPath}

logging:
  level: info  # debug, info, warn or error
  json: false
`;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Lay resolved settings out the way the settings file nests them, so `show`
 * output can be pasted back into a file.
 */
export function toSettingsDocument(config: ResolvedConfig): ConfigFile {
  return {
    transfer: {
      workers: config.workers,
      failurePolicy: config.failurePolicy,
      progressIntervalMs: config.progressIntervalMs,
      pollTimeoutMs: config.pollTimeoutMs,
      joinTimeoutMs: config.joinTimeoutMs,
    },
    storage: { configPath: config.storageConfigPath },
    logging: { level: config.logLevel, json: config.logJson },
  };
}

function presence(path: string): string {
  return existsSync(path) ? chalk.green("present") : chalk.gray("absent");
}

/** Returns the number of problems found with the credentials file */
function checkStorageCredentials(explicitPath: string | undefined): number {
  let path: string = CONFIG_DEFAULTS.storageConfigPath;
  try {
    path = loadConfig(explicitPath).config.storageConfigPath;
    if (!existsSync(path)) {
      console.error(chalk.red(`✗ ${path}: storage credentials file not found`));
      return 1;
    }
    const storage = toStorageConfig(loadStorageEnv(path, createNoopLogger()));
    console.log(chalk.green(`✓ ${path} (bucket ${storage.bucket})`));
    return 0;
  } catch (error) {
    console.error(chalk.red(`✗ ${path}: ${errorMessage(error)}`));
    return 1;
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Inspect and create bucket-fetch settings");

  config
    .command("init")
    .description("Write a commented settings template")
    .option("-g, --global", `Write the system-wide file at ${SYSTEM_CONFIG_PATH}`)
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(
          chalk.yellow(`${targetPath} already exists; edit it or remove it before running init again.`)
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, SETTINGS_TEMPLATE, "utf-8");
        console.log(chalk.green(`Wrote settings template to ${targetPath}`));
      } catch (error) {
        console.error(chalk.red(`Could not write ${targetPath}: ${errorMessage(error)}`));
        if (options.global) {
          console.error(chalk.gray(`Writing under ${dirname(SYSTEM_CONFIG_PATH)} usually needs root.`));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Check the settings files and the storage credentials they point at")
    .option("-c, --config <path>", "Check this settings file instead of the default locations")
    .action((options: { config?: string }) => {
      const paths = options.config ? [options.config] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];
      let problems = 0;

      for (const path of paths) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`✗ ${path}: no such file`));
            problems++;
          } else {
            console.log(chalk.gray(`- ${path} (absent)`));
          }
          continue;
        }

        try {
          loadConfigFile(path);
          console.log(chalk.green(`✓ ${path}`));
        } catch (error) {
          console.error(chalk.red(`✗ ${path}: ${errorMessage(error)}`));
          problems++;
        }
      }

      // Credentials are only located through settings that parsed.
      if (problems === 0) {
        problems += checkStorageCredentials(options.config);
      }

      if (problems > 0) {
        console.error(chalk.red(`${problems} problem(s) found.`));
        process.exitCode = 1;
      } else {
        console.log(chalk.green("Ready to download."));
      }
    });

  config
    .command("show")
    .description("Print the effective settings as YAML")
    .option("-c, --config <path>", "Settings file to use")
    .option("--json", "Print JSON with the files that contributed")
    .action((options: { config?: string; json?: boolean }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);
        const settings = toSettingsDocument(resolved);

        if (options.json) {
          console.log(JSON.stringify({ sources, settings }, null, 2));
          return;
        }

        console.log(
          chalk.gray(`# from ${sources.length > 0 ? sources.join(", ") : "built-in defaults"}`)
        );
        console.log(stringify(settings).trimEnd());
      } catch (error) {
        console.error(chalk.red(`Cannot resolve settings: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("List where settings and credentials are read from")
    .action(() => {
      let storagePath: string | undefined;
      try {
        storagePath = loadConfig().config.storageConfigPath;
      } catch (error) {
        console.error(chalk.yellow(`Settings could not be read: ${errorMessage(error)}`));
      }

      const rows: Array<[label: string, path: string | undefined]> = [
        ["system settings", SYSTEM_CONFIG_PATH],
        ["user settings", USER_CONFIG_PATH],
        ["storage credentials", storagePath],
      ];

      for (const [label, path] of rows) {
        const where = path === undefined ? chalk.gray("unknown") : `${path}  ${presence(path)}`;
        console.log(`${label.padEnd(20)}${where}`);
      }
    });
}
