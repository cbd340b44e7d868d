import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { isCLIError } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# albumdl configuration
# Place at ~/.config/albumdl/config.yaml (user) or /etc/albumdl/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags and ALBUMDL_* environment variables
# 2. User config (~/.config/albumdl/config.yaml)
# 3. System config (/etc/albumdl/config.yaml)
# 4. Built-in defaults

download:
  # Files downloaded at once (1-16)
  concurrency: 2

  # Extra attempts for a failed listing request or file transfer
  retryAttempts: 2

  # Base delay between retries in ms (doubled after each attempt)
  retryDelayMs: 1000

  # Time allowed until a server answers, in ms
  timeoutMs: 30000

  # Directory album directories are created in (default: current directory)
  # outputDir: "/path/to/albums"

api:
  # Client id sent with listing requests (or set ALBUMDL_CLIENT_ID)
  # clientId: "<your-client-id>"

  # baseUrl: "https://api.imgur.com"
  # albumPath: "/post/v1/albums/{id}"
  # galleryPath: "/post/v1/posts/{id}"

logging:
  # Log level: debug, info, warn, error
  level: warn

  # Output JSON log lines on stderr
  json: false
`;

function describeError(error: unknown): string {
  if (isCLIError(error) && error.details) {
    return `${error.message}\n${error.details}`;
  }
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage albumdl configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/albumdl/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${describeError(error)}`)
        );
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${describeError(error)}`));
          hasErrors = true;
        }
      }

      if (hasErrors) {
        process.exitCode = 1;
      } else if (!foundAny) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'albumdl config init' to create one.`));
      } else {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));
        console.log(
          chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`)
        );

        console.log();
        console.log(chalk.bold("Download:"));
        console.log(`  concurrency:    ${resolved.concurrency}`);
        console.log(`  retryAttempts:  ${resolved.retryAttempts}`);
        console.log(`  retryDelayMs:   ${resolved.retryDelayMs}`);
        console.log(`  timeoutMs:      ${resolved.timeoutMs}`);
        console.log(`  outputDir:      ${resolved.outputDir ?? "(current directory)"}`);

        console.log();
        console.log(chalk.bold("API:"));
        console.log(`  baseUrl:        ${resolved.apiBaseUrl}`);
        console.log(`  clientId:       ${resolved.clientId ? "(set)" : "(not set)"}`);
        console.log(`  albumPath:      ${resolved.albumPath}`);
        console.log(`  galleryPath:    ${resolved.galleryPath}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:          ${resolved.logLevel}`);
        console.log(`  json:           ${resolved.logJson}`);
      } catch (error) {
        console.error(
          chalk.red(`Failed to load config: ${describeError(error)}`)
        );
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      for (const [label, path] of [
        ["User config", USER_CONFIG_PATH],
        ["System config", SYSTEM_CONFIG_PATH],
      ]) {
        console.log(chalk.bold(`${label}:`));
        console.log(`  ${path}`);
        console.log(
          `  ${existsSync(path) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
        );
      }
    });
}
