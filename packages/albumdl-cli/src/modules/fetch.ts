import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { basename, join, resolve } from "path";
import { getContext } from "../lib/cli-context.js";
import {
  DOWNLOAD_LIMITS,
  loadConfig,
  type DownloadLimit,
  type ResolvedConfig,
} from "../lib/config.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { createApiClient, createAlbumLookup } from "../lib/api-client.js";
import { createFetchDownloadService, createProcessSignalHandler } from "../lib/adapters/index.js";
import type {
  AlbumLookup,
  DelayFn,
  DownloadService,
  SignalHandler,
  TimerService,
} from "../lib/ports/index.js";
import { resolveReference, type AlbumReference } from "../lib/reference.js";
import { fetchCatalog, type AlbumCatalog } from "../lib/catalog.js";
import {
  buildPlan,
  inspectDirectory,
  planFromListing,
  summarizePlan,
  type FetchPlan,
} from "../lib/reconciler.js";
import {
  execute,
  isSuccessful,
  type ExecutionReport,
  type TransferOutcome,
} from "../lib/executor.js";
import { withRetry } from "../lib/retry.js";
import { createSpinner, progressText } from "../lib/spinner.js";
import { outputError, outputSuccess, planToJson, reportToJson } from "../lib/json-output.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { invalidOption, unknownError } from "../lib/errors/catalog.js";
import { isCLIError } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FetchCommandOptions {
  outputDir?: string;
  concurrency?: string;
  config?: string;
  dryRun?: boolean;
}

/** Settings for one run of the pipeline. */
export interface FetchSettings {
  /** Directory the album directory is created in */
  outputRoot: string;
  concurrency: number;
  retryAttempts: number;
  retryDelayMs: number;
  dryRun: boolean;
}

/** Callbacks for progress display between pipeline stages. */
export interface FetchHooks {
  onCatalog?: (catalog: AlbumCatalog) => void;
  onPlan?: (plan: FetchPlan) => void;
  onOutcome?: (outcome: TransferOutcome) => void;
}

export interface FetchDeps {
  lookup: AlbumLookup;
  download: DownloadService;
  logger: Logger;
  signal?: AbortSignal;
  timers?: TimerService;
  delay?: DelayFn;
  hooks?: FetchHooks;
}

export interface FetchAlbumResult {
  reference: AlbumReference;
  catalog: AlbumCatalog;
  plan: FetchPlan;
  /** Absent on a dry run */
  report?: ExecutionReport;
}

/**
 * Services the command talks to; replaced in tests.
 */
export interface FetchServices {
  lookup: AlbumLookup;
  download: DownloadService;
  signalHandler: SignalHandler;
}

export type FetchServicesFactory = (config: ResolvedConfig, logger: Logger) => FetchServices;

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Resolve, list, reconcile and download one album.
 *
 * Errors before the plan exists (bad reference, unknown album, failed or
 * malformed listing) reject. Errors of single transfers only show up in
 * the returned report.
 */
export async function fetchAlbum(
  input: string,
  settings: FetchSettings,
  deps: FetchDeps
): Promise<FetchAlbumResult> {
  const { logger, hooks = {} } = deps;

  const reference = resolveReference(input);
  const log = logger.child({ album: reference.id });

  const catalog = await withRetry(
    () => fetchCatalog(deps.lookup, reference, { logger: log }),
    {
      retryAttempts: settings.retryAttempts,
      retryDelayMs: settings.retryDelayMs,
      delay: deps.delay,
      logger: log,
      signal: deps.signal,
    }
  );
  hooks.onCatalog?.(catalog);

  const directory = join(settings.outputRoot, reference.id);

  if (settings.dryRun) {
    const plan = planFromListing(directory, catalog, await inspectDirectory(directory));
    hooks.onPlan?.(plan);
    return { reference, catalog, plan };
  }

  const plan = await buildPlan(directory, catalog);
  hooks.onPlan?.(plan);
  log.info("Plan built", { directory, ...summarizePlan(plan) });

  const report = await execute(plan, {
    download: deps.download,
    concurrency: settings.concurrency,
    retryAttempts: settings.retryAttempts,
    retryDelayMs: settings.retryDelayMs,
    logger: log,
    signal: deps.signal,
    timers: deps.timers,
    onOutcome: hooks.onOutcome,
  });

  return { reference, catalog, plan, report };
}

// ---------------------------------------------------------------------------
// Output Formatting
// ---------------------------------------------------------------------------

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}

/**
 * Human-readable plan for --dry-run.
 */
export function formatPlan(plan: FetchPlan): string[] {
  const summary = summarizePlan(plan);
  const lines = [
    chalk.bold(`${plan.directory}`),
    `${summary.total} files: ${summary.skip} already complete, ${summary.fetch} to download`,
  ];

  if (plan.entries.length === 0) return lines;

  const table = new CliTable3({
    head: [chalk.cyan("File"), chalk.cyan("Size"), chalk.cyan("Action")],
  });
  for (const entry of plan.entries) {
    const action =
      entry.action === "skip"
        ? chalk.gray("skip")
        : entry.reason === "size-mismatch"
          ? chalk.yellow(`fetch (${formatBytes(entry.localSize ?? 0)} on disk)`)
          : "fetch";
    table.push([basename(entry.path), formatBytes(entry.file.expectedSize), action]);
  }
  lines.push(table.toString());
  return lines;
}

/**
 * Human-readable run report: counts, then failures in position order.
 */
export function formatReport(directory: string, report: ExecutionReport): string[] {
  const failed = report.failures.length;
  const counts = `${report.total} files: ${report.skipped} skipped, ${report.succeeded} downloaded, ${failed} failed`;
  const lines = [
    failed === 0 ? chalk.green(`✓ ${directory}`) : chalk.red(`✗ ${directory}`),
    counts,
  ];

  if (failed > 0) {
    const table = new CliTable3({
      head: [chalk.cyan("#"), chalk.cyan("File"), chalk.cyan("Error"), chalk.cyan("Cause")],
    });
    for (const failure of report.failures) {
      table.push([
        String(failure.file.position + 1),
        basename(failure.path),
        failure.error.code,
        failure.error.message,
      ]);
    }
    lines.push(table.toString());
    lines.push(chalk.gray("Run the same command again to retry the failed files."));
  }

  return lines;
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export function parseConcurrency(value: string): number {
  const { min, max } = DOWNLOAD_LIMITS.concurrency;
  const n = Number(value);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw invalidOption("concurrency", `"${value}" is not a whole number between ${min} and ${max}`);
  }
  return n;
}

/**
 * Reject a --timeout or --retry override outside the bounds a config file
 * would be held to.
 */
export function checkOverride(
  optionName: string,
  value: number | undefined,
  { min, max }: DownloadLimit
): number | undefined {
  if (value !== undefined && (value < min || value > max)) {
    throw invalidOption(optionName, `${value} is not between ${min} and ${max}`);
  }
  return value;
}

export const defaultFetchServices: FetchServicesFactory = (config, logger) => ({
  lookup: createAlbumLookup(
    createApiClient({
      baseUrl: config.apiBaseUrl,
      clientId: config.clientId,
      timeoutMs: config.timeoutMs,
      logger: logger.child({ component: "api" }),
    }),
    config
  ),
  download: createFetchDownloadService({ timeoutMs: config.timeoutMs }),
  signalHandler: createProcessSignalHandler(),
});

/**
 * Run the fetch command. Sets `process.exitCode` to 1 when the run could
 * not start or any file failed.
 */
export async function runFetchCommand(
  album: string,
  options: FetchCommandOptions,
  createServices: FetchServicesFactory = defaultFetchServices
): Promise<void> {
  const context = getContext();
  const spinner = createSpinner();
  let signalHandler: SignalHandler | undefined;

  try {
    const { config } = loadConfig(options.config, {
      concurrency: options.concurrency !== undefined ? parseConcurrency(options.concurrency) : undefined,
      outputDir: options.outputDir,
      timeoutMs: checkOverride("timeout", context.timeout, DOWNLOAD_LIMITS.timeoutMs),
      retryAttempts: checkOverride("retry", context.retry, DOWNLOAD_LIMITS.retryAttempts),
      clientId: context.clientId,
    });

    const logger = createLogger({ level: config.logLevel, json: config.logJson });
    const services = createServices(config, logger);
    signalHandler = services.signalHandler;

    const controller = new AbortController();
    let done = 0;
    let failed = 0;
    let toFetch = 0;

    spinner.start("Retrieving album listing");
    const running = fetchAlbum(
      album,
      {
        outputRoot: resolve(config.outputDir ?? "."),
        concurrency: config.concurrency,
        retryAttempts: config.retryAttempts,
        retryDelayMs: config.retryDelayMs,
        dryRun: options.dryRun ?? false,
      },
      {
        lookup: services.lookup,
        download: services.download,
        logger,
        signal: controller.signal,
        hooks: {
          onCatalog: (catalog) => {
            spinner.text = `Found ${catalog.files.length} files in ${catalog.kind} ${catalog.id}`;
          },
          onPlan: (plan) => {
            toFetch = summarizePlan(plan).fetch;
            spinner.text = progressText(0, toFetch, 0);
          },
          onOutcome: (outcome) => {
            done++;
            if (outcome.status === "failed") failed++;
            spinner.text = progressText(done, toFetch, failed);
          },
        },
      }
    );

    services.signalHandler.onShutdown(async () => {
      spinner.warn("Interrupted; removing partial files");
      controller.abort();
      await Promise.allSettled([running]);
    });

    const result = await running;
    const albumJson = { id: result.reference.id, kind: result.reference.kind };

    if (!result.report) {
      spinner.stop();
      if (context.json) {
        outputSuccess(planToJson(albumJson, result.plan));
      } else {
        for (const line of formatPlan(result.plan)) console.log(line);
      }
      return;
    }

    const report = result.report;
    if (isSuccessful(report)) {
      spinner.succeed("Album complete");
    } else {
      spinner.fail(`${report.failures.length} of ${report.total} files failed`);
      process.exitCode = 1;
    }

    if (context.json) {
      outputSuccess(reportToJson(albumJson, result.plan.directory, report));
    } else {
      for (const line of formatReport(result.plan.directory, report)) console.log(line);
    }
  } catch (error) {
    spinner.fail("Fetch failed");
    if (context.json) {
      outputError(isCLIError(error) ? error : unknownError(error));
    } else {
      renderUnknownError(error);
    }
    process.exitCode = 1;
  } finally {
    signalHandler?.removeAll();
  }
}

export function registerFetchCommands(
  program: Command,
  createServices: FetchServicesFactory = defaultFetchServices
): void {
  program
    .command("fetch", { isDefault: true })
    .description("Download every file of an album or gallery, skipping files already complete")
    .argument("<album>", "Album or gallery id, or its full URL")
    .option("-o, --output-dir <dir>", "Directory to create the album directory in (default: current directory)")
    .option("-c, --concurrency <n>", "Number of files downloaded at once")
    .option("--config <path>", "Use this config file instead of the user and system ones")
    .option("--dry-run", "Show which files would be downloaded, without downloading")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("How it resumes:")}
  ${chalk.yellow("•")} Files are named 01.jpg, 02.png, ... in album order
  ${chalk.yellow("•")} A file whose size matches the listing is skipped
  ${chalk.yellow("•")} Downloads land in a hidden .part file and are renamed when complete

${chalk.bold.cyan("Examples:")}
  albumdl vNOUshX                                   ${chalk.gray("Download into ./vNOUshX")}
  albumdl https://imgur.com/a/vNOUshX -o ~/Pictures ${chalk.gray("Download into ~/Pictures/vNOUshX")}
  albumdl https://imgur.com/gallery/vNOUshX -c 4    ${chalk.gray("Four downloads at once")}
  albumdl vNOUshX --dry-run                         ${chalk.gray("Show what would be downloaded")}
`
    )
    .action((album: string, options: FetchCommandOptions) =>
      runFetchCommand(album, options, createServices)
    );
}
