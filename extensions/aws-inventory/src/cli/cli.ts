/**
 * AWS Inventory CLI Commands
 *
 * Registers `aws-inventory scan`: runs an account scan, writes the JSON
 * document and prints a summary.
 */

import { InvalidArgumentError, type Command } from "commander";
import type { AwsClientFactory } from "../clients/pool.js";
import { loadScanConfig, type ScanConfig } from "../config.js";
import { toDocument } from "../document.js";
import { ConfigError, CredentialsError, ScanAbortedError, formatErrorMessage } from "../errors.js";
import { createConsoleLogger, type InventoryLogger } from "../logger.js";
import { scanAccount } from "../orchestrator/account.js";
import { writeDocument } from "../output/writer.js";
import { createScanProgress } from "../progress.js";
import { formatSummary } from "../summary/format.js";
import { summarize } from "../summary/reducer.js";

// =============================================================================
// Types
// =============================================================================

export type CliContext = {
  program: Command;
  /** Builds the scan logger once `--verbose` is known. */
  createLogger?: (verbose: boolean) => InventoryLogger;
};

export type InventoryCliDeps = {
  clientFactory?: AwsClientFactory;
  write?: typeof writeDocument;
  env?: NodeJS.ProcessEnv;
  setExitCode?: (code: number) => void;
  /** Install SIGINT/SIGTERM handlers that abort the scan. */
  handleSignals?: boolean;
  showProgress?: boolean;
};

type ScanCommandOptions = {
  regions?: string[];
  exclude?: string[];
  excludeRegions?: string[];
  output?: string;
  profile?: string;
  homeRegion?: string;
  regionConcurrency?: number;
  vpcConcurrency?: number;
  maxAttempts?: number;
  metricsLookbackDays?: number;
  summary: boolean;
  verbose?: boolean;
};

export const EXIT_COMPLETE = 0;
export const EXIT_FAILURE = 1;
export const EXIT_PARTIAL = 2;

// =============================================================================
// Helpers
// =============================================================================

/** Comma-separated list; repeated flags accumulate. */
export function parseList(value: string, previous: string[] = []): string[] {
  return [
    ...previous,
    ...value
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean),
  ];
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

// =============================================================================
// CLI Registration
// =============================================================================

/**
 * Register `aws-inventory scan`.
 */
export function registerInventoryCli(ctx: CliContext, deps: InventoryCliDeps = {}): void {
  const createLogger = ctx.createLogger ?? ((verbose: boolean) => createConsoleLogger({ verbose }));
  const setExitCode = deps.setExitCode ?? ((code: number) => {
    process.exitCode = code;
  });
  const write = deps.write ?? writeDocument;

  ctx.program
    .command("scan")
    .description("Collect the account's compute and storage resources into a JSON document")
    .option("--regions <list>", "Regions to scan (default: all enabled regions)", parseList)
    .option("--exclude <tokens>", "Resource types or aliases to skip, e.g. s3,network", parseList)
    .option("--exclude-regions <list>", "Regions to drop after resolution", parseList)
    .option("-o, --output <path>", "Output file (default: aws_resource_hierarchy_<timestamp>.json)")
    .option("--profile <name>", "Shared config profile")
    .option("--home-region <region>", "Region for account-level calls")
    .option("--region-concurrency <n>", "Regions scanned at once", parseInteger)
    .option("--vpc-concurrency <n>", "VPCs scanned at once per region", parseInteger)
    .option("--max-attempts <n>", "SDK attempts per request", parseInteger)
    .option("--metrics-lookback-days <n>", "Window for S3 storage metrics", parseInteger)
    .option("--no-summary", "Skip the console summary")
    .option("-v, --verbose", "Debug logging")
    .action(async (opts: ScanCommandOptions) => {
      const logger = createLogger(opts.verbose ?? false);

      let config: ScanConfig;
      try {
        config = loadScanConfig(
          {
            regions: opts.regions,
            exclude: opts.exclude,
            excludeRegions: opts.excludeRegions,
            outputPath: opts.output,
            verbose: opts.verbose ?? false,
            profile: opts.profile,
            homeRegion: opts.homeRegion,
            regionConcurrency: opts.regionConcurrency,
            vpcConcurrency: opts.vpcConcurrency,
            maxAttempts: opts.maxAttempts,
            metricsLookbackDays: opts.metricsLookbackDays,
          },
          deps.env,
        );
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        logger.error(err.message);
        for (const issue of err.issues) logger.error(`  ${issue}`);
        setExitCode(EXIT_FAILURE);
        return;
      }

      const showProgress = (deps.showProgress ?? false) && !config.verbose;
      const controller = new AbortController();
      const onSignal = () => {
        logger.warn("Interrupted; finishing in-flight requests and writing a partial document");
        controller.abort();
      };
      if (deps.handleSignals) {
        process.once("SIGINT", onSignal);
        process.once("SIGTERM", onSignal);
      }

      try {
        const report = await scanAccount({
          config,
          clientFactory: deps.clientFactory,
          logger,
          signal: controller.signal,
          progress: (total) => createScanProgress({ total, enabled: showProgress }),
        });

        const path = await write(toDocument(report), config.outputPath);
        logger.info(`Inventory written to ${path}`);

        if (opts.summary) {
          console.log(formatSummary(summarize(report)));
        }

        setExitCode(report.status.state === "complete" ? EXIT_COMPLETE : EXIT_PARTIAL);
      } catch (err) {
        if (err instanceof ScanAbortedError) {
          logger.warn("Scan interrupted before the account was identified; no document written");
          setExitCode(EXIT_FAILURE);
          return;
        }
        if (!(err instanceof CredentialsError)) throw err;
        logger.error(formatErrorMessage(err));
        logger.error("Configure credentials through the environment, a shared profile (--profile) or an instance role.");
        setExitCode(EXIT_FAILURE);
      } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
      }
    });
}
