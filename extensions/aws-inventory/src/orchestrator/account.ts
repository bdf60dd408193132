/**
 * Account Orchestrator
 *
 * Entry point of a scan: verifies credentials, resolves regions, runs the
 * global collectors once and every region under the region concurrency cap,
 * then assembles the account report.
 */

import { GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import { DescribeRegionsCommand } from "@aws-sdk/client-ec2";
import { createClientPool, type AwsClientFactory, type AwsClientPool } from "../clients/pool.js";
import type { GlobalScope, ScanContext } from "../collectors/context.js";
import { createDefaultRegistry, type CollectorRegistry } from "../collectors/registry.js";
import { mapWithConcurrency } from "../concurrency.js";
import type { ScanConfig } from "../config.js";
import { CredentialsError, ScanAbortedError, formatErrorMessage, isAbortError, toScanIssue } from "../errors.js";
import { silentLogger, type InventoryLogger } from "../logger.js";
import { noopProgress, type ProgressReporter } from "../progress.js";
import type { AccountReport, Collections, GlobalToken, RegionReport, ScanIssue } from "../types.js";
import { RESOURCE_TYPE_TOKENS } from "../types.js";
import { mergeOutcome, runCollector, scopeStatus } from "./collect.js";
import { failedRegion, scanRegion } from "./region.js";

/** Regions scanned when DescribeRegions is unavailable. */
export const DEFAULT_REGIONS: readonly string[] = [
  "us-east-1",
  "us-east-2",
  "us-west-1",
  "us-west-2",
  "eu-west-1",
  "eu-west-2",
  "eu-central-1",
  "ap-northeast-1",
  "ap-southeast-1",
  "ap-southeast-2",
];

const DEFAULT_ENRICHMENT_CONCURRENCY = 8;

export type AccountScanOptions = {
  config: ScanConfig;
  /** Shared client pool; one is created (and destroyed) per scan when omitted. */
  pool?: AwsClientPool;
  /** Client factory for a scan-owned pool. */
  clientFactory?: AwsClientFactory;
  registry?: CollectorRegistry;
  logger?: InventoryLogger;
  signal?: AbortSignal;
  /** Progress line over the resolved regions. */
  progress?: (totalRegions: number) => ProgressReporter;
  enrichmentConcurrency?: number;
  now?: () => Date;
};

export class AccountScanner {
  private readonly config: ScanConfig;
  private readonly registry: CollectorRegistry;
  private readonly logger: InventoryLogger;
  private readonly now: () => Date;

  constructor(private readonly options: AccountScanOptions) {
    this.config = options.config;
    this.registry = options.registry ?? createDefaultRegistry();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Scan the account.
   *
   * @throws CredentialsError when the caller identity cannot be verified
   * @throws ScanAbortedError when interrupted before the account is known
   */
  async scan(): Promise<AccountReport> {
    const ownsPool = !this.options.pool;
    const pool = this.options.pool ?? createClientPool({
      profile: this.config.profile,
      maxAttempts: this.config.maxAttempts,
      factory: this.options.clientFactory,
    });

    try {
      return await this.run(pool);
    } finally {
      if (ownsPool) {
        this.logger.debug(`Releasing ${pool.size} SDK client(s)`);
        pool.destroy();
      }
    }
  }

  private async run(pool: AwsClientPool): Promise<AccountReport> {
    const { signal } = this.options;
    const startedAt = this.now().toISOString();
    const homeRegion = this.config.homeRegion;

    const accountId = await this.verifyCredentials(pool, homeRegion);
    this.logger.info(`Account ${accountId}`);

    const accountIssues: ScanIssue[] = [];
    const regions = await this.resolveRegions(pool, homeRegion, accountIssues);
    const excluded = RESOURCE_TYPE_TOKENS.filter((token) => this.config.excluded.has(token));
    this.logger.info(`Scanning ${regions.length} region(s)${excluded.length ? `, excluding ${excluded.join(", ")}` : ""}`);

    const context: ScanContext = {
      pool,
      excluded: this.config.excluded,
      logger: this.logger,
      signal,
      metricsLookbackDays: this.config.metricsLookbackDays,
      enrichmentConcurrency: this.options.enrichmentConcurrency ?? DEFAULT_ENRICHMENT_CONCURRENCY,
      now: this.now,
    };

    // Global resources
    const globalScope: GlobalScope = { ...context, logger: this.logger.child("global"), region: homeRegion };
    const globalOutcomes = await Promise.all(
      this.registry.global(context.excluded).map((collector) => runCollector(collector, globalScope, globalScope.logger)),
    );
    const global: Collections<GlobalToken> = {};
    const globalIssues: ScanIssue[] = [];
    for (const outcome of globalOutcomes) {
      mergeOutcome(global, outcome);
      globalIssues.push(...outcome.issues);
    }
    const globalStatus = scopeStatus(globalIssues, globalOutcomes);

    // Regions
    const progress = this.options.progress?.(regions.length) ?? noopProgress;
    const settled = await mapWithConcurrency(
      regions,
      this.config.regionConcurrency,
      async (region) => {
        try {
          return await scanRegion(region, { context, registry: this.registry, vpcConcurrency: this.config.vpcConcurrency });
        } finally {
          progress.tick();
        }
      },
      signal,
    );
    progress.done();

    const regionReports: Record<string, RegionReport> = {};
    for (const task of settled) {
      if (task.status === "fulfilled") {
        regionReports[task.item] = task.value;
      } else if (task.status === "rejected") {
        this.logger.error(`${task.item}: ${formatErrorMessage(task.reason)}`);
        regionReports[task.item] = failedRegion(task.item, toScanIssue("region", task.reason));
      } else {
        regionReports[task.item] = failedRegion(
          task.item,
          toScanIssue("region", new ScanAbortedError(`scanning ${task.item}`), { kind: "aborted" }),
        );
      }
    }

    const aborted = signal?.aborted ?? false;
    if (aborted) {
      accountIssues.push({ kind: "aborted", collector: "scan", message: "Scan interrupted; the document is incomplete" });
    }

    const status = scopeStatus(accountIssues, [], [
      globalStatus,
      ...Object.values(regionReports).map((report) => report.status),
    ]);

    return {
      accountId,
      startedAt,
      finishedAt: this.now().toISOString(),
      regions,
      excluded,
      aborted,
      global,
      globalStatus,
      regionReports,
      status,
    };
  }

  private async verifyCredentials(pool: AwsClientPool, region: string): Promise<string> {
    let account: string | undefined;
    try {
      const sts = pool.get("sts", region);
      const identity = await sts.send(new GetCallerIdentityCommand({}), { abortSignal: this.options.signal });
      account = identity.Account;
    } catch (err) {
      if (isAbortError(err) || this.options.signal?.aborted) throw new ScanAbortedError("sts:GetCallerIdentity");
      throw new CredentialsError(`Unable to verify AWS credentials: ${formatErrorMessage(err)}`, { cause: err });
    }
    if (!account) {
      throw new CredentialsError("GetCallerIdentity returned no account id");
    }
    return account;
  }

  /**
   * Caller's list, or every enabled region; `excludeRegions` applied after.
   */
  private async resolveRegions(pool: AwsClientPool, homeRegion: string, issues: ScanIssue[]): Promise<string[]> {
    let regions: string[];
    if (this.config.regions) {
      regions = [...new Set(this.config.regions)];
    } else {
      try {
        const ec2 = pool.get("ec2", homeRegion);
        const response = await ec2.send(new DescribeRegionsCommand({}), { abortSignal: this.options.signal });
        regions = (response.Regions ?? [])
          .filter((region) => region.OptInStatus !== "not-opted-in")
          .flatMap((region) => (region.RegionName ? [region.RegionName] : []))
          .sort();
      } catch (err) {
        const issue = toScanIssue("regions", err, { operation: "ec2:DescribeRegions" });
        this.logger.warn(`Region discovery failed, using default regions: ${issue.message}`);
        issues.push(issue);
        regions = [...DEFAULT_REGIONS];
      }
    }

    const skip = new Set(this.config.excludeRegions);
    return regions.filter((region) => !skip.has(region));
  }
}

/**
 * Scan an account with a one-off scanner.
 */
export function scanAccount(options: AccountScanOptions): Promise<AccountReport> {
  return new AccountScanner(options).scan();
}
