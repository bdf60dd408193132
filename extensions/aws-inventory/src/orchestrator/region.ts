/**
 * Region Orchestrator
 *
 * Discovers the VPCs of one region, aggregates each under the VPC
 * concurrency cap and runs the region-wide collectors alongside.
 */

import { DescribeVpcsCommand } from "@aws-sdk/client-ec2";
import type { RegionScope, ScanContext } from "../collectors/context.js";
import { createRegionLookups } from "../collectors/region-lookups.js";
import type { CollectorRegistry } from "../collectors/registry.js";
import { dedupeBy, fetchListing, listingIssues } from "../collectors/shared.js";
import { mapWithConcurrency } from "../concurrency.js";
import { ScanAbortedError, isScopeInaccessible, toScanIssue } from "../errors.js";
import type { Collections, RegionReport, RegionWideToken, ScanIssue, VpcReport } from "../types.js";
import { mergeOutcome, runCollector, scopeStatus } from "./collect.js";
import { aggregateVpc, toVpcInfo, unscannedVpc } from "./vpc.js";

const VPC_OPERATION = "ec2:DescribeVpcs";

export type RegionScanOptions = {
  context: ScanContext;
  registry: CollectorRegistry;
  vpcConcurrency: number;
};

/**
 * Report for a region whose own scan could not run.
 */
export function failedRegion(region: string, issue: ScanIssue): RegionReport {
  return { region, vpcs: {}, regionWide: {}, status: { state: "failed", issues: [issue] } };
}

export async function scanRegion(region: string, options: RegionScanOptions): Promise<RegionReport> {
  const { context, registry } = options;
  const logger = context.logger.child(region);
  const scope: RegionScope = {
    ...context,
    logger,
    region,
    lookups: createRegionLookups({
      pool: context.pool,
      region,
      logger,
      signal: context.signal,
      enrichmentConcurrency: context.enrichmentConcurrency,
    }),
  };

  const ec2 = context.pool.get("ec2", region);
  const listing = await fetchListing(scope, {
    operation: VPC_OPERATION,
    fetchPage: (NextToken, abortSignal) => ec2.send(new DescribeVpcsCommand({ NextToken }), { abortSignal }),
    items: (page) => page.Vpcs,
    nextToken: (page) => page.NextToken,
  });

  const discoveryIssues = listingIssues("vpcs", VPC_OPERATION, listing);
  if (listing.error !== undefined && !listing.truncated) {
    const [issue] = discoveryIssues;
    if (issue && (issue.kind === "aborted" || isScopeInaccessible(listing.error))) {
      logger.warn(`region skipped: ${issue.message}`);
      return failedRegion(region, issue);
    }
  }

  const infos = dedupeBy(
    listing.items.flatMap((vpc) => (vpc.VpcId ? [toVpcInfo({ ...vpc, VpcId: vpc.VpcId }, region)] : [])),
    (info) => info.vpc_id,
  );
  logger.info(`${infos.length} VPC(s)`);

  const vpcCollectors = registry.vpc(context.excluded);
  const [settled, regionWide] = await Promise.all([
    mapWithConcurrency(infos, options.vpcConcurrency, (info) => aggregateVpc(scope, info, vpcCollectors), context.signal),
    Promise.all(registry.regionWide(context.excluded).map((collector) => runCollector(collector, scope, logger))),
  ]);

  const vpcs: Record<string, VpcReport> = {};
  for (const task of settled) {
    if (task.status === "fulfilled") {
      vpcs[task.item.vpc_id] = task.value;
    } else if (task.status === "rejected") {
      vpcs[task.item.vpc_id] = unscannedVpc(region, task.item, toScanIssue("vpc", task.reason));
    } else {
      vpcs[task.item.vpc_id] = unscannedVpc(
        region,
        task.item,
        toScanIssue("vpc", new ScanAbortedError(`scanning ${task.item.vpc_id}`), { kind: "aborted" }),
      );
    }
  }

  const collections: Collections<RegionWideToken> = {};
  const issues: ScanIssue[] = [...discoveryIssues];
  for (const outcome of regionWide) {
    mergeOutcome(collections, outcome);
    issues.push(...outcome.issues);
  }

  return {
    region,
    vpcs,
    regionWide: collections,
    status: scopeStatus(
      issues,
      regionWide,
      Object.values(vpcs).map((vpc) => vpc.status),
    ),
  };
}
