/**
 * VPC Aggregator
 *
 * Runs every active VPC-scoped collector for one VPC concurrently and merges
 * the outcomes once all of them have settled.
 */

import type { Vpc } from "@aws-sdk/client-ec2";
import type { RegionScope, VpcScope } from "../collectors/context.js";
import type { VpcCollector } from "../collectors/registry.js";
import { tagFields } from "../collectors/shared.js";
import type { Collections, ScanIssue, VpcInfo, VpcReport, VpcScopedToken } from "../types.js";
import { mergeOutcome, runCollector, scopeStatus } from "./collect.js";

export function toVpcInfo(raw: Vpc & { VpcId: string }, region: string): VpcInfo {
  return {
    resource_type: "ec2:vpc",
    vpc_id: raw.VpcId,
    region,
    ...tagFields(raw.Tags),
    cidr_block: raw.CidrBlock,
    state: raw.State,
    is_default: raw.IsDefault ?? false,
  };
}

/**
 * Build the report of one VPC.
 */
export async function aggregateVpc(
  region: RegionScope,
  info: VpcInfo,
  collectors: readonly VpcCollector[],
): Promise<VpcReport> {
  const logger = region.logger.child(info.vpc_id);
  const scope: VpcScope = { ...region, logger, vpcId: info.vpc_id };

  const outcomes = await Promise.all(collectors.map((collector) => runCollector(collector, scope, logger)));

  const collections: Collections<VpcScopedToken> = {};
  const issues: ScanIssue[] = [];
  for (const outcome of outcomes) {
    mergeOutcome(collections, outcome);
    issues.push(...outcome.issues);
  }

  return {
    vpcId: info.vpc_id,
    region: region.region,
    info,
    collections,
    status: scopeStatus(issues, outcomes),
  };
}

/**
 * Report for a VPC that was never aggregated.
 */
export function unscannedVpc(region: string, info: VpcInfo, issue: ScanIssue): VpcReport {
  return {
    vpcId: info.vpc_id,
    region,
    info,
    collections: {},
    status: { state: "failed", issues: [issue] },
  };
}
