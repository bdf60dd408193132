/**
 * Inventory Document
 *
 * The JSON layout written to disk: scan metadata, global resources, then one
 * key per region holding its VPCs, region-wide resources and status.
 */

import {
  NETWORK_TOKENS,
  VPC_RESOURCE_TOKENS,
  type AccountReport,
  type CollectorToken,
  type Collections,
  type GlobalToken,
  type NetworkToken,
  type RegionReport,
  type RegionWideToken,
  type ResourceTypeToken,
  type ScanIssue,
  type ScanState,
  type ScopeStatus,
  type SecurityGroup,
  type VpcInfo,
  type VpcReport,
  type VpcResourceToken,
} from "./types.js";

// =============================================================================
// Layout
// =============================================================================

export type ScanMetadata = {
  account_id: string;
  started_at: string;
  finished_at: string;
  regions: string[];
  excluded_resource_types: ResourceTypeToken[];
  state: ScanState;
  aborted: boolean;
  issues: ScanIssue[];
};

export type GlobalNode = Collections<GlobalToken> & { scan_status: ScopeStatus };

/** A VPC that could not be scanned carries only its identity and status. */
export type VpcNode = {
  vpc_info: VpcInfo;
  network_components?: Collections<NetworkToken>;
  security_groups?: SecurityGroup[];
  resources?: Collections<VpcResourceToken>;
  scan_status: ScopeStatus;
};

/** VPC ids, plus `region_wide` and `scan_status`. */
export type RegionNode = {
  [key: string]: VpcNode | Collections<RegionWideToken> | ScopeStatus;
};

export type InventoryDocument = {
  scan_metadata: ScanMetadata;
  global_resources: GlobalNode;
  [region: string]: RegionNode | ScanMetadata | GlobalNode;
};

// =============================================================================
// Serialization
// =============================================================================

function pick<T extends CollectorToken, K extends T>(collections: Collections<T>, tokens: readonly K[]): Collections<K> {
  const picked: Collections<K> = {};
  for (const token of tokens) {
    const entities = collections[token];
    if (entities) picked[token] = entities;
  }
  return picked;
}

export function vpcNode(report: VpcReport): VpcNode {
  if (report.status.state === "failed") {
    return { vpc_info: report.info, scan_status: report.status };
  }
  const { security_groups } = report.collections;
  return {
    vpc_info: report.info,
    network_components: pick(report.collections, NETWORK_TOKENS),
    ...(security_groups ? { security_groups } : {}),
    resources: pick(report.collections, VPC_RESOURCE_TOKENS),
    scan_status: report.status,
  };
}

export function regionNode(report: RegionReport): RegionNode {
  if (report.status.state === "failed") {
    return { scan_status: report.status };
  }
  const node: RegionNode = {};
  for (const [vpcId, vpc] of Object.entries(report.vpcs)) {
    node[vpcId] = vpcNode(vpc);
  }
  node.region_wide = report.regionWide;
  node.scan_status = report.status;
  return node;
}

/**
 * Convert an account report into the document layout.
 */
export function toDocument(report: AccountReport): InventoryDocument {
  const document: InventoryDocument = {
    scan_metadata: {
      account_id: report.accountId,
      started_at: report.startedAt,
      finished_at: report.finishedAt,
      regions: report.regions,
      excluded_resource_types: report.excluded,
      state: report.status.state,
      aborted: report.aborted,
      issues: report.status.issues,
    },
    global_resources: { ...report.global, scan_status: report.globalStatus },
  };

  for (const region of report.regions) {
    const regional = report.regionReports[region];
    if (regional) document[region] = regionNode(regional);
  }
  return document;
}
