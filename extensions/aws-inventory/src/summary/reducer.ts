/**
 * Summary Reducer
 *
 * Folds a finished account report into per-type counts and capacity totals,
 * per-region breakdowns and scope state counts. Pure: the report is only read.
 */

import {
  GLOBAL_TOKENS,
  NETWORK_TOKENS,
  REGION_WIDE_TOKENS,
  SECURITY_TOKENS,
  VPC_RESOURCE_TOKENS,
  type AccountReport,
  type CollectorToken,
  type Collections,
  type Ec2Instance,
  type ResourceEntityMap,
  type ScanState,
  type ScopeStatus,
} from "../types.js";

export type SummaryKey = CollectorToken | "ebs_volumes" | "vpcs";

export type TypeTotals = {
  count: number;
  /** Capacity field → sum over entities that report it. */
  capacity: Record<string, number>;
};

export type RegionSummary = {
  state: ScanState;
  vpcs: number;
  counts: Partial<Record<SummaryKey, number>>;
};

export type ScanSummary = {
  accountId: string;
  state: ScanState;
  aborted: boolean;
  totals: Partial<Record<SummaryKey, TypeTotals>>;
  regions: Record<string, RegionSummary>;
  scopes: Record<ScanState, number>;
};

type CapacityExtractor<K extends CollectorToken> = (entity: ResourceEntityMap[K]) => Record<string, number | undefined>;

const none = (): Record<string, number | undefined> => ({});

/** Capacity-relevant fields of each entity type. */
export const CAPACITY_FIELDS: { [K in CollectorToken]: CapacityExtractor<K> } = {
  s3_buckets: (bucket) => ({ size_bytes: bucket.size_bytes, object_count: bucket.object_count }),
  dynamodb_tables: (table) => ({ size_bytes: table.size_bytes, item_count: table.item_count }),
  ec2_instances: none,
  rds_instances: (db) => ({ allocated_storage_gib: db.allocated_storage_gib }),
  rds_clusters: (cluster) => ({ allocated_storage_gib: cluster.allocated_storage_gib }),
  efs_filesystems: (fs) => ({ size_bytes: fs.size_bytes }),
  fsx_filesystems: (fs) => ({ storage_capacity_gib: fs.storage_capacity_gib }),
  redshift_clusters: (cluster) => ({ storage_capacity_mb: cluster.storage_capacity_mb }),
  subnets: none,
  route_tables: none,
  internet_gateways: none,
  nat_gateways: none,
  security_groups: none,
};

const VPC_SCOPED = [...NETWORK_TOKENS, ...SECURITY_TOKENS, ...VPC_RESOURCE_TOKENS];

// =============================================================================
// Accumulation
// =============================================================================

class Totals {
  readonly byKey: Partial<Record<SummaryKey, TypeTotals>> = {};

  entry(key: SummaryKey): TypeTotals {
    let totals = this.byKey[key];
    if (!totals) {
      totals = { count: 0, capacity: {} };
      this.byKey[key] = totals;
    }
    return totals;
  }

  add(key: SummaryKey, count: number, capacity: Record<string, number | undefined> = {}): void {
    const totals = this.entry(key);
    totals.count += count;
    for (const [field, value] of Object.entries(capacity)) {
      if (typeof value !== "number" || !Number.isFinite(value)) continue;
      totals.capacity[field] = (totals.capacity[field] ?? 0) + value;
    }
  }
}

function tally<T extends CollectorToken, K extends T>(
  totals: Totals,
  collections: Collections<T>,
  token: K,
  counts?: Partial<Record<SummaryKey, number>>,
): void {
  const entities: ResourceEntityMap[K][] | undefined = collections[token];
  if (!entities) return;
  const extract: CapacityExtractor<K> = CAPACITY_FIELDS[token];
  totals.entry(token);
  for (const entity of entities) {
    totals.add(token, 1, extract(entity));
  }
  if (counts) counts[token] = (counts[token] ?? 0) + entities.length;
}

/** Attached volumes nested under instances; absent when `ebs_volumes` was excluded. */
function tallyVolumes(totals: Totals, instances: readonly Ec2Instance[], counts: Partial<Record<SummaryKey, number>>): void {
  for (const instance of instances) {
    if (!instance.ebs_volumes) continue;
    totals.entry("ebs_volumes");
    for (const volume of instance.ebs_volumes) {
      totals.add("ebs_volumes", 1, { size_gib: volume.size_gib });
    }
    counts.ebs_volumes = (counts.ebs_volumes ?? 0) + instance.ebs_volumes.length;
  }
}

// =============================================================================
// Reducer
// =============================================================================

export function summarize(report: AccountReport): ScanSummary {
  const totals = new Totals();
  const scopes: Record<ScanState, number> = { complete: 0, partial: 0, failed: 0 };
  const count = (status: ScopeStatus) => {
    scopes[status.state] += 1;
  };

  count(report.globalStatus);
  for (const token of GLOBAL_TOKENS) tally(totals, report.global, token);

  const regions: Record<string, RegionSummary> = {};
  for (const [region, regional] of Object.entries(report.regionReports)) {
    count(regional.status);
    const counts: Partial<Record<SummaryKey, number>> = {};
    const vpcs = Object.values(regional.vpcs);

    for (const vpc of vpcs) {
      count(vpc.status);
      for (const token of VPC_SCOPED) tally(totals, vpc.collections, token, counts);
      tallyVolumes(totals, vpc.collections.ec2_instances ?? [], counts);
    }
    for (const token of REGION_WIDE_TOKENS) tally(totals, regional.regionWide, token, counts);

    totals.add("vpcs", vpcs.length);
    counts.vpcs = vpcs.length;
    regions[region] = { state: regional.status.state, vpcs: vpcs.length, counts };
  }

  return {
    accountId: report.accountId,
    state: report.status.state,
    aborted: report.aborted,
    totals: totals.byKey,
    regions,
    scopes,
  };
}
