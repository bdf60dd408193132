/**
 * Scopes handed to collectors.
 */

import type { AwsClientPool } from "../clients/pool.js";
import type { InventoryLogger } from "../logger.js";
import type { ResourceTypeToken } from "../types.js";
import type { RegionLookups } from "./region-lookups.js";

/** Settings shared by every scope of one scan. */
export type ScanContext = {
  pool: AwsClientPool;
  excluded: ReadonlySet<ResourceTypeToken>;
  logger: InventoryLogger;
  signal?: AbortSignal;
  /** Window searched for the latest daily S3 storage metrics. */
  metricsLookbackDays: number;
  /** Enrichment fan-out per collector (DescribeTable, bucket metrics, mount targets). */
  enrichmentConcurrency: number;
  now: () => Date;
};

/** Account-level scope. `region` is the home region used for global listings. */
export type GlobalScope = ScanContext & {
  region: string;
};

export type RegionScope = ScanContext & {
  region: string;
  lookups: RegionLookups;
};

export type VpcScope = RegionScope & {
  vpcId: string;
};
