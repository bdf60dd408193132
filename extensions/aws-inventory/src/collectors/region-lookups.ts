/**
 * Region-level listings shared by every VPC of a region.
 *
 * RDS, EFS, FSx and Redshift have no VPC filter on their list calls, so each
 * is fetched once per region on first use and matched to VPCs in memory.
 * Nothing is requested for a type whose collectors never ask.
 */

import {
  DescribeDBClustersCommand,
  DescribeDBInstancesCommand,
  DescribeDBSubnetGroupsCommand,
  type DBCluster,
  type DBInstance,
  type DBSubnetGroup,
} from "@aws-sdk/client-rds";
import {
  DescribeFileSystemsCommand as DescribeEfsFileSystemsCommand,
  DescribeMountTargetsCommand,
  type FileSystemDescription,
} from "@aws-sdk/client-efs";
import { DescribeFileSystemsCommand as DescribeFsxFileSystemsCommand, type FileSystem } from "@aws-sdk/client-fsx";
import { DescribeClustersCommand, type Cluster } from "@aws-sdk/client-redshift";
import type { AwsClientPool } from "../clients/pool.js";
import { mapWithConcurrency } from "../concurrency.js";
import { ScanAbortedError } from "../errors.js";
import type { InventoryLogger } from "../logger.js";
import type { PaginatedResult } from "../pagination/fetcher.js";
import { fetchListing } from "./shared.js";

export type EfsPlacement = {
  fileSystems: PaginatedResult<FileSystemDescription>;
  /** File system id → VPC id of its mount targets. */
  vpcByFileSystem: Map<string, string>;
  /** Mount-target lookups that failed, by file system id. */
  unresolved: Map<string, unknown>;
};

export type RegionLookups = {
  rdsInstances: () => Promise<PaginatedResult<DBInstance>>;
  rdsClusters: () => Promise<PaginatedResult<DBCluster>>;
  dbSubnetGroups: () => Promise<PaginatedResult<DBSubnetGroup>>;
  efsFileSystems: () => Promise<EfsPlacement>;
  fsxFileSystems: () => Promise<PaginatedResult<FileSystem>>;
  redshiftClusters: () => Promise<PaginatedResult<Cluster>>;
};

export type RegionLookupOptions = {
  pool: AwsClientPool;
  region: string;
  logger: InventoryLogger;
  signal?: AbortSignal;
  enrichmentConcurrency: number;
};

/** Cache the first call's promise. */
function memoize<T>(fn: () => Promise<T>): () => Promise<T> {
  let cached: Promise<T> | undefined;
  return () => {
    cached ??= fn();
    return cached;
  };
}

export function createRegionLookups(options: RegionLookupOptions): RegionLookups {
  const { pool, region, signal } = options;
  const ctx = { signal, logger: options.logger };

  const rdsInstances = memoize(() => {
    const rds = pool.get("rds", region);
    return fetchListing(ctx, {
      operation: "rds:DescribeDBInstances",
      fetchPage: (Marker, abortSignal) => rds.send(new DescribeDBInstancesCommand({ Marker }), { abortSignal }),
      items: (page) => page.DBInstances,
      nextToken: (page) => page.Marker,
    });
  });

  const rdsClusters = memoize(() => {
    const rds = pool.get("rds", region);
    return fetchListing(ctx, {
      operation: "rds:DescribeDBClusters",
      fetchPage: (Marker, abortSignal) => rds.send(new DescribeDBClustersCommand({ Marker }), { abortSignal }),
      items: (page) => page.DBClusters,
      nextToken: (page) => page.Marker,
    });
  });

  const dbSubnetGroups = memoize(() => {
    const rds = pool.get("rds", region);
    return fetchListing(ctx, {
      operation: "rds:DescribeDBSubnetGroups",
      fetchPage: (Marker, abortSignal) => rds.send(new DescribeDBSubnetGroupsCommand({ Marker }), { abortSignal }),
      items: (page) => page.DBSubnetGroups,
      nextToken: (page) => page.Marker,
    });
  });

  const efsFileSystems = memoize(async (): Promise<EfsPlacement> => {
    const efs = pool.get("efs", region);
    const fileSystems = await fetchListing(ctx, {
      operation: "efs:DescribeFileSystems",
      fetchPage: (Marker, abortSignal) => efs.send(new DescribeEfsFileSystemsCommand({ Marker }), { abortSignal }),
      items: (page) => page.FileSystems,
      nextToken: (page) => page.NextMarker,
    });

    const vpcByFileSystem = new Map<string, string>();
    const unresolved = new Map<string, unknown>();
    const ids = fileSystems.items.flatMap((fs) => (fs.FileSystemId ? [fs.FileSystemId] : []));

    const settled = await mapWithConcurrency(
      ids,
      options.enrichmentConcurrency,
      async (FileSystemId) => {
        const targets = await fetchListing(ctx, {
          operation: "efs:DescribeMountTargets",
          fetchPage: (Marker, abortSignal) =>
            efs.send(new DescribeMountTargetsCommand({ FileSystemId, Marker }), { abortSignal }),
          items: (page) => page.MountTargets,
          nextToken: (page) => page.NextMarker,
        });
        if (targets.error !== undefined && targets.items.length === 0) throw targets.error;
        return targets.items.find((target) => target.VpcId)?.VpcId;
      },
      signal,
    );

    for (const task of settled) {
      if (task.status === "fulfilled") {
        if (task.value) vpcByFileSystem.set(task.item, task.value);
      } else if (task.status === "rejected") {
        unresolved.set(task.item, task.reason);
      } else {
        unresolved.set(task.item, new ScanAbortedError("efs:DescribeMountTargets"));
      }
    }

    return { fileSystems, vpcByFileSystem, unresolved };
  });

  const fsxFileSystems = memoize(() => {
    const fsx = pool.get("fsx", region);
    return fetchListing(ctx, {
      operation: "fsx:DescribeFileSystems",
      fetchPage: (NextToken, abortSignal) => fsx.send(new DescribeFsxFileSystemsCommand({ NextToken }), { abortSignal }),
      items: (page) => page.FileSystems,
      nextToken: (page) => page.NextToken,
    });
  });

  const redshiftClusters = memoize(() => {
    const redshift = pool.get("redshift", region);
    return fetchListing(ctx, {
      operation: "redshift:DescribeClusters",
      fetchPage: (Marker, abortSignal) => redshift.send(new DescribeClustersCommand({ Marker }), { abortSignal }),
      items: (page) => page.Clusters,
      nextToken: (page) => page.Marker,
    });
  });

  return { rdsInstances, rdsClusters, dbSubnetGroups, efsFileSystems, fsxFileSystems, redshiftClusters };
}
