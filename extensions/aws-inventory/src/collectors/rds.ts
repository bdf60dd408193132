/**
 * RDS DB instances and DB clusters of a VPC.
 *
 * Neither list call filters by VPC. Instances carry their subnet group's
 * VpcId; clusters only name their subnet group, so they are placed through the
 * region's DB subnet groups.
 */

import type { DBCluster, DBInstance, DBSubnetGroup } from "@aws-sdk/client-rds";
import type { RdsCluster, RdsInstance } from "../types.js";
import type { VpcScope } from "./context.js";
import type { ResourceCollector } from "./registry.js";
import { buildOutcome, dedupeBy, listingIssues, tagFields } from "./shared.js";

export function subnetGroupVpcs(groups: readonly DBSubnetGroup[]): Map<string, string> {
  const vpcs = new Map<string, string>();
  for (const group of groups) {
    if (group.DBSubnetGroupName && group.VpcId) vpcs.set(group.DBSubnetGroupName, group.VpcId);
  }
  return vpcs;
}

export function toRdsInstance(raw: DBInstance, region: string, vpcId: string): RdsInstance | undefined {
  if (!raw.DBInstanceIdentifier) return undefined;
  return {
    resource_type: "rds:db",
    db_instance_id: raw.DBInstanceIdentifier,
    region,
    ...tagFields(raw.TagList),
    engine: raw.Engine,
    engine_version: raw.EngineVersion,
    instance_class: raw.DBInstanceClass,
    status: raw.DBInstanceStatus,
    multi_az: raw.MultiAZ ?? false,
    storage_type: raw.StorageType,
    allocated_storage_gib: raw.AllocatedStorage,
    db_subnet_group: raw.DBSubnetGroup?.DBSubnetGroupName,
    cluster_id: raw.DBClusterIdentifier,
    vpc_id: vpcId,
  };
}

export function toRdsCluster(raw: DBCluster, region: string, vpcId: string): RdsCluster | undefined {
  if (!raw.DBClusterIdentifier) return undefined;
  return {
    resource_type: "rds:cluster",
    cluster_id: raw.DBClusterIdentifier,
    region,
    ...tagFields(raw.TagList),
    engine: raw.Engine,
    engine_version: raw.EngineVersion,
    status: raw.Status,
    allocated_storage_gib: raw.AllocatedStorage,
    cluster_members: (raw.DBClusterMembers ?? []).flatMap((member) =>
      member.DBInstanceIdentifier ? [member.DBInstanceIdentifier] : [],
    ),
    db_subnet_group: raw.DBSubnetGroup,
    vpc_id: vpcId,
  };
}

export const rdsInstancesCollector: ResourceCollector<"rds_instances", "vpc", VpcScope> = {
  token: "rds_instances",
  scope: "vpc",
  collect: async (scope) => {
    const instances = await scope.lookups.rdsInstances();
    const needsGroups = instances.items.some((db) => !db.DBSubnetGroup?.VpcId && db.DBSubnetGroup?.DBSubnetGroupName);
    const groups = needsGroups ? await scope.lookups.dbSubnetGroups() : undefined;
    const groupVpcs = subnetGroupVpcs(groups?.items ?? []);

    const entities = dedupeBy(
      instances.items.flatMap((db) => {
        const groupName = db.DBSubnetGroup?.DBSubnetGroupName;
        const vpcId = db.DBSubnetGroup?.VpcId ?? (groupName ? groupVpcs.get(groupName) : undefined);
        if (vpcId !== scope.vpcId) return [];
        return toRdsInstance(db, scope.region, scope.vpcId) ?? [];
      }),
      (db) => db.db_instance_id,
    );

    // Only instances without an embedded VpcId depend on the subnet groups.
    return buildOutcome(
      "rds_instances",
      [{ operation: "rds:DescribeDBInstances", result: instances }],
      entities,
      groups ? listingIssues("rds_instances", "rds:DescribeDBSubnetGroups", groups) : [],
    );
  },
};

export const rdsClustersCollector: ResourceCollector<"rds_clusters", "vpc", VpcScope> = {
  token: "rds_clusters",
  scope: "vpc",
  collect: async (scope) => {
    const [clusters, groups] = await Promise.all([scope.lookups.rdsClusters(), scope.lookups.dbSubnetGroups()]);
    const groupVpcs = subnetGroupVpcs(groups.items);

    const entities = dedupeBy(
      clusters.items.flatMap((cluster) => {
        const vpcId = cluster.DBSubnetGroup ? groupVpcs.get(cluster.DBSubnetGroup) : undefined;
        if (vpcId !== scope.vpcId) return [];
        return toRdsCluster(cluster, scope.region, scope.vpcId) ?? [];
      }),
      (cluster) => cluster.cluster_id,
    );

    return buildOutcome(
      "rds_clusters",
      [
        { operation: "rds:DescribeDBClusters", result: clusters },
        { operation: "rds:DescribeDBSubnetGroups", result: groups },
      ],
      entities,
    );
  },
};
