/**
 * Redshift clusters of a VPC.
 */

import type { Cluster } from "@aws-sdk/client-redshift";
import type { RedshiftCluster } from "../types.js";
import type { VpcScope } from "./context.js";
import type { ResourceCollector } from "./registry.js";
import { buildOutcome, dedupeBy, tagFields } from "./shared.js";

export function toRedshiftCluster(raw: Cluster, region: string, vpcId: string): RedshiftCluster | undefined {
  if (!raw.ClusterIdentifier) return undefined;
  return {
    resource_type: "redshift:cluster",
    cluster_identifier: raw.ClusterIdentifier,
    region,
    ...tagFields(raw.Tags),
    node_type: raw.NodeType,
    number_of_nodes: raw.NumberOfNodes,
    cluster_status: raw.ClusterStatus,
    storage_capacity_mb: raw.TotalStorageCapacityInMegaBytes,
    vpc_id: vpcId,
  };
}

export const redshiftClustersCollector: ResourceCollector<"redshift_clusters", "vpc", VpcScope> = {
  token: "redshift_clusters",
  scope: "vpc",
  collect: async (scope) => {
    const result = await scope.lookups.redshiftClusters();
    const entities = dedupeBy(
      result.items.flatMap((cluster) =>
        cluster.VpcId === scope.vpcId ? toRedshiftCluster(cluster, scope.region, scope.vpcId) ?? [] : [],
      ),
      (cluster) => cluster.cluster_identifier,
    );
    return buildOutcome("redshift_clusters", [{ operation: "redshift:DescribeClusters", result }], entities);
  },
};
