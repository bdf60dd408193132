/**
 * Collector Registry
 *
 * Every resource-type token maps to exactly one collector. Orchestrators ask
 * the registry for the collectors of their scope, minus the excluded tokens.
 */

import type {
  CollectorOutcome,
  CollectorToken,
  GlobalToken,
  RegionWideToken,
  ResourceTypeToken,
  VpcScopedToken,
} from "../types.js";
import type { GlobalScope, RegionScope, VpcScope } from "./context.js";
import { s3BucketsCollector } from "./s3.js";
import { dynamoDbTablesCollector } from "./dynamodb.js";
import { ec2InstancesCollector } from "./ec2.js";
import { rdsClustersCollector, rdsInstancesCollector } from "./rds.js";
import { efsFileSystemsCollector } from "./efs.js";
import { fsxFileSystemsCollector } from "./fsx.js";
import { redshiftClustersCollector } from "./redshift.js";
import {
  internetGatewaysCollector,
  natGatewaysCollector,
  routeTablesCollector,
  subnetsCollector,
} from "./network.js";
import { securityGroupsCollector } from "./security-groups.js";

// =============================================================================
// Collector Types
// =============================================================================

export type CollectorScopeKind = "global" | "region" | "vpc";

/**
 * A collector for one token in one kind of scope.
 *
 * `collect` never rejects for AWS failures: they come back as issues on the
 * outcome.
 */
export type ResourceCollector<K extends CollectorToken, C extends CollectorScopeKind, S> = {
  token: K;
  scope: C;
  collect: (scope: S) => Promise<CollectorOutcome<K>>;
};

export type GlobalCollector = { [K in GlobalToken]: ResourceCollector<K, "global", GlobalScope> }[GlobalToken];
export type RegionCollector = { [K in RegionWideToken]: ResourceCollector<K, "region", RegionScope> }[RegionWideToken];
export type VpcCollector = { [K in VpcScopedToken]: ResourceCollector<K, "vpc", VpcScope> }[VpcScopedToken];
export type AnyCollector = GlobalCollector | RegionCollector | VpcCollector;

// =============================================================================
// Registry
// =============================================================================

export class CollectorRegistry {
  private collectors = new Map<CollectorToken, AnyCollector>();

  register(collector: AnyCollector): this {
    this.collectors.set(collector.token, collector);
    return this;
  }

  get(token: CollectorToken): AnyCollector | undefined {
    return this.collectors.get(token);
  }

  has(token: CollectorToken): boolean {
    return this.collectors.has(token);
  }

  tokens(): CollectorToken[] {
    return Array.from(this.collectors.keys());
  }

  global(excluded: ReadonlySet<ResourceTypeToken>): GlobalCollector[] {
    return this.active(excluded).filter((c): c is GlobalCollector => c.scope === "global");
  }

  regionWide(excluded: ReadonlySet<ResourceTypeToken>): RegionCollector[] {
    return this.active(excluded).filter((c): c is RegionCollector => c.scope === "region");
  }

  vpc(excluded: ReadonlySet<ResourceTypeToken>): VpcCollector[] {
    return this.active(excluded).filter((c): c is VpcCollector => c.scope === "vpc");
  }

  private active(excluded: ReadonlySet<ResourceTypeToken>): AnyCollector[] {
    return Array.from(this.collectors.values()).filter((c) => !excluded.has(c.token));
  }
}

/**
 * Registry with a collector for every resource-type token.
 */
export function createDefaultRegistry(): CollectorRegistry {
  return new CollectorRegistry()
    .register(s3BucketsCollector)
    .register(dynamoDbTablesCollector)
    .register(subnetsCollector)
    .register(routeTablesCollector)
    .register(internetGatewaysCollector)
    .register(natGatewaysCollector)
    .register(securityGroupsCollector)
    .register(ec2InstancesCollector)
    .register(rdsInstancesCollector)
    .register(rdsClustersCollector)
    .register(efsFileSystemsCollector)
    .register(fsxFileSystemsCollector)
    .register(redshiftClustersCollector);
}
