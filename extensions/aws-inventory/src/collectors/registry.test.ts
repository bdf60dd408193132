import { describe, it, expect } from "vitest";
import type { ResourceTypeToken } from "../types.js";
import { CollectorRegistry, createDefaultRegistry } from "./registry.js";
import { subnetsCollector } from "./network.js";

describe("CollectorRegistry", () => {
  it("should register a collector for every resource type", () => {
    const registry = createDefaultRegistry();

    expect(registry.tokens().sort()).toEqual([
      "dynamodb_tables",
      "ec2_instances",
      "efs_filesystems",
      "fsx_filesystems",
      "internet_gateways",
      "nat_gateways",
      "rds_clusters",
      "rds_instances",
      "redshift_clusters",
      "route_tables",
      "s3_buckets",
      "security_groups",
      "subnets",
    ]);
  });

  it("should group collectors by scope", () => {
    const registry = createDefaultRegistry();
    const none = new Set<ResourceTypeToken>();

    expect(registry.global(none).map((c) => c.token)).toEqual(["s3_buckets"]);
    expect(registry.regionWide(none).map((c) => c.token)).toEqual(["dynamodb_tables"]);
    expect(registry.vpc(none)).toHaveLength(11);
  });

  it("should leave out excluded tokens", () => {
    const registry = createDefaultRegistry();
    const excluded = new Set<ResourceTypeToken>(["s3_buckets", "subnets", "ebs_volumes"]);

    expect(registry.global(excluded)).toEqual([]);
    expect(registry.vpc(excluded).map((c) => c.token)).not.toContain("subnets");
    expect(registry.vpc(excluded).map((c) => c.token)).toContain("ec2_instances");
  });

  it("should replace a collector registered twice", () => {
    const registry = new CollectorRegistry().register(subnetsCollector).register(subnetsCollector);

    expect(registry.tokens()).toEqual(["subnets"]);
    expect(registry.get("subnets")).toBe(subnetsCollector);
    expect(registry.has("route_tables")).toBe(false);
  });
});
