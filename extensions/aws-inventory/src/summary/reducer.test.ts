import { describe, it, expect } from "vitest";
import type { AccountReport, Ec2Instance, RdsInstance, RegionReport, VpcReport } from "../types.js";
import { summarize } from "./reducer.js";

function instance(id: string, volumeSizes?: number[]): Ec2Instance {
  const entity: Ec2Instance = {
    resource_type: "ec2:instance",
    instance_id: id,
    region: "us-east-1",
    vpc_id: "vpc-a",
    security_group_ids: [],
  };
  if (volumeSizes) {
    entity.ebs_volumes = volumeSizes.map((size, index) => ({
      resource_type: "ec2:volume",
      region: "us-east-1",
      volume_id: `vol-${id}-${index}`,
      delete_on_termination: true,
      size_gib: size,
    }));
  }
  return entity;
}

function database(id: string, storage?: number): RdsInstance {
  return {
    resource_type: "rds:db",
    db_instance_id: id,
    region: "us-east-1",
    multi_az: false,
    allocated_storage_gib: storage,
    vpc_id: "vpc-a",
  };
}

function vpc(id: string, collections: VpcReport["collections"], state: VpcReport["status"]["state"] = "complete"): VpcReport {
  return {
    vpcId: id,
    region: "us-east-1",
    info: { resource_type: "ec2:vpc", vpc_id: id, region: "us-east-1", is_default: false, tags: {} },
    collections,
    status: { state, issues: [] },
  };
}

function report(regionReports: Record<string, RegionReport>): AccountReport {
  return {
    accountId: "111122223333",
    startedAt: "2024-05-01T12:00:00.000Z",
    finishedAt: "2024-05-01T12:01:00.000Z",
    regions: Object.keys(regionReports),
    excluded: [],
    aborted: false,
    global: {
      s3_buckets: [
        { resource_type: "s3:bucket", bucket_name: "logs", region: "us-east-1", size_bytes: 2048, object_count: 4 },
        { resource_type: "s3:bucket", bucket_name: "empty", region: "us-east-1" },
      ],
    },
    globalStatus: { state: "complete", issues: [] },
    regionReports,
    status: { state: "partial", issues: [] },
  };
}

describe("summarize", () => {
  const eastA = vpc("vpc-a", {
    ec2_instances: [instance("i-1", [8, 20]), instance("i-2")],
    rds_instances: [database("db-1", 50), database("db-2", 100)],
    subnets: [],
  });
  const eastB = vpc("vpc-b", { ec2_instances: [instance("i-3", [])] }, "partial");
  const east: RegionReport = {
    region: "us-east-1",
    vpcs: { "vpc-a": eastA, "vpc-b": eastB },
    regionWide: {
      dynamodb_tables: [
        { resource_type: "dynamodb:table", table_name: "orders", region: "us-east-1", item_count: 5, size_bytes: 1000 },
      ],
    },
    status: { state: "partial", issues: [] },
  };
  const west: RegionReport = {
    region: "us-west-2",
    vpcs: {},
    regionWide: {},
    status: { state: "failed", issues: [] },
  };

  const summary = summarize(report({ "us-east-1": east, "us-west-2": west }));

  it("should count entities across VPCs", () => {
    expect(summary.totals.ec2_instances).toEqual({ count: 3, capacity: {} });
    expect(summary.totals.rds_instances).toEqual({ count: 2, capacity: { allocated_storage_gib: 150 } });
  });

  it("should total nested volumes", () => {
    expect(summary.totals.ebs_volumes).toEqual({ count: 2, capacity: { size_gib: 28 } });
  });

  it("should sum only the capacity that was reported", () => {
    expect(summary.totals.s3_buckets).toEqual({ count: 2, capacity: { size_bytes: 2048, object_count: 4 } });
    expect(summary.totals.dynamodb_tables).toEqual({ count: 1, capacity: { size_bytes: 1000, item_count: 5 } });
  });

  it("should list present but empty types and skip absent ones", () => {
    expect(summary.totals.subnets).toEqual({ count: 0, capacity: {} });
    expect(summary.totals).not.toHaveProperty("nat_gateways");
  });

  it("should break counts down per region", () => {
    expect(summary.totals.vpcs).toEqual({ count: 2, capacity: {} });
    expect(summary.regions["us-east-1"]).toEqual({
      state: "partial",
      vpcs: 2,
      counts: { ec2_instances: 3, rds_instances: 2, subnets: 0, ebs_volumes: 2, dynamodb_tables: 1, vpcs: 2 },
    });
    expect(summary.regions["us-west-2"]).toEqual({ state: "failed", vpcs: 0, counts: { vpcs: 0 } });
  });

  it("should count scope states", () => {
    expect(summary.scopes).toEqual({ complete: 2, partial: 2, failed: 1 });
    expect(summary.state).toBe("partial");
    expect(summary.accountId).toBe("111122223333");
  });
});
