import { describe, it, expect } from "vitest";
import { regionNode, toDocument, vpcNode } from "./document.js";
import type { AccountReport, RegionReport, SecurityGroup, Subnet, VpcInfo, VpcReport } from "./types.js";

const info: VpcInfo = { resource_type: "ec2:vpc", vpc_id: "vpc-a", region: "us-east-1", is_default: true, tags: {} };

const subnet: Subnet = {
  resource_type: "ec2:subnet",
  subnet_id: "subnet-1",
  region: "us-east-1",
  tags: {},
  map_public_ip_on_launch: false,
};

const group: SecurityGroup = {
  resource_type: "ec2:security-group",
  group_id: "sg-1",
  region: "us-east-1",
  tags: {},
  ingress_rule_count: 0,
  egress_rule_count: 0,
};

const scannedVpc: VpcReport = {
  vpcId: "vpc-a",
  region: "us-east-1",
  info,
  collections: { subnets: [subnet], security_groups: [group], rds_instances: [] },
  status: { state: "complete", issues: [] },
};

const deniedIssue = { kind: "access_denied" as const, collector: "vpcs", message: "denied" };

describe("vpcNode", () => {
  it("should split collections into network, security groups and resources", () => {
    expect(vpcNode(scannedVpc)).toEqual({
      vpc_info: info,
      network_components: { subnets: [subnet] },
      security_groups: [group],
      resources: { rds_instances: [] },
      scan_status: { state: "complete", issues: [] },
    });
  });

  it("should omit security groups that were not collected", () => {
    const node = vpcNode({ ...scannedVpc, collections: { subnets: [] } });

    expect(node).not.toHaveProperty("security_groups");
    expect(node.resources).toEqual({});
  });

  it("should keep only identity and status for a failed VPC", () => {
    const failed: VpcReport = { ...scannedVpc, collections: {}, status: { state: "failed", issues: [deniedIssue] } };

    expect(vpcNode(failed)).toEqual({ vpc_info: info, scan_status: { state: "failed", issues: [deniedIssue] } });
  });
});

describe("regionNode", () => {
  it("should key VPCs by id beside region-wide resources", () => {
    const region: RegionReport = {
      region: "us-east-1",
      vpcs: { "vpc-a": scannedVpc },
      regionWide: { dynamodb_tables: [] },
      status: { state: "complete", issues: [] },
    };

    const node = regionNode(region);

    expect(Object.keys(node)).toEqual(["vpc-a", "region_wide", "scan_status"]);
    expect(node.region_wide).toEqual({ dynamodb_tables: [] });
  });

  it("should keep only the status of a failed region", () => {
    const failed: RegionReport = {
      region: "ap-east-1",
      vpcs: {},
      regionWide: {},
      status: { state: "failed", issues: [deniedIssue] },
    };

    expect(regionNode(failed)).toEqual({ scan_status: { state: "failed", issues: [deniedIssue] } });
  });
});

describe("toDocument", () => {
  it("should lead with metadata and global resources, then regions in scan order", () => {
    const report: AccountReport = {
      accountId: "111122223333",
      startedAt: "2024-05-01T12:00:00.000Z",
      finishedAt: "2024-05-01T12:01:00.000Z",
      regions: ["us-west-2", "us-east-1"],
      excluded: ["s3_buckets"],
      aborted: false,
      global: {},
      globalStatus: { state: "complete", issues: [] },
      regionReports: {
        "us-east-1": { region: "us-east-1", vpcs: {}, regionWide: {}, status: { state: "complete", issues: [] } },
        "us-west-2": { region: "us-west-2", vpcs: {}, regionWide: {}, status: { state: "complete", issues: [] } },
      },
      status: { state: "complete", issues: [] },
    };

    const document = toDocument(report);

    expect(Object.keys(document)).toEqual(["scan_metadata", "global_resources", "us-west-2", "us-east-1"]);
    expect(document.scan_metadata).toEqual({
      account_id: "111122223333",
      started_at: "2024-05-01T12:00:00.000Z",
      finished_at: "2024-05-01T12:01:00.000Z",
      regions: ["us-west-2", "us-east-1"],
      excluded_resource_types: ["s3_buckets"],
      state: "complete",
      aborted: false,
      issues: [],
    });
    expect(document.global_resources).toEqual({ scan_status: { state: "complete", issues: [] } });
    expect(document["us-east-1"]).toEqual({ region_wide: {}, scan_status: { state: "complete", issues: [] } });
  });
});
