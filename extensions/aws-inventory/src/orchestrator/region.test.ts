import { describe, it, expect } from "vitest";
import {
  DescribeInstancesCommand,
  DescribeSecurityGroupsCommand,
  DescribeSubnetsCommand,
  DescribeVpcsCommand,
} from "@aws-sdk/client-ec2";
import { DescribeTableCommand, ListTablesCommand } from "@aws-sdk/client-dynamodb";
import { DescribeDBInstancesCommand } from "@aws-sdk/client-rds";
import { createDefaultRegistry } from "../collectors/registry.js";
import { FakeAws, FakeServiceError } from "../testing/fake-aws.js";
import { testContext } from "../testing/scopes.js";
import { scanRegion } from "./region.js";

function scan(fake: FakeAws, region = "us-east-1", signal?: AbortSignal) {
  return scanRegion(region, {
    context: testContext(fake, { signal }),
    registry: createDefaultRegistry(),
    vpcConcurrency: 2,
  });
}

describe("scanRegion", () => {
  it("should report a region without VPCs as complete", async () => {
    const fake = new FakeAws()
      .on(DescribeVpcsCommand, () => ({ Vpcs: [] }))
      .on(ListTablesCommand, () => ({ TableNames: [] }));

    const report = await scan(fake);

    expect(report).toEqual({
      region: "us-east-1",
      vpcs: {},
      regionWide: { dynamodb_tables: [] },
      status: { state: "complete", issues: [] },
    });
  });

  it("should mark an inaccessible region failed without scanning it", async () => {
    const fake = new FakeAws().fail(DescribeVpcsCommand, "AuthFailure", "AWS was not able to validate the provided access credentials");

    const report = await scan(fake, "ap-east-1");

    expect(report.status.state).toBe("failed");
    expect(report.status.issues).toEqual([
      {
        kind: "not_enabled",
        collector: "vpcs",
        operation: "ec2:DescribeVpcs",
        message: "AWS was not able to validate the provided access credentials",
        code: "AuthFailure",
      },
    ]);
    expect(fake.callsOf(ListTablesCommand)).toHaveLength(0);
  });

  it("should still collect region-wide resources when VPC discovery is denied", async () => {
    const fake = new FakeAws()
      .fail(DescribeVpcsCommand, "UnauthorizedOperation", "You are not authorized to perform this operation.")
      .on(ListTablesCommand, () => ({ TableNames: ["orders"] }))
      .on(DescribeTableCommand, () => ({ Table: { TableStatus: "ACTIVE", ItemCount: 1, TableSizeBytes: 64 } }));

    const report = await scan(fake);

    expect(report.status).toEqual({
      state: "partial",
      issues: [
        {
          kind: "access_denied",
          collector: "vpcs",
          operation: "ec2:DescribeVpcs",
          message: "You are not authorized to perform this operation.",
          code: "UnauthorizedOperation",
        },
      ],
    });
    expect(report.vpcs).toEqual({});
    expect(report.regionWide.dynamodb_tables?.map((table) => table.table_name)).toEqual(["orders"]);
  });

  it("should keep region-wide resources when VPC discovery is throttled", async () => {
    const fake = new FakeAws()
      .fail(DescribeVpcsCommand, "RequestLimitExceeded")
      .on(ListTablesCommand, () => ({ TableNames: [] }));

    const report = await scan(fake);

    expect(report.status.state).toBe("partial");
    expect(report.status.issues.map((issue) => issue.kind)).toEqual(["throttled"]);
    expect(report.regionWide).toEqual({ dynamodb_tables: [] });
    expect(report.vpcs).toEqual({});
  });

  it("should isolate a failing collector to its VPC", async () => {
    const fake = new FakeAws()
      .on(DescribeVpcsCommand, () => ({ Vpcs: [{ VpcId: "vpc-a" }, { VpcId: "vpc-b" }, { VpcId: "vpc-a" }] }))
      .on(DescribeSubnetsCommand, (input) => {
        if (input.Filters?.[0]?.Values?.[0] === "vpc-b") throw new FakeServiceError("UnauthorizedOperation");
        return { Subnets: [{ SubnetId: "subnet-a" }] };
      });

    const report = await scan(fake);

    expect(Object.keys(report.vpcs)).toEqual(["vpc-a", "vpc-b"]);
    expect(report.vpcs["vpc-a"]?.status).toEqual({ state: "complete", issues: [] });
    expect(report.vpcs["vpc-a"]?.collections.subnets?.map((subnet) => subnet.subnet_id)).toEqual(["subnet-a"]);
    expect(report.vpcs["vpc-b"]?.status.state).toBe("partial");
    expect(report.vpcs["vpc-b"]?.collections).not.toHaveProperty("subnets");
    expect(report.vpcs["vpc-b"]?.collections.route_tables).toEqual([]);
    expect(report.status.state).toBe("partial");
    expect(report.status.issues).toEqual([]);
  });

  it("should keep a VPC's instances when its security groups fail", async () => {
    const vpcOf = (filters?: { Values?: string[] }[]) => filters?.[0]?.Values?.[0];
    const fake = new FakeAws()
      .on(DescribeVpcsCommand, () => ({ Vpcs: [{ VpcId: "vpc-1" }, { VpcId: "vpc-2" }] }))
      .on(DescribeSecurityGroupsCommand, (input) => {
        if (vpcOf(input.Filters) === "vpc-1") throw new FakeServiceError("UnauthorizedOperation");
        return { SecurityGroups: [{ GroupId: "sg-2", VpcId: "vpc-2" }] };
      })
      .on(DescribeInstancesCommand, (input) => {
        const vpcId = vpcOf(input.Filters);
        return { Reservations: [{ Instances: [{ InstanceId: `i-${vpcId}`, VpcId: vpcId }] }] };
      });

    const report = await scan(fake);

    const failing = report.vpcs["vpc-1"];
    expect(failing?.status.state).toBe("partial");
    expect(failing?.status.issues.map((issue) => `${issue.collector}:${issue.kind}`)).toEqual([
      "security_groups:access_denied",
    ]);
    expect(failing?.collections).not.toHaveProperty("security_groups");
    expect(failing?.collections.ec2_instances?.map((instance) => instance.instance_id)).toEqual(["i-vpc-1"]);

    const other = report.vpcs["vpc-2"];
    expect(other?.status).toEqual({ state: "complete", issues: [] });
    expect(other?.collections.security_groups?.map((group) => group.group_id)).toEqual(["sg-2"]);
    expect(other?.collections.ec2_instances?.map((instance) => instance.instance_id)).toEqual(["i-vpc-2"]);
  });

  it("should list region-level services once for all VPCs", async () => {
    const fake = new FakeAws().on(DescribeVpcsCommand, () => ({ Vpcs: [{ VpcId: "vpc-a" }, { VpcId: "vpc-b" }] }));

    await scan(fake);

    expect(fake.callsOf(DescribeDBInstancesCommand)).toHaveLength(1);
  });

  it("should fail a region aborted before discovery", async () => {
    const controller = new AbortController();
    controller.abort();
    const fake = new FakeAws();

    const report = await scan(fake, "us-east-1", controller.signal);

    expect(report.status.state).toBe("failed");
    expect(report.status.issues[0]?.kind).toBe("aborted");
    expect(fake.calls).toHaveLength(0);
  });
});
