import { describe, it, expect } from "vitest";
import { DescribeFileSystemsCommand } from "@aws-sdk/client-fsx";
import { FakeAws } from "../testing/fake-aws.js";
import { vpcScope } from "../testing/scopes.js";
import { fsxFileSystemsCollector } from "./fsx.js";

describe("fsxFileSystemsCollector", () => {
  it("should keep file systems of the VPC", async () => {
    const fake = new FakeAws().on(DescribeFileSystemsCommand, (input) =>
      input.NextToken
        ? { FileSystems: [{ FileSystemId: "fs-0002", VpcId: "vpc-other" }] }
        : {
            FileSystems: [
              {
                FileSystemId: "fs-0001",
                FileSystemType: "LUSTRE",
                Lifecycle: "AVAILABLE",
                StorageType: "SSD",
                StorageCapacity: 1200,
                SubnetIds: ["subnet-1"],
                VpcId: "vpc-abc",
              },
            ],
            NextToken: "page-1",
          },
    );

    const outcome = await fsxFileSystemsCollector.collect(vpcScope(fake));

    expect(outcome.status).toBe("success");
    expect(outcome.entities).toEqual([
      {
        resource_type: "fsx:file-system",
        file_system_id: "fs-0001",
        region: "us-east-1",
        tags: {},
        file_system_type: "LUSTRE",
        lifecycle_state: "AVAILABLE",
        storage_type: "SSD",
        storage_capacity_gib: 1200,
        subnet_ids: ["subnet-1"],
        vpc_id: "vpc-abc",
      },
    ]);
  });

  it("should report a region without FSx as failed", async () => {
    const fake = new FakeAws().fail(DescribeFileSystemsCommand, "UnsupportedOperation");

    const outcome = await fsxFileSystemsCollector.collect(vpcScope(fake));

    expect(outcome.status).toBe("failed");
    expect(outcome.issues[0]?.kind).toBe("not_enabled");
  });
});
