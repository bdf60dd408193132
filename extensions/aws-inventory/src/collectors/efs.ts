/**
 * EFS file systems of a VPC, placed through their mount targets.
 */

import type { FileSystemDescription } from "@aws-sdk/client-efs";
import { toScanIssue } from "../errors.js";
import type { EfsFileSystem } from "../types.js";
import type { VpcScope } from "./context.js";
import type { ResourceCollector } from "./registry.js";
import { buildOutcome, dedupeBy, tagFields } from "./shared.js";

export function toEfsFileSystem(raw: FileSystemDescription, region: string, vpcId: string): EfsFileSystem | undefined {
  if (!raw.FileSystemId) return undefined;
  const tags = tagFields(raw.Tags);
  return {
    resource_type: "efs:file-system",
    file_system_id: raw.FileSystemId,
    region,
    ...tags,
    name: raw.Name ?? tags.name,
    life_cycle_state: raw.LifeCycleState,
    performance_mode: raw.PerformanceMode,
    throughput_mode: raw.ThroughputMode,
    encrypted: raw.Encrypted ?? false,
    number_of_mount_targets: raw.NumberOfMountTargets,
    size_bytes: raw.SizeInBytes?.Value,
    vpc_id: vpcId,
  };
}

export const efsFileSystemsCollector: ResourceCollector<"efs_filesystems", "vpc", VpcScope> = {
  token: "efs_filesystems",
  scope: "vpc",
  collect: async (scope) => {
    const placement = await scope.lookups.efsFileSystems();

    const entities = dedupeBy(
      placement.fileSystems.items.flatMap((fs) => {
        if (!fs.FileSystemId || placement.vpcByFileSystem.get(fs.FileSystemId) !== scope.vpcId) return [];
        return toEfsFileSystem(fs, scope.region, scope.vpcId) ?? [];
      }),
      (fs) => fs.file_system_id,
    );

    // A file system whose mount targets could not be read may belong here.
    const unplaced = Array.from(placement.unresolved, ([id, err]) =>
      toScanIssue("efs_filesystems", err, { operation: `efs:DescribeMountTargets ${id}` }),
    );

    return buildOutcome(
      "efs_filesystems",
      [{ operation: "efs:DescribeFileSystems", result: placement.fileSystems }],
      entities,
      unplaced,
    );
  },
};
