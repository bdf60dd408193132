/**
 * FSx file systems of a VPC.
 */

import type { FileSystem } from "@aws-sdk/client-fsx";
import type { FsxFileSystem } from "../types.js";
import type { VpcScope } from "./context.js";
import type { ResourceCollector } from "./registry.js";
import { buildOutcome, dedupeBy, tagFields } from "./shared.js";

export function toFsxFileSystem(raw: FileSystem, region: string, vpcId: string): FsxFileSystem | undefined {
  if (!raw.FileSystemId) return undefined;
  return {
    resource_type: "fsx:file-system",
    file_system_id: raw.FileSystemId,
    region,
    ...tagFields(raw.Tags),
    file_system_type: raw.FileSystemType,
    lifecycle_state: raw.Lifecycle,
    storage_type: raw.StorageType,
    storage_capacity_gib: raw.StorageCapacity,
    subnet_ids: raw.SubnetIds ?? [],
    vpc_id: vpcId,
  };
}

export const fsxFileSystemsCollector: ResourceCollector<"fsx_filesystems", "vpc", VpcScope> = {
  token: "fsx_filesystems",
  scope: "vpc",
  collect: async (scope) => {
    const result = await scope.lookups.fsxFileSystems();
    const entities = dedupeBy(
      result.items.flatMap((fs) =>
        fs.VpcId === scope.vpcId ? toFsxFileSystem(fs, scope.region, scope.vpcId) ?? [] : [],
      ),
      (fs) => fs.file_system_id,
    );
    return buildOutcome("fsx_filesystems", [{ operation: "fsx:DescribeFileSystems", result }], entities);
  },
};
