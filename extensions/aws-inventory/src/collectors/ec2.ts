/**
 * EC2 instances of a VPC, with their attached EBS volumes.
 *
 * Reservations are flattened; volumes referenced by block-device mappings are
 * described in batches so each instance carries per-volume size and type.
 */

import {
  DescribeInstancesCommand,
  DescribeVolumesCommand,
  type EC2Client,
  type Instance,
  type Volume,
} from "@aws-sdk/client-ec2";
import type { EbsVolume, Ec2Instance } from "../types.js";
import type { VpcScope } from "./context.js";
import type { ResourceCollector } from "./registry.js";
import { buildOutcome, dedupeBy, enrichmentIssue, fetchListing, tagFields, toIso, vpcFilter } from "./shared.js";

const OPERATION = "ec2:DescribeInstances";
const VOLUME_OPERATION = "ec2:DescribeVolumes";

/** Volume ids per DescribeVolumes filter. */
export const VOLUME_BATCH_SIZE = 200;

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function attachedVolumeIds(instance: Instance): string[] {
  return (instance.BlockDeviceMappings ?? []).flatMap((mapping) =>
    mapping.Ebs?.VolumeId ? [mapping.Ebs.VolumeId] : [],
  );
}

export function toEc2Instance(raw: Instance, scope: VpcScope): Ec2Instance | undefined {
  if (!raw.InstanceId) return undefined;
  return {
    resource_type: "ec2:instance",
    instance_id: raw.InstanceId,
    region: scope.region,
    ...tagFields(raw.Tags),
    instance_type: raw.InstanceType,
    state: raw.State?.Name,
    vpc_id: raw.VpcId ?? scope.vpcId,
    subnet_id: raw.SubnetId,
    availability_zone: raw.Placement?.AvailabilityZone,
    launch_time: toIso(raw.LaunchTime),
    platform: raw.PlatformDetails ?? raw.Platform,
    security_group_ids: (raw.SecurityGroups ?? []).flatMap((group) => (group.GroupId ? [group.GroupId] : [])),
  };
}

/**
 * Attach volume records to an instance. Details are omitted for volumes whose
 * lookup failed or that no longer exist.
 */
export function toEbsVolumes(raw: Instance, region: string, details: ReadonlyMap<string, Volume>): EbsVolume[] {
  return (raw.BlockDeviceMappings ?? []).flatMap((mapping): EbsVolume[] => {
    const volumeId = mapping.Ebs?.VolumeId;
    if (!volumeId) return [];
    const volume = details.get(volumeId);
    const entry: EbsVolume = {
      resource_type: "ec2:volume",
      region,
      volume_id: volumeId,
      device_name: mapping.DeviceName,
      delete_on_termination: mapping.Ebs?.DeleteOnTermination ?? false,
    };
    if (volume) {
      entry.size_gib = volume.Size;
      entry.volume_type = volume.VolumeType;
      entry.iops = volume.Iops;
      entry.encrypted = volume.Encrypted ?? false;
      entry.state = volume.State;
    }
    return [entry];
  });
}

async function describeVolumes(
  ec2: EC2Client,
  volumeIds: readonly string[],
  scope: VpcScope,
): Promise<{ details: Map<string, Volume>; failures: unknown[] }> {
  const details = new Map<string, Volume>();
  const failures: unknown[] = [];

  for (const batch of chunk(volumeIds, VOLUME_BATCH_SIZE)) {
    // A volume-id filter skips ids that no longer exist; VolumeIds would fail the batch.
    const result = await fetchListing(scope, {
      operation: VOLUME_OPERATION,
      fetchPage: (NextToken, abortSignal) =>
        ec2.send(
          new DescribeVolumesCommand({ Filters: [{ Name: "volume-id", Values: batch }], NextToken }),
          { abortSignal },
        ),
      items: (page) => page.Volumes,
      nextToken: (page) => page.NextToken,
    });
    for (const volume of result.items) {
      if (volume.VolumeId) details.set(volume.VolumeId, volume);
    }
    if (result.error !== undefined) failures.push(result.error);
  }

  return { details, failures };
}

export const ec2InstancesCollector: ResourceCollector<"ec2_instances", "vpc", VpcScope> = {
  token: "ec2_instances",
  scope: "vpc",
  collect: async (scope) => {
    const ec2 = scope.pool.get("ec2", scope.region);
    const result = await fetchListing(scope, {
      operation: OPERATION,
      fetchPage: (NextToken, abortSignal) =>
        ec2.send(new DescribeInstancesCommand({ Filters: vpcFilter(scope.vpcId), NextToken }), { abortSignal }),
      items: (page) => page.Reservations,
      nextToken: (page) => page.NextToken,
    });

    const raws = dedupeBy(
      result.items.flatMap((reservation) => (reservation.Instances ?? []).filter((i) => i.InstanceId)),
      (instance) => instance.InstanceId ?? "",
    );

    if (scope.excluded.has("ebs_volumes")) {
      const entities = raws.flatMap((raw) => toEc2Instance(raw, scope) ?? []);
      return buildOutcome("ec2_instances", [{ operation: OPERATION, result }], entities);
    }

    const volumeIds = [...new Set(raws.flatMap(attachedVolumeIds))];
    const { details, failures } = volumeIds.length > 0
      ? await describeVolumes(ec2, volumeIds, scope)
      : { details: new Map<string, Volume>(), failures: [] };

    const entities = raws.flatMap((raw) => {
      const instance = toEc2Instance(raw, scope);
      return instance ? [{ ...instance, ebs_volumes: toEbsVolumes(raw, scope.region, details) }] : [];
    });

    const batches = Math.ceil(volumeIds.length / VOLUME_BATCH_SIZE);
    return buildOutcome(
      "ec2_instances",
      [{ operation: OPERATION, result }],
      entities,
      enrichmentIssue("ec2_instances", VOLUME_OPERATION, failures, batches),
    );
  },
};
