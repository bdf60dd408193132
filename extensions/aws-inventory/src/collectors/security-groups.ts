/**
 * Security groups of a VPC.
 */

import { DescribeSecurityGroupsCommand, type SecurityGroup as Ec2SecurityGroup } from "@aws-sdk/client-ec2";
import type { SecurityGroup } from "../types.js";
import type { VpcScope } from "./context.js";
import { ec2VpcListing } from "./network.js";
import { tagFields, vpcFilter } from "./shared.js";

export function toSecurityGroup(raw: Ec2SecurityGroup, scope: VpcScope): SecurityGroup | undefined {
  if (!raw.GroupId) return undefined;
  return {
    resource_type: "ec2:security-group",
    group_id: raw.GroupId,
    region: scope.region,
    ...tagFields(raw.Tags),
    group_name: raw.GroupName,
    description: raw.Description,
    ingress_rule_count: raw.IpPermissions?.length ?? 0,
    egress_rule_count: raw.IpPermissionsEgress?.length ?? 0,
  };
}

export const securityGroupsCollector = ec2VpcListing({
  token: "security_groups",
  operation: "ec2:DescribeSecurityGroups",
  fetchPage: (ec2, vpcId, NextToken, abortSignal) =>
    ec2.send(new DescribeSecurityGroupsCommand({ Filters: vpcFilter(vpcId), NextToken }), { abortSignal }),
  items: (page) => page.SecurityGroups,
  nextToken: (page) => page.NextToken,
  normalize: toSecurityGroup,
  id: (group) => group.group_id,
});
