/**
 * VPC network components: subnets, route tables, internet gateways and NAT
 * gateways. Each is one EC2 listing filtered to the VPC.
 */

import {
  DescribeInternetGatewaysCommand,
  DescribeNatGatewaysCommand,
  DescribeRouteTablesCommand,
  DescribeSubnetsCommand,
  type EC2Client,
  type InternetGateway as Ec2InternetGateway,
  type NatGateway as Ec2NatGateway,
  type Route,
  type RouteTable as Ec2RouteTable,
  type Subnet as Ec2Subnet,
} from "@aws-sdk/client-ec2";
import type {
  InternetGateway,
  NatGateway,
  NetworkToken,
  ResourceEntityMap,
  RouteEntry,
  RouteTable,
  SecurityToken,
  Subnet,
} from "../types.js";
import type { VpcScope } from "./context.js";
import type { ResourceCollector } from "./registry.js";
import { buildOutcome, dedupeBy, fetchListing, tagFields, vpcFilter } from "./shared.js";

// =============================================================================
// EC2 VPC Listing
// =============================================================================

export type Ec2ListingDefinition<K extends NetworkToken | SecurityToken, TPage, TRaw> = {
  token: K;
  operation: string;
  fetchPage: (ec2: EC2Client, vpcId: string, token: string | undefined, signal?: AbortSignal) => Promise<TPage>;
  items: (page: TPage) => TRaw[] | undefined;
  nextToken: (page: TPage) => string | undefined;
  normalize: (raw: TRaw, scope: VpcScope) => ResourceEntityMap[K] | undefined;
  id: (entity: ResourceEntityMap[K]) => string;
};

/**
 * Collector for an EC2 describe call that filters server-side by VPC.
 */
export function ec2VpcListing<K extends NetworkToken | SecurityToken, TPage, TRaw>(
  def: Ec2ListingDefinition<K, TPage, TRaw>,
): ResourceCollector<K, "vpc", VpcScope> {
  return {
    token: def.token,
    scope: "vpc",
    collect: async (scope) => {
      const ec2 = scope.pool.get("ec2", scope.region);
      const result = await fetchListing(scope, {
        operation: def.operation,
        fetchPage: (token, signal) => def.fetchPage(ec2, scope.vpcId, token, signal),
        items: def.items,
        nextToken: def.nextToken,
      });

      const entities = dedupeBy(
        result.items.flatMap((raw) => {
          const entity = def.normalize(raw, scope);
          return entity ? [entity] : [];
        }),
        def.id,
      );
      return buildOutcome(def.token, [{ operation: def.operation, result }], entities);
    },
  };
}

// =============================================================================
// Normalizers
// =============================================================================

export function toSubnet(raw: Ec2Subnet, scope: VpcScope): Subnet | undefined {
  if (!raw.SubnetId) return undefined;
  return {
    resource_type: "ec2:subnet",
    subnet_id: raw.SubnetId,
    region: scope.region,
    ...tagFields(raw.Tags),
    cidr_block: raw.CidrBlock,
    availability_zone: raw.AvailabilityZone,
    available_ip_address_count: raw.AvailableIpAddressCount,
    map_public_ip_on_launch: raw.MapPublicIpOnLaunch ?? false,
    state: raw.State,
  };
}

function toRouteEntry(route: Route): RouteEntry {
  return {
    destination: route.DestinationCidrBlock ?? route.DestinationIpv6CidrBlock ?? route.DestinationPrefixListId,
    target:
      route.GatewayId ??
      route.NatGatewayId ??
      route.TransitGatewayId ??
      route.VpcPeeringConnectionId ??
      route.NetworkInterfaceId ??
      route.InstanceId ??
      route.EgressOnlyInternetGatewayId ??
      route.CarrierGatewayId ??
      route.LocalGatewayId ??
      route.CoreNetworkArn,
    state: route.State,
  };
}

export function toRouteTable(raw: Ec2RouteTable, scope: VpcScope): RouteTable | undefined {
  if (!raw.RouteTableId) return undefined;
  const associations = raw.Associations ?? [];
  return {
    resource_type: "ec2:route-table",
    route_table_id: raw.RouteTableId,
    region: scope.region,
    ...tagFields(raw.Tags),
    main: associations.some((association) => association.Main === true),
    associated_subnet_ids: associations.flatMap((association) => (association.SubnetId ? [association.SubnetId] : [])),
    routes: (raw.Routes ?? []).map(toRouteEntry),
  };
}

export function toInternetGateway(raw: Ec2InternetGateway, scope: VpcScope): InternetGateway | undefined {
  if (!raw.InternetGatewayId) return undefined;
  return {
    resource_type: "ec2:internet-gateway",
    internet_gateway_id: raw.InternetGatewayId,
    region: scope.region,
    ...tagFields(raw.Tags),
    attachment_state: raw.Attachments?.find((attachment) => attachment.VpcId === scope.vpcId)?.State,
  };
}

export function toNatGateway(raw: Ec2NatGateway, scope: VpcScope): NatGateway | undefined {
  if (!raw.NatGatewayId) return undefined;
  return {
    resource_type: "ec2:nat-gateway",
    nat_gateway_id: raw.NatGatewayId,
    region: scope.region,
    ...tagFields(raw.Tags),
    subnet_id: raw.SubnetId,
    state: raw.State,
    connectivity_type: raw.ConnectivityType,
    public_ips: (raw.NatGatewayAddresses ?? []).flatMap((address) => (address.PublicIp ? [address.PublicIp] : [])),
  };
}

// =============================================================================
// Collectors
// =============================================================================

export const subnetsCollector = ec2VpcListing({
  token: "subnets",
  operation: "ec2:DescribeSubnets",
  fetchPage: (ec2, vpcId, NextToken, abortSignal) =>
    ec2.send(new DescribeSubnetsCommand({ Filters: vpcFilter(vpcId), NextToken }), { abortSignal }),
  items: (page) => page.Subnets,
  nextToken: (page) => page.NextToken,
  normalize: toSubnet,
  id: (subnet) => subnet.subnet_id,
});

export const routeTablesCollector = ec2VpcListing({
  token: "route_tables",
  operation: "ec2:DescribeRouteTables",
  fetchPage: (ec2, vpcId, NextToken, abortSignal) =>
    ec2.send(new DescribeRouteTablesCommand({ Filters: vpcFilter(vpcId), NextToken }), { abortSignal }),
  items: (page) => page.RouteTables,
  nextToken: (page) => page.NextToken,
  normalize: toRouteTable,
  id: (table) => table.route_table_id,
});

export const internetGatewaysCollector = ec2VpcListing({
  token: "internet_gateways",
  operation: "ec2:DescribeInternetGateways",
  fetchPage: (ec2, vpcId, NextToken, abortSignal) =>
    ec2.send(
      new DescribeInternetGatewaysCommand({ Filters: vpcFilter(vpcId, "attachment.vpc-id"), NextToken }),
      { abortSignal },
    ),
  items: (page) => page.InternetGateways,
  nextToken: (page) => page.NextToken,
  normalize: toInternetGateway,
  id: (gateway) => gateway.internet_gateway_id,
});

export const natGatewaysCollector = ec2VpcListing({
  token: "nat_gateways",
  operation: "ec2:DescribeNatGateways",
  fetchPage: (ec2, vpcId, NextToken, abortSignal) =>
    ec2.send(new DescribeNatGatewaysCommand({ Filter: vpcFilter(vpcId), NextToken }), { abortSignal }),
  items: (page) => page.NatGateways,
  nextToken: (page) => page.NextToken,
  normalize: toNatGateway,
  id: (gateway) => gateway.nat_gateway_id,
});
