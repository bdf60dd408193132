/**
 * AWS Inventory Type Definitions
 *
 * Resource-type tokens, normalized entities, scope reports and scan status
 * shared by the collectors, orchestrators and the summary reducer.
 */

// =============================================================================
// Resource-Type Tokens
// =============================================================================

/** Collected once per account. */
export type GlobalToken = "s3_buckets";

/** Collected once per region, outside any VPC. */
export type RegionWideToken = "dynamodb_tables";

/** Network components of a VPC. */
export type NetworkToken = "subnets" | "route_tables" | "internet_gateways" | "nat_gateways";

/** Compute and storage resources placed in a VPC. */
export type VpcResourceToken =
  | "ec2_instances"
  | "rds_instances"
  | "rds_clusters"
  | "efs_filesystems"
  | "fsx_filesystems"
  | "redshift_clusters";

export type SecurityToken = "security_groups";

/** Every token that a VPC aggregation can produce. */
export type VpcScopedToken = NetworkToken | VpcResourceToken | SecurityToken;

/** Tokens backed by a registered collector. */
export type CollectorToken = GlobalToken | RegionWideToken | VpcScopedToken;

/**
 * Tokens accepted in an exclusion set. `ebs_volumes` has no collector of its
 * own: it controls the nested volume lookup of `ec2_instances`.
 */
export type ResourceTypeToken = CollectorToken | "ebs_volumes";

export const GLOBAL_TOKENS: readonly GlobalToken[] = ["s3_buckets"];
export const REGION_WIDE_TOKENS: readonly RegionWideToken[] = ["dynamodb_tables"];
export const NETWORK_TOKENS: readonly NetworkToken[] = [
  "subnets",
  "route_tables",
  "internet_gateways",
  "nat_gateways",
];
export const VPC_RESOURCE_TOKENS: readonly VpcResourceToken[] = [
  "ec2_instances",
  "rds_instances",
  "rds_clusters",
  "efs_filesystems",
  "fsx_filesystems",
  "redshift_clusters",
];
export const SECURITY_TOKENS: readonly SecurityToken[] = ["security_groups"];

export const RESOURCE_TYPE_TOKENS: readonly ResourceTypeToken[] = [
  ...GLOBAL_TOKENS,
  ...REGION_WIDE_TOKENS,
  ...NETWORK_TOKENS,
  ...SECURITY_TOKENS,
  ...VPC_RESOURCE_TOKENS,
  "ebs_volumes",
];

export function isResourceTypeToken(value: string): value is ResourceTypeToken {
  return (RESOURCE_TYPE_TOKENS as readonly string[]).includes(value);
}

// =============================================================================
// Entities
// =============================================================================

export type ResourceTags = Record<string, string>;

/** Fields every normalized entity carries. */
export type EntityBase = {
  /** Service-qualified type, e.g. "ec2:instance". */
  resource_type: string;
  region: string;
  name?: string;
  /** Absent for types whose listing carries no tags (S3, DynamoDB). */
  tags?: ResourceTags;
};

export type VpcInfo = EntityBase & {
  resource_type: "ec2:vpc";
  vpc_id: string;
  cidr_block?: string;
  state?: string;
  is_default: boolean;
};

export type EbsVolume = {
  resource_type: "ec2:volume";
  region: string;
  volume_id: string;
  device_name?: string;
  delete_on_termination: boolean;
  /** Absent when the volume lookup failed. */
  size_gib?: number;
  volume_type?: string;
  iops?: number;
  encrypted?: boolean;
  state?: string;
};

export type Ec2Instance = EntityBase & {
  resource_type: "ec2:instance";
  instance_id: string;
  instance_type?: string;
  state?: string;
  vpc_id: string;
  subnet_id?: string;
  availability_zone?: string;
  launch_time?: string;
  platform?: string;
  security_group_ids: string[];
  /** Omitted entirely when `ebs_volumes` is excluded. */
  ebs_volumes?: EbsVolume[];
};

export type RdsInstance = EntityBase & {
  resource_type: "rds:db";
  db_instance_id: string;
  engine?: string;
  engine_version?: string;
  instance_class?: string;
  status?: string;
  multi_az: boolean;
  storage_type?: string;
  allocated_storage_gib?: number;
  db_subnet_group?: string;
  cluster_id?: string;
  vpc_id: string;
};

export type RdsCluster = EntityBase & {
  resource_type: "rds:cluster";
  cluster_id: string;
  engine?: string;
  engine_version?: string;
  status?: string;
  allocated_storage_gib?: number;
  cluster_members: string[];
  db_subnet_group?: string;
  vpc_id: string;
};

export type EfsFileSystem = EntityBase & {
  resource_type: "efs:file-system";
  file_system_id: string;
  life_cycle_state?: string;
  performance_mode?: string;
  throughput_mode?: string;
  encrypted: boolean;
  number_of_mount_targets?: number;
  size_bytes?: number;
  vpc_id: string;
};

export type FsxFileSystem = EntityBase & {
  resource_type: "fsx:file-system";
  file_system_id: string;
  file_system_type?: string;
  lifecycle_state?: string;
  storage_type?: string;
  storage_capacity_gib?: number;
  subnet_ids: string[];
  vpc_id: string;
};

export type RedshiftCluster = EntityBase & {
  resource_type: "redshift:cluster";
  cluster_identifier: string;
  node_type?: string;
  number_of_nodes?: number;
  cluster_status?: string;
  storage_capacity_mb?: number;
  vpc_id: string;
};

export type Subnet = EntityBase & {
  resource_type: "ec2:subnet";
  subnet_id: string;
  cidr_block?: string;
  availability_zone?: string;
  available_ip_address_count?: number;
  map_public_ip_on_launch: boolean;
  state?: string;
};

export type RouteEntry = {
  destination?: string;
  target?: string;
  state?: string;
};

export type RouteTable = EntityBase & {
  resource_type: "ec2:route-table";
  route_table_id: string;
  main: boolean;
  associated_subnet_ids: string[];
  routes: RouteEntry[];
};

export type InternetGateway = EntityBase & {
  resource_type: "ec2:internet-gateway";
  internet_gateway_id: string;
  attachment_state?: string;
};

export type NatGateway = EntityBase & {
  resource_type: "ec2:nat-gateway";
  nat_gateway_id: string;
  subnet_id?: string;
  state?: string;
  connectivity_type?: string;
  public_ips: string[];
};

export type SecurityGroup = EntityBase & {
  resource_type: "ec2:security-group";
  group_id: string;
  group_name?: string;
  description?: string;
  ingress_rule_count: number;
  egress_rule_count: number;
};

export type DynamoDbTable = EntityBase & {
  resource_type: "dynamodb:table";
  table_name: string;
  table_status?: string;
  billing_mode?: string;
  item_count?: number;
  size_bytes?: number;
};

export type S3Bucket = EntityBase & {
  resource_type: "s3:bucket";
  bucket_name: string;
  creation_date?: string;
  /** Latest daily storage metrics; absent while CloudWatch has no datapoint. */
  size_bytes?: number;
  object_count?: number;
  metrics_timestamp?: string;
};

/** Entity type produced by each collector token. */
export type ResourceEntityMap = {
  s3_buckets: S3Bucket;
  dynamodb_tables: DynamoDbTable;
  ec2_instances: Ec2Instance;
  rds_instances: RdsInstance;
  rds_clusters: RdsCluster;
  efs_filesystems: EfsFileSystem;
  fsx_filesystems: FsxFileSystem;
  redshift_clusters: RedshiftCluster;
  subnets: Subnet;
  route_tables: RouteTable;
  internet_gateways: InternetGateway;
  nat_gateways: NatGateway;
  security_groups: SecurityGroup;
};

/** Partial token → entities mapping; an absent key is excluded or failed. */
export type Collections<K extends CollectorToken> = {
  [P in K]?: ResourceEntityMap[P][];
};

// =============================================================================
// Scan Status
// =============================================================================

export type IssueKind =
  | "access_denied"
  | "not_enabled"
  | "throttled"
  | "partial_pagination"
  | "metrics_unavailable"
  | "aborted"
  | "error";

/** A recorded, non-fatal problem attached to the narrowest scope it affects. */
export type ScanIssue = {
  kind: IssueKind;
  /** Collector token, or "vpcs" / "regions" / "credentials" for structural lookups. */
  collector: string;
  operation?: string;
  message: string;
  code?: string;
};

export type ScanState = "complete" | "partial" | "failed";

export type ScopeStatus = {
  state: ScanState;
  issues: ScanIssue[];
};

export type CollectorStatus = "success" | "partial" | "failed";

export type CollectorOutcome<K extends CollectorToken> = {
  token: K;
  status: CollectorStatus;
  entities: ResourceEntityMap[K][];
  issues: ScanIssue[];
};

// =============================================================================
// Reports
// =============================================================================

export type VpcReport = {
  vpcId: string;
  region: string;
  info: VpcInfo;
  collections: Collections<VpcScopedToken>;
  status: ScopeStatus;
};

export type RegionReport = {
  region: string;
  vpcs: Record<string, VpcReport>;
  regionWide: Collections<RegionWideToken>;
  status: ScopeStatus;
};

export type AccountReport = {
  accountId: string;
  startedAt: string;
  finishedAt: string;
  regions: string[];
  excluded: ResourceTypeToken[];
  aborted: boolean;
  global: Collections<GlobalToken>;
  globalStatus: ScopeStatus;
  regionReports: Record<string, RegionReport>;
  status: ScopeStatus;
};
