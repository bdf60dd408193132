/**
 * Console rendering of a scan summary.
 */

import { RESOURCE_TYPE_TOKENS } from "../types.js";
import type { ScanSummary, SummaryKey, TypeTotals } from "./reducer.js";

/** Simple table formatter for terminal output. */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)),
  );

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) =>
    cells.map((c, i) => ` ${c.padEnd(widths[i] ?? 0)} `).join("│");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

const LABELS: Record<SummaryKey, string> = {
  vpcs: "VPCs",
  s3_buckets: "S3 Buckets",
  dynamodb_tables: "DynamoDB Tables",
  subnets: "Subnets",
  route_tables: "Route Tables",
  internet_gateways: "Internet Gateways",
  nat_gateways: "NAT Gateways",
  security_groups: "Security Groups",
  ec2_instances: "EC2 Instances",
  ebs_volumes: "EBS Volumes",
  rds_instances: "RDS Instances",
  rds_clusters: "RDS Clusters",
  efs_filesystems: "EFS File Systems",
  fsx_filesystems: "FSx File Systems",
  redshift_clusters: "Redshift Clusters",
};

const ORDER: SummaryKey[] = ["vpcs", ...RESOURCE_TYPE_TOKENS];

const BYTE_UNITS = ["B", "KiB", "MiB", "GiB", "TiB", "PiB"];

/**
 * Human-readable byte count, e.g. `1.5 GiB`.
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (Math.abs(value) >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

function formatCapacity(field: string, value: number): string {
  if (field === "size_bytes") return formatBytes(value);
  if (field.endsWith("_gib")) return `${value} GiB`;
  if (field.endsWith("_mb")) return `${value} MB`;
  return `${value} ${field.replace(/_/g, " ")}`;
}

function capacityCell(totals: TypeTotals): string {
  const parts = Object.entries(totals.capacity).map(([field, value]) => formatCapacity(field, value));
  return parts.length > 0 ? parts.join(", ") : "-";
}

/**
 * Render totals, per-region breakdown and scope states.
 */
export function formatSummary(summary: ScanSummary): string {
  const lines: string[] = [];
  const state = summary.aborted ? `${summary.state} (aborted)` : summary.state;

  lines.push(`\nAWS Resource Inventory: account ${summary.accountId} [${state}]\n`);

  const totalRows = ORDER.flatMap((key) => {
    const totals = summary.totals[key];
    return totals ? [[LABELS[key], String(totals.count), capacityCell(totals)]] : [];
  });
  lines.push(table(["Resource Type", "Count", "Capacity"], totalRows));

  const regionRows = Object.entries(summary.regions).map(([region, regional]) => [
    region,
    regional.state,
    String(regional.vpcs),
    String(regional.counts.ec2_instances ?? 0),
    String((regional.counts.rds_instances ?? 0) + (regional.counts.rds_clusters ?? 0)),
  ]);
  if (regionRows.length > 0) {
    lines.push("\nBy Region:");
    lines.push(table(["Region", "State", "VPCs", "EC2", "RDS"], regionRows));
  }

  const { complete, partial, failed } = summary.scopes;
  lines.push(`\nScopes: ${complete} complete, ${partial} partial, ${failed} failed`);

  return lines.join("\n");
}
