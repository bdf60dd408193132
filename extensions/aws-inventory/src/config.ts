/**
 * Scan Configuration
 *
 * Schema-based validation of the options handed to the account scanner,
 * using Zod, and resolution of resource-type exclusion tokens.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import {
  NETWORK_TOKENS,
  RESOURCE_TYPE_TOKENS,
  isResourceTypeToken,
  type ResourceTypeToken,
} from "./types.js";

// =============================================================================
// Zod Schemas
// =============================================================================

const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

const regionSchema = z.string().regex(REGION_PATTERN, "expected an AWS region identifier such as us-east-1");

/**
 * Scan config schema
 */
export const scanConfigSchema = z.object({
  /** Restrict the scan to these regions; all enabled regions when omitted. */
  regions: z.array(regionSchema).min(1).optional(),
  /** Resource-type tokens or aliases to leave out of the document. */
  exclude: z.array(z.string().min(1)).default([]),
  /** Regions dropped after resolution. */
  excludeRegions: z.array(regionSchema).default([]),
  outputPath: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
  profile: z.string().min(1).optional(),
  /** Region used for account-level calls (STS, S3 ListBuckets, DescribeRegions). */
  homeRegion: regionSchema.optional(),
  regionConcurrency: z.number().int().positive().max(32).default(4),
  vpcConcurrency: z.number().int().positive().max(32).default(4),
  /** SDK attempts per request, including the first. */
  maxAttempts: z.number().int().min(1).max(20).default(5),
  /** How far back to look for the latest daily S3 storage metric. */
  metricsLookbackDays: z.number().int().min(1).max(14).default(3),
});

export type ScanConfigInput = z.input<typeof scanConfigSchema>;

export type ScanConfig = Omit<z.output<typeof scanConfigSchema>, "exclude" | "homeRegion"> & {
  homeRegion: string;
  excluded: ReadonlySet<ResourceTypeToken>;
};

// =============================================================================
// Exclusion Tokens
// =============================================================================

const TOKEN_ALIASES: Record<string, readonly ResourceTypeToken[]> = {
  s3: ["s3_buckets"],
  dynamodb: ["dynamodb_tables"],
  ec2: ["ec2_instances"],
  ebs: ["ebs_volumes"],
  rds: ["rds_instances", "rds_clusters"],
  efs: ["efs_filesystems"],
  fsx: ["fsx_filesystems"],
  redshift: ["redshift_clusters"],
  network: NETWORK_TOKENS,
  sg: ["security_groups"],
};

/**
 * Expand tokens and aliases into canonical resource-type tokens.
 * Matching ignores case and accepts hyphens for underscores.
 */
export function resolveExclusions(values: readonly string[]): ResourceTypeToken[] {
  const resolved = new Set<ResourceTypeToken>();
  const unknown: string[] = [];

  for (const raw of values) {
    const value = raw.trim().toLowerCase().replace(/-/g, "_");
    if (!value) continue;
    if (isResourceTypeToken(value)) {
      resolved.add(value);
      continue;
    }
    const alias = TOKEN_ALIASES[value];
    if (alias) {
      for (const token of alias) resolved.add(token);
      continue;
    }
    unknown.push(raw);
  }

  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown resource type(s): ${unknown.join(", ")}`,
      [`valid tokens: ${RESOURCE_TYPE_TOKENS.join(", ")}`, `aliases: ${Object.keys(TOKEN_ALIASES).join(", ")}`],
    );
  }

  return RESOURCE_TYPE_TOKENS.filter((token) => resolved.has(token));
}

// =============================================================================
// Loading
// =============================================================================

function envRegion(env: NodeJS.ProcessEnv): string | undefined {
  const value = env.AWS_REGION ?? env.AWS_DEFAULT_REGION;
  return value && REGION_PATTERN.test(value) ? value : undefined;
}

/**
 * Validate raw options and apply defaults.
 *
 * @throws ConfigError when validation fails or an exclusion token is unknown
 */
export function loadScanConfig(input: unknown = {}, env: NodeJS.ProcessEnv = process.env): ScanConfig {
  const parsed = scanConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ConfigError(`Invalid scan configuration: ${issues.join("; ")}`, issues);
  }

  const { exclude, homeRegion, ...rest } = parsed.data;

  return {
    ...rest,
    profile: rest.profile ?? (env.AWS_PROFILE || undefined),
    homeRegion: homeRegion ?? envRegion(env) ?? "us-east-1",
    excluded: new Set(resolveExclusions(exclude)),
  };
}
