/**
 * Scope builders for collector and orchestrator tests.
 */

import { AwsClientPool } from "../clients/pool.js";
import type { GlobalScope, RegionScope, ScanContext, VpcScope } from "../collectors/context.js";
import { createRegionLookups } from "../collectors/region-lookups.js";
import { silentLogger } from "../logger.js";
import type { ResourceTypeToken } from "../types.js";
import type { FakeAws } from "./fake-aws.js";

export const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");

export function testContext(fake: FakeAws, overrides: Partial<ScanContext> = {}): ScanContext {
  return {
    pool: new AwsClientPool({ factory: fake.factory }),
    excluded: new Set<ResourceTypeToken>(),
    logger: silentLogger,
    metricsLookbackDays: 3,
    enrichmentConcurrency: 4,
    now: () => FIXED_NOW,
    ...overrides,
  };
}

export function globalScope(fake: FakeAws, overrides: Partial<ScanContext> = {}): GlobalScope {
  return { ...testContext(fake, overrides), region: "us-east-1" };
}

export function regionScope(fake: FakeAws, region = "us-east-1", overrides: Partial<ScanContext> = {}): RegionScope {
  const ctx = testContext(fake, overrides);
  return {
    ...ctx,
    region,
    lookups: createRegionLookups({
      pool: ctx.pool,
      region,
      logger: ctx.logger,
      signal: ctx.signal,
      enrichmentConcurrency: ctx.enrichmentConcurrency,
    }),
  };
}

export function vpcScope(
  fake: FakeAws,
  vpcId = "vpc-abc",
  region = "us-east-1",
  overrides: Partial<ScanContext> = {},
): VpcScope {
  return { ...regionScope(fake, region, overrides), vpcId };
}
