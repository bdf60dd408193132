/**
 * Helpers shared by the resource collectors: tag normalization, outcome
 * building from a pagination result, and enrichment issue reporting.
 */

import { formatErrorMessage, toScanIssue } from "../errors.js";
import { fetchAll, type PaginatedResult, type PaginationSpec } from "../pagination/fetcher.js";
import type {
  CollectorOutcome,
  CollectorToken,
  ResourceEntityMap,
  ResourceTags,
  ScanIssue,
} from "../types.js";
import type { ScanContext } from "./context.js";

// =============================================================================
// Tags
// =============================================================================

type RawTag = { Key?: string; Value?: string };

/**
 * Flatten an AWS `[{ Key, Value }]` tag list into a record
 */
export function normalizeTags(tags: readonly RawTag[] | undefined): ResourceTags {
  const result: ResourceTags = {};
  for (const tag of tags ?? []) {
    if (tag.Key) result[tag.Key] = tag.Value ?? "";
  }
  return result;
}

/** Tags plus the `Name` tag surfaced as `name`. */
export function tagFields(tags: readonly RawTag[] | undefined): { name?: string; tags: ResourceTags } {
  const normalized = normalizeTags(tags);
  const name = normalized["Name"];
  return name ? { name, tags: normalized } : { tags: normalized };
}

export function toIso(date: Date | undefined): string | undefined {
  return date ? date.toISOString() : undefined;
}

/**
 * Keep the first entity seen for each identifier.
 */
export function dedupeBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  const result: T[] = [];
  for (const item of items) {
    const id = key(item);
    if (seen.has(id)) continue;
    seen.add(id);
    result.push(item);
  }
  return result;
}

// =============================================================================
// Outcomes
// =============================================================================

/**
 * Issues for a listing that did not finish: nothing when it completed, a
 * failure when no page arrived, `partial_pagination` when it stopped midway.
 */
export function listingIssues(collector: string, operation: string, result: PaginatedResult<unknown>): ScanIssue[] {
  if (result.error === undefined) return [];
  if (!result.truncated) {
    return [toScanIssue(collector, result.error, { operation })];
  }
  const issue = toScanIssue(collector, result.error, { operation, kind: "partial_pagination" });
  issue.message = `Listing stopped after ${result.pages} page(s): ${issue.message}`;
  return [issue];
}

/**
 * Build an outcome from the listings it depends on.
 *
 * Failed when any required listing returned nothing; partial when any was
 * truncated or `extra` carries a non-metrics issue; success otherwise.
 */
export function buildOutcome<K extends CollectorToken>(
  token: K,
  listings: ReadonlyArray<{ operation: string; result: PaginatedResult<unknown> }>,
  entities: ResourceEntityMap[K][],
  extra: ScanIssue[] = [],
): CollectorOutcome<K> {
  const issues = listings.flatMap(({ operation, result }) => listingIssues(token, operation, result));
  const failed = listings.some(({ result }) => result.error !== undefined && !result.truncated);

  if (failed) {
    return { token, status: "failed", entities: [], issues };
  }

  issues.push(...extra);
  const partial = issues.some((issue) => issue.kind !== "metrics_unavailable");
  return { token, status: partial ? "partial" : "success", entities, issues };
}

/**
 * One `metrics_unavailable` issue summarizing failed enrichment lookups.
 */
export function enrichmentIssue(
  token: CollectorToken,
  operation: string,
  failures: readonly unknown[],
  total: number,
): ScanIssue[] {
  if (failures.length === 0) return [];
  const first = failures[0];
  const issue = toScanIssue(token, first, { operation, kind: "metrics_unavailable" });
  issue.message = `${failures.length} of ${total} lookup(s) failed: ${formatErrorMessage(first)}`;
  return [issue];
}

// =============================================================================
// EC2 VPC Listings
// =============================================================================

export function vpcFilter(vpcId: string, name = "vpc-id"): { Name: string; Values: string[] }[] {
  return [{ Name: name, Values: [vpcId] }];
}

/**
 * Drain a listing under the scope's abort signal.
 */
export function fetchListing<TPage, TItem>(
  ctx: Pick<ScanContext, "signal" | "logger">,
  spec: PaginationSpec<TPage, TItem>,
): Promise<PaginatedResult<TItem>> {
  return fetchAll(spec, {
    signal: ctx.signal,
    onPage: (pages) => {
      if (pages > 1) ctx.logger.debug(`${spec.operation}: page ${pages}`);
    },
  });
}
