/**
 * Running collectors and folding their outcomes into a scope.
 */

import { toScanIssue } from "../errors.js";
import type { InventoryLogger } from "../logger.js";
import type { CollectorOutcome, CollectorToken, Collections, ScanIssue, ScopeStatus } from "../types.js";

type Runnable<K extends CollectorToken, S> = {
  token: K;
  collect: (scope: S) => Promise<CollectorOutcome<K>>;
};

/**
 * Run one collector. A collector that throws is reported as failed.
 */
export async function runCollector<K extends CollectorToken, S>(
  collector: Runnable<K, S>,
  scope: S,
  logger: InventoryLogger,
): Promise<CollectorOutcome<K>> {
  try {
    const outcome = await collector.collect(scope);
    if (outcome.status !== "success") {
      logger.warn(`${collector.token}: ${outcome.status} (${outcome.issues.map((i) => i.message).join("; ")})`);
    } else {
      logger.debug(`${collector.token}: ${outcome.entities.length}`);
    }
    return outcome;
  } catch (err) {
    const issue = toScanIssue(collector.token, err);
    logger.error(`${collector.token}: ${issue.message}`);
    return { token: collector.token, status: "failed", entities: [], issues: [issue] };
  }
}

/**
 * Store an outcome's entities under its token. A failed outcome leaves the
 * key absent.
 */
export function mergeOutcome<T extends CollectorToken, K extends T>(
  target: Collections<T>,
  outcome: CollectorOutcome<K>,
): void {
  if (outcome.status === "failed") return;
  target[outcome.token] = outcome.entities;
}

/**
 * Status of a scope from its own issues, its collectors and its children.
 * `metrics_unavailable` issues never lower the state.
 */
export function scopeStatus(
  issues: ScanIssue[],
  outcomes: ReadonlyArray<CollectorOutcome<CollectorToken>>,
  children: ReadonlyArray<ScopeStatus> = [],
): ScopeStatus {
  const degraded =
    issues.some((issue) => issue.kind !== "metrics_unavailable") ||
    outcomes.some((outcome) => outcome.status !== "success") ||
    children.some((child) => child.state !== "complete");
  return { state: degraded ? "partial" : "complete", issues };
}
