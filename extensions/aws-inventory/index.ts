/**
 * AWS Inventory
 *
 * Read-only inventory of an AWS account's compute and storage resources,
 * grouped by region and VPC.
 */

export * from "./src/types.js";
export {
  ConfigError,
  CredentialsError,
  ScanAbortedError,
  classifyAwsError,
  formatErrorMessage,
  isScopeInaccessible,
} from "./src/errors.js";
export { createConsoleLogger, silentLogger, type InventoryLogger } from "./src/logger.js";
export { loadScanConfig, resolveExclusions, scanConfigSchema, type ScanConfig, type ScanConfigInput } from "./src/config.js";
export { fetchAll, paginate, type PaginatedResult, type PaginationSpec } from "./src/pagination/fetcher.js";
export { mapWithConcurrency, type SettledTask } from "./src/concurrency.js";
export {
  AwsClientPool,
  createClientPool,
  sdkClientFactory,
  type AwsClientFactory,
  type AwsServiceClients,
  type AwsServiceName,
} from "./src/clients/pool.js";
export {
  CollectorRegistry,
  createDefaultRegistry,
  type AnyCollector,
  type GlobalCollector,
  type RegionCollector,
  type ResourceCollector,
  type VpcCollector,
} from "./src/collectors/registry.js";
export type { GlobalScope, RegionScope, ScanContext, VpcScope } from "./src/collectors/context.js";
export { aggregateVpc } from "./src/orchestrator/vpc.js";
export { scanRegion } from "./src/orchestrator/region.js";
export { AccountScanner, DEFAULT_REGIONS, scanAccount, type AccountScanOptions } from "./src/orchestrator/account.js";
export { summarize, type ScanSummary, type TypeTotals } from "./src/summary/reducer.js";
export { formatSummary } from "./src/summary/format.js";
export { toDocument, type InventoryDocument } from "./src/document.js";
export { defaultOutputName, serializeDocument, writeDocument } from "./src/output/writer.js";
export { createScanProgress, type ProgressReporter } from "./src/progress.js";
export { registerInventoryCli, type CliContext } from "./src/cli/cli.js";
