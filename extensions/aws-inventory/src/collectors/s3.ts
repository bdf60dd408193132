/**
 * S3 buckets of the account.
 *
 * Capacity comes from the daily CloudWatch storage metrics in each bucket's
 * own region. `BucketSizeBytes` is published per storage class, so the size
 * is the sum of the latest datapoint of every class CloudWatch lists for the
 * bucket. A bucket without any datapoint keeps its record and no capacity
 * fields.
 */

import { GetBucketLocationCommand, ListBucketsCommand, type Bucket } from "@aws-sdk/client-s3";
import { GetMetricStatisticsCommand, ListMetricsCommand, type Datapoint } from "@aws-sdk/client-cloudwatch";
import { mapWithConcurrency } from "../concurrency.js";
import { ScanAbortedError } from "../errors.js";
import type { S3Bucket } from "../types.js";
import type { GlobalScope } from "./context.js";
import type { ResourceCollector } from "./registry.js";
import { buildOutcome, dedupeBy, enrichmentIssue, fetchListing, toIso } from "./shared.js";

const DAY_SECONDS = 86_400;

type StorageMetric = {
  name: "BucketSizeBytes" | "NumberOfObjects";
  storageType: string;
};

const BUCKET_SIZE_METRIC_NAME = "BucketSizeBytes";
export const OBJECT_COUNT_METRIC: StorageMetric = { name: "NumberOfObjects", storageType: "AllStorageTypes" };

/**
 * Map a GetBucketLocation constraint onto a region name.
 */
export function regionFromLocation(constraint: string | undefined): string {
  if (!constraint) return "us-east-1";
  if (constraint === "EU") return "eu-west-1";
  return constraint;
}

export function latestDatapoint(datapoints: readonly Datapoint[] | undefined): Datapoint | undefined {
  let latest: Datapoint | undefined;
  for (const point of datapoints ?? []) {
    if (point.Average === undefined || !point.Timestamp) continue;
    if (!latest?.Timestamp || point.Timestamp.getTime() > latest.Timestamp.getTime()) latest = point;
  }
  return latest;
}

async function bucketRegion(scope: GlobalScope, bucket: Bucket & { Name: string }): Promise<string> {
  if (bucket.BucketRegion) return bucket.BucketRegion;
  const s3 = scope.pool.get("s3", scope.region);
  const response = await s3.send(new GetBucketLocationCommand({ Bucket: bucket.Name }), { abortSignal: scope.signal });
  return regionFromLocation(response.LocationConstraint);
}

async function storageMetric(
  scope: GlobalScope,
  region: string,
  bucketName: string,
  metric: StorageMetric,
): Promise<Datapoint | undefined> {
  const cloudwatch = scope.pool.get("cloudwatch", region);
  const end = scope.now();
  const start = new Date(end.getTime() - scope.metricsLookbackDays * DAY_SECONDS * 1000);
  const response = await cloudwatch.send(
    new GetMetricStatisticsCommand({
      Namespace: "AWS/S3",
      MetricName: metric.name,
      Dimensions: [
        { Name: "BucketName", Value: bucketName },
        { Name: "StorageType", Value: metric.storageType },
      ],
      StartTime: start,
      EndTime: end,
      Period: DAY_SECONDS,
      Statistics: ["Average"],
    }),
    { abortSignal: scope.signal },
  );
  return latestDatapoint(response.Datapoints);
}

/**
 * Storage classes with a `BucketSizeBytes` series for the bucket.
 */
async function sizeStorageTypes(scope: GlobalScope, region: string, bucketName: string): Promise<string[]> {
  const cloudwatch = scope.pool.get("cloudwatch", region);
  const result = await fetchListing(scope, {
    operation: "cloudwatch:ListMetrics",
    fetchPage: (NextToken, abortSignal) =>
      cloudwatch.send(
        new ListMetricsCommand({
          Namespace: "AWS/S3",
          MetricName: BUCKET_SIZE_METRIC_NAME,
          Dimensions: [{ Name: "BucketName", Value: bucketName }],
          NextToken,
        }),
        { abortSignal },
      ),
    items: (page) => page.Metrics,
    nextToken: (page) => page.NextToken,
  });
  if (result.error !== undefined) throw result.error;

  const types = result.items.flatMap((metric) =>
    (metric.Dimensions ?? []).flatMap((dimension) =>
      dimension.Name === "StorageType" && dimension.Value ? [dimension.Value] : [],
    ),
  );
  return [...new Set(types)];
}

/**
 * Latest datapoint of each storage class, summed.
 */
export function sumDatapoints(points: ReadonlyArray<Datapoint | undefined>): { total: number; timestamp?: Date } | undefined {
  let total: number | undefined;
  let timestamp: Date | undefined;
  for (const point of points) {
    if (point?.Average === undefined) continue;
    total = (total ?? 0) + point.Average;
    if (point.Timestamp && (!timestamp || point.Timestamp.getTime() > timestamp.getTime())) timestamp = point.Timestamp;
  }
  return total === undefined ? undefined : { total, timestamp };
}

async function bucketSize(scope: GlobalScope, region: string, bucketName: string) {
  const types = await sizeStorageTypes(scope, region, bucketName);
  const points = await Promise.all(
    types.map((storageType) => storageMetric(scope, region, bucketName, { name: BUCKET_SIZE_METRIC_NAME, storageType })),
  );
  return sumDatapoints(points);
}

async function describeBucket(scope: GlobalScope, bucket: Bucket & { Name: string }): Promise<S3Bucket> {
  const region = await bucketRegion(scope, bucket);
  const [size, objects] = await Promise.all([
    bucketSize(scope, region, bucket.Name),
    storageMetric(scope, region, bucket.Name, OBJECT_COUNT_METRIC),
  ]);

  const entity = toS3Bucket(bucket, region);
  if (size) {
    entity.size_bytes = Math.round(size.total);
    entity.metrics_timestamp = toIso(size.timestamp);
  }
  if (objects?.Average !== undefined) {
    entity.object_count = Math.round(objects.Average);
  }
  return entity;
}

export function toS3Bucket(bucket: Bucket & { Name: string }, region: string): S3Bucket {
  return {
    resource_type: "s3:bucket",
    bucket_name: bucket.Name,
    region,
    creation_date: toIso(bucket.CreationDate),
  };
}

export const s3BucketsCollector: ResourceCollector<"s3_buckets", "global", GlobalScope> = {
  token: "s3_buckets",
  scope: "global",
  collect: async (scope) => {
    const s3 = scope.pool.get("s3", scope.region);
    const result = await fetchListing(scope, {
      operation: "s3:ListBuckets",
      fetchPage: (ContinuationToken, abortSignal) =>
        s3.send(new ListBucketsCommand({ ContinuationToken, MaxBuckets: 1000 }), { abortSignal }),
      items: (page) => page.Buckets,
      nextToken: (page) => page.ContinuationToken,
    });

    const buckets = dedupeBy(
      result.items.flatMap((bucket) => (bucket.Name ? [{ ...bucket, Name: bucket.Name }] : [])),
      (bucket) => bucket.Name,
    );

    const described = await mapWithConcurrency(
      buckets,
      scope.enrichmentConcurrency,
      (bucket) => describeBucket(scope, bucket),
      scope.signal,
    );

    const failures: unknown[] = [];
    const entities = described.map((task) => {
      if (task.status === "fulfilled") {
        if (task.value.size_bytes === undefined) {
          failures.push(new Error(`No storage datapoint for ${task.item.Name} in the last ${scope.metricsLookbackDays} day(s)`));
        }
        return task.value;
      }
      failures.push(task.status === "rejected" ? task.reason : new ScanAbortedError("s3:GetBucketLocation"));
      return toS3Bucket(task.item, task.item.BucketRegion ?? "unknown");
    });

    return buildOutcome(
      "s3_buckets",
      [{ operation: "s3:ListBuckets", result }],
      entities,
      enrichmentIssue("s3_buckets", "cloudwatch:GetMetricStatistics", failures, buckets.length),
    );
  },
};
