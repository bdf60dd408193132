/**
 * DynamoDB tables of a region, with size and item count from DescribeTable.
 */

import { DescribeTableCommand, ListTablesCommand, type TableDescription } from "@aws-sdk/client-dynamodb";
import { mapWithConcurrency } from "../concurrency.js";
import { ScanAbortedError } from "../errors.js";
import type { DynamoDbTable } from "../types.js";
import type { RegionScope } from "./context.js";
import type { ResourceCollector } from "./registry.js";
import { buildOutcome, enrichmentIssue, fetchListing } from "./shared.js";

export function toDynamoDbTable(name: string, region: string, table?: TableDescription): DynamoDbTable {
  const entity: DynamoDbTable = { resource_type: "dynamodb:table", table_name: name, region };
  if (table) {
    entity.table_status = table.TableStatus;
    entity.billing_mode = table.BillingModeSummary?.BillingMode ?? "PROVISIONED";
    entity.item_count = table.ItemCount;
    entity.size_bytes = table.TableSizeBytes;
  }
  return entity;
}

export const dynamoDbTablesCollector: ResourceCollector<"dynamodb_tables", "region", RegionScope> = {
  token: "dynamodb_tables",
  scope: "region",
  collect: async (scope) => {
    const dynamodb = scope.pool.get("dynamodb", scope.region);
    const result = await fetchListing(scope, {
      operation: "dynamodb:ListTables",
      fetchPage: (ExclusiveStartTableName, abortSignal) =>
        dynamodb.send(new ListTablesCommand({ ExclusiveStartTableName }), { abortSignal }),
      items: (page) => page.TableNames,
      nextToken: (page) => page.LastEvaluatedTableName,
    });

    const names = [...new Set(result.items)];
    const described = await mapWithConcurrency(
      names,
      scope.enrichmentConcurrency,
      async (TableName) => {
        const response = await dynamodb.send(new DescribeTableCommand({ TableName }), { abortSignal: scope.signal });
        return response.Table;
      },
      scope.signal,
    );

    const failures: unknown[] = [];
    const entities = described.map((task) => {
      if (task.status === "fulfilled" && task.value) return toDynamoDbTable(task.item, scope.region, task.value);
      if (task.status === "fulfilled") {
        failures.push(new Error(`DescribeTable returned no table for ${task.item}`));
        return toDynamoDbTable(task.item, scope.region);
      }
      failures.push(task.status === "rejected" ? task.reason : new ScanAbortedError("dynamodb:DescribeTable"));
      return toDynamoDbTable(task.item, scope.region);
    });

    return buildOutcome(
      "dynamodb_tables",
      [{ operation: "dynamodb:ListTables", result }],
      entities,
      enrichmentIssue("dynamodb_tables", "dynamodb:DescribeTable", failures, names.length),
    );
  },
};
