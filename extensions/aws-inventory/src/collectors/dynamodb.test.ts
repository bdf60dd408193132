import { describe, it, expect } from "vitest";
import { DescribeTableCommand, ListTablesCommand } from "@aws-sdk/client-dynamodb";
import { FakeAws, FakeServiceError } from "../testing/fake-aws.js";
import { regionScope } from "../testing/scopes.js";
import { dynamoDbTablesCollector } from "./dynamodb.js";

function tablesFake(): FakeAws {
  return new FakeAws()
    .on(ListTablesCommand, (input) =>
      input.ExclusiveStartTableName
        ? { TableNames: ["events"] }
        : { TableNames: ["orders", "users"], LastEvaluatedTableName: "users" },
    )
    .on(DescribeTableCommand, (input) => {
      if (input.TableName === "events") throw new FakeServiceError("ResourceNotFoundException", "Table not found");
      if (input.TableName === "users") return { Table: { TableStatus: "ACTIVE", ItemCount: 2, TableSizeBytes: 80 } };
      return {
        Table: {
          TableStatus: "ACTIVE",
          BillingModeSummary: { BillingMode: "PAY_PER_REQUEST" },
          ItemCount: 5,
          TableSizeBytes: 1024,
        },
      };
    });
}

describe("dynamoDbTablesCollector", () => {
  it("should list every page and describe each table", async () => {
    const fake = tablesFake();

    const outcome = await dynamoDbTablesCollector.collect(regionScope(fake, "eu-west-1"));

    expect(outcome.status).toBe("success");
    expect(outcome.entities).toEqual([
      {
        resource_type: "dynamodb:table",
        table_name: "orders",
        region: "eu-west-1",
        table_status: "ACTIVE",
        billing_mode: "PAY_PER_REQUEST",
        item_count: 5,
        size_bytes: 1024,
      },
      {
        resource_type: "dynamodb:table",
        table_name: "users",
        region: "eu-west-1",
        table_status: "ACTIVE",
        billing_mode: "PROVISIONED",
        item_count: 2,
        size_bytes: 80,
      },
      { resource_type: "dynamodb:table", table_name: "events", region: "eu-west-1" },
    ]);
    expect(fake.callsOf(ListTablesCommand).map((call) => call.input)).toEqual([
      { ExclusiveStartTableName: undefined },
      { ExclusiveStartTableName: "users" },
    ]);
  });

  it("should record failed descriptions without lowering the state", async () => {
    const outcome = await dynamoDbTablesCollector.collect(regionScope(tablesFake()));

    expect(outcome.issues).toEqual([
      {
        kind: "metrics_unavailable",
        collector: "dynamodb_tables",
        operation: "dynamodb:DescribeTable",
        message: "1 of 3 lookup(s) failed: Table not found",
        code: "ResourceNotFoundException",
      },
    ]);
  });

  it("should fail when tables cannot be listed", async () => {
    const fake = new FakeAws().fail(ListTablesCommand, "AccessDeniedException");

    const outcome = await dynamoDbTablesCollector.collect(regionScope(fake));

    expect(outcome).toMatchObject({ token: "dynamodb_tables", status: "failed", entities: [] });
    expect(fake.callsOf(DescribeTableCommand)).toHaveLength(0);
  });
});
