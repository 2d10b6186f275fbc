/**
 * DynamoDB lookups.
 */

import { DescribeTableCommand, ListTablesCommand } from "@aws-sdk/client-dynamodb";
import type { AwsContext } from "@core/context";
import { NoMatchError, callAws } from "@core/errors";
import type { OptionalScope } from "@/types";

/**
 * Resolves the account's DynamoDB table ARN prefix
 * (e.g. `arn:aws:dynamodb:us-west-2:123456789012:table`) from any one table.
 *
 * @throws {NoMatchError} If the region has no tables
 */
export async function resolveDynamoDbBaseArn(
  context: AwsContext,
  query: OptionalScope = {}
): Promise<string> {
  const client = context.dynamodb(context.region(query.region), query.profile);

  const { TableNames: tableNames = [] } = await callAws("ListTables", () =>
    client.send(new ListTablesCommand({ Limit: 1 }))
  );
  const [tableName] = tableNames;
  if (!tableName) {
    throw new NoMatchError("Unable to find 1 DynamoDB Table");
  }

  const response = await callAws(
    "DescribeTable",
    () => client.send(new DescribeTableCommand({ TableName: tableName })),
    ["ResourceNotFoundException"]
  );
  const arn = response.Table?.TableArn;
  if (!arn) {
    throw new NoMatchError(`DynamoDB table ${tableName} has no ARN`);
  }
  return arn.split("/")[0];
}
