/**
 * SQS queue lookups.
 */

import { GetQueueAttributesCommand, GetQueueUrlCommand } from "@aws-sdk/client-sqs";
import type { AwsContext } from "@core/context";
import { NoMatchError, callAws } from "@core/errors";
import { requireValue } from "@core/query";
import type { OptionalScope } from "@/types";

export type QueueKey = "arn" | "url";

export interface QueueQuery extends OptionalScope {
  name: string;
  key?: QueueKey;
}

const NOT_FOUND = ["QueueDoesNotExist", "AWS.SimpleQueueService.NonExistentQueue"];

/**
 * Resolves the ARN (default) or URL of an SQS queue by name.
 *
 * @throws {NoMatchError} If the queue does not exist
 */
export async function resolveQueueAttribute(
  context: AwsContext,
  query: QueueQuery
): Promise<string> {
  const name = requireValue("queue name", query.name);
  const client = context.sqs(context.region(query.region), query.profile);

  const { QueueUrl: url } = await callAws(
    "GetQueueUrl",
    () => client.send(new GetQueueUrlCommand({ QueueName: name })),
    NOT_FOUND
  );
  if (!url) {
    throw new NoMatchError(`SQS queue ${name} was not found`);
  }
  if ((query.key ?? "arn") === "url") {
    return url;
  }

  const response = await callAws(
    "GetQueueAttributes",
    () => client.send(new GetQueueAttributesCommand({ QueueUrl: url, AttributeNames: ["QueueArn"] })),
    NOT_FOUND
  );
  const arn = response.Attributes?.QueueArn;
  if (!arn) {
    throw new NoMatchError(`SQS queue ${name} has no QueueArn attribute`);
  }
  return arn;
}
