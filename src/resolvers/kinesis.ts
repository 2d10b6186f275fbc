/**
 * Kinesis stream lookups.
 */

import { DescribeStreamSummaryCommand } from "@aws-sdk/client-kinesis";
import type { AwsContext } from "@core/context";
import { NoMatchError, callAws } from "@core/errors";
import { requireValue } from "@core/query";
import type { OptionalScope } from "@/types";

export interface StreamQuery extends OptionalScope {
  streamName: string;
}

/**
 * Resolves the ARN of a Kinesis stream.
 *
 * @throws {NoMatchError} If the stream does not exist
 */
export async function resolveKinesisStreamArn(
  context: AwsContext,
  query: StreamQuery
): Promise<string> {
  const streamName = requireValue("stream name", query.streamName);
  const client = context.kinesis(context.region(query.region), query.profile);

  const response = await callAws(
    "DescribeStreamSummary",
    () => client.send(new DescribeStreamSummaryCommand({ StreamName: streamName })),
    ["ResourceNotFoundException"]
  );
  const arn = response.StreamDescriptionSummary?.StreamARN;
  if (!arn) {
    throw new NoMatchError(`Unable to find Kinesis Stream ${streamName}`);
  }
  return arn;
}
