/**
 * RDS instance lookups.
 */

import { DescribeDBInstancesCommand, type Endpoint } from "@aws-sdk/client-rds";
import type { AwsContext } from "@core/context";
import { AmbiguousMatchError, NoMatchError, callAws } from "@core/errors";
import { requireRegion, requireValue } from "@core/query";
import type { QueryScope } from "@/types";

export interface DbInstanceQuery extends QueryScope {
  instanceName: string;
}

const NOT_FOUND = ["DBInstanceNotFoundFault", "DBInstanceNotFound"];

async function describeEndpoint(context: AwsContext, query: DbInstanceQuery): Promise<Endpoint> {
  const region = requireRegion(query.region);
  const instanceName = requireValue("DB instance name", query.instanceName);
  const client = context.rds(region, query.profile);

  const response = await callAws(
    "DescribeDBInstances",
    () => client.send(new DescribeDBInstancesCommand({ DBInstanceIdentifier: instanceName })),
    NOT_FOUND
  );
  const instances = response.DBInstances ?? [];
  if (instances.length > 1) {
    throw new AmbiguousMatchError(`More than 1 RDS instance found for ${instanceName}`);
  }
  const endpoint = instances[0]?.Endpoint;
  if (!endpoint) {
    throw new NoMatchError(`DBInstance ${instanceName} not found or has no endpoint yet`);
  }
  return endpoint;
}

/**
 * Resolves the endpoint address of an RDS instance.
 *
 * @throws {NoMatchError} If the instance does not exist or has no endpoint
 */
export async function resolveRdsEndpoint(
  context: AwsContext,
  query: DbInstanceQuery
): Promise<string> {
  const endpoint = await describeEndpoint(context, query);
  if (!endpoint.Address) {
    throw new NoMatchError(`DBInstance ${query.instanceName} has no endpoint address`);
  }
  return endpoint.Address;
}

/**
 * Resolves the Route 53 hosted zone id of an RDS instance's endpoint.
 *
 * @throws {NoMatchError} If the instance does not exist or has no endpoint
 */
export async function resolveRdsHostedZoneId(
  context: AwsContext,
  query: DbInstanceQuery
): Promise<string> {
  const endpoint = await describeEndpoint(context, query);
  if (!endpoint.HostedZoneId) {
    throw new NoMatchError(`DBInstance ${query.instanceName} has no hosted zone id`);
  }
  return endpoint.HostedZoneId;
}
