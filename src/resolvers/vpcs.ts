/**
 * VPC and availability-zone lookups.
 */

import {
  DescribeAvailabilityZonesCommand,
  DescribeVpcsCommand,
  type Filter,
  type Vpc,
} from "@aws-sdk/client-ec2";
import type { AwsContext } from "@core/context";
import { InvalidQueryError, NoMatchError, callAws } from "@core/errors";
import { requireValue, tagsToRecord } from "@core/query";
import type { OptionalScope, VpcInfo } from "@/types";

/** Returned by vpcExists when no VPC carries the name. */
export const VPC_DOES_NOT_EXIST = "does not exist";

export interface VpcByNameQuery extends OptionalScope {
  name: string;
}

export interface VpcsByNamesQuery extends OptionalScope {
  /** Case-insensitive regular expressions matched against the Name tag */
  vpcNames: string[];
}

export interface VpcsExceptQuery extends OptionalScope {
  exceptIds: string[];
}

/**
 * Lists VPCs matching EC2 filters, following NextToken.
 */
export async function describeVpcs(
  context: AwsContext,
  region: string,
  filters: Filter[],
  profile?: string
): Promise<Vpc[]> {
  const client = context.ec2(region, profile);
  const vpcs: Vpc[] = [];
  let nextToken: string | undefined;

  do {
    const command = new DescribeVpcsCommand({
      Filters: filters.length > 0 ? filters : undefined,
      NextToken: nextToken,
    });
    const response = await callAws("DescribeVpcs", () => client.send(command));
    vpcs.push(...(response.Vpcs ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return vpcs;
}

/**
 * Resolves the id of the first VPC whose Name tag equals `name`.
 *
 * @throws {NoMatchError} If no VPC carries the name
 */
export async function resolveVpcIdByName(
  context: AwsContext,
  query: VpcByNameQuery
): Promise<string> {
  const region = context.region(query.region);
  const name = requireValue("VPC name", query.name);

  const vpcs = await describeVpcs(context, region, [{ Name: "tag:Name", Values: [name] }], query.profile);
  const vpc = vpcs.find((candidate) => tagsToRecord(candidate.Tags).Name === name);
  if (!vpc?.VpcId) {
    throw new NoMatchError(`VPC ID for VPC name ${name} was not found in region ${region}`);
  }
  return vpc.VpcId;
}

/**
 * Returns the VPC id for `name`, or "does not exist". Remote failures still propagate.
 */
export async function vpcExists(context: AwsContext, query: VpcByNameQuery): Promise<string> {
  try {
    return await resolveVpcIdByName(context, query);
  } catch (error) {
    if (error instanceof NoMatchError) {
      return VPC_DOES_NOT_EXIST;
    }
    throw error;
  }
}

/**
 * Resolves the ids of VPCs whose Name tag matches any of the given patterns.
 *
 * @throws {InvalidQueryError} If a pattern is not a valid regular expression
 */
export async function resolveVpcIdsFromNames(
  context: AwsContext,
  query: VpcsByNamesQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const patterns = query.vpcNames.map((name) => {
    try {
      return new RegExp(name, "i");
    } catch (error) {
      throw new InvalidQueryError(`Invalid VPC name pattern '${name}'`, { cause: error });
    }
  });

  const vpcs = await describeVpcs(context, region, [], query.profile);
  const ids: string[] = [];
  for (const vpc of vpcs) {
    const name = tagsToRecord(vpc.Tags).Name;
    if (vpc.VpcId && name !== undefined && patterns.some((pattern) => pattern.test(name))) {
      ids.push(vpc.VpcId);
    }
  }
  return ids;
}

/**
 * Lists available, non-default VPCs except the given ids.
 */
export async function listVpcsExcept(
  context: AwsContext,
  query: VpcsExceptQuery
): Promise<VpcInfo[]> {
  const region = context.region(query.region);
  const excluded = new Set(query.exceptIds);

  const vpcs = await describeVpcs(
    context,
    region,
    [
      { Name: "state", Values: ["available"] },
      { Name: "is-default", Values: ["false"] },
    ],
    query.profile
  );

  return vpcs
    .filter((vpc) => vpc.VpcId && !excluded.has(vpc.VpcId))
    .map((vpc) => ({
      name: tagsToRecord(vpc.Tags).Name ?? "",
      id: vpc.VpcId ?? "",
      cidr: vpc.CidrBlock ?? "",
    }));
}

/**
 * Lists the region's availability zone names, sorted.
 */
export async function listAvailabilityZones(
  context: AwsContext,
  query: OptionalScope = {}
): Promise<string[]> {
  const region = context.region(query.region);
  const client = context.ec2(region, query.profile);
  const response = await callAws("DescribeAvailabilityZones", () =>
    client.send(new DescribeAvailabilityZonesCommand({}))
  );
  return (response.AvailabilityZones ?? [])
    .flatMap((zone) => (zone.ZoneName ? [zone.ZoneName] : []))
    .sort();
}
