/**
 * EC2 subnet lookups.
 */

import { DescribeSubnetsCommand, type Filter, type Subnet } from "@aws-sdk/client-ec2";
import type { AwsContext } from "@core/context";
import { callAws } from "@core/errors";
import {
  matchesTags,
  requireRegion,
  requireTags,
  requireValue,
  tagFilters,
  tagsToRecord,
} from "@core/query";
import type { OptionalScope, QueryScope, TagConstraints } from "@/types";
import { setupLogger } from "@shared/utils/logger";

const logger = setupLogger("lookup-filters:subnets");

export interface SubnetsByTagsQuery extends QueryScope {
  vpcId: string;
  tags: TagConstraints;
}

export interface SubnetsByCidrsQuery extends OptionalScope {
  vpcId: string;
  cidrs: string[];
}

export interface SubnetsInZoneQuery extends OptionalScope {
  vpcId: string;
  zone: string;
}

/**
 * Lists subnets matching EC2 filters, following NextToken.
 */
export async function describeSubnets(
  context: AwsContext,
  region: string,
  filters: Filter[],
  profile?: string
): Promise<Subnet[]> {
  const client = context.ec2(region, profile);
  const subnets: Subnet[] = [];
  let nextToken: string | undefined;

  do {
    const command = new DescribeSubnetsCommand({ Filters: filters, NextToken: nextToken });
    const response = await callAws("DescribeSubnets", () => client.send(command));
    subnets.push(...(response.Subnets ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return subnets;
}

function subnetIds(subnets: readonly Subnet[]): string[] {
  return subnets.flatMap((subnet) => (subnet.SubnetId ? [subnet.SubnetId] : []));
}

function byAvailabilityZone(a: Subnet, b: Subnet): number {
  return (a.AvailabilityZone ?? "").localeCompare(b.AvailabilityZone ?? "");
}

/**
 * Resolves the ids of subnets in a VPC whose tags include every constraint.
 *
 * @returns Subnet ids in API order; empty when nothing matches
 *
 * @throws {InvalidQueryError} If region, VPC id or tags are empty
 * @throws {RemoteCallError} If DescribeSubnets fails
 */
export async function resolveSubnetIdsByTags(
  context: AwsContext,
  query: SubnetsByTagsQuery
): Promise<string[]> {
  const region = requireRegion(query.region);
  const vpcId = requireValue("VPC id", query.vpcId);
  const tags = requireTags(query.tags);

  logger.debug({ region, vpcId, tags }, "Resolving subnets by tags");

  const subnets = await describeSubnets(
    context,
    region,
    [{ Name: "vpc-id", Values: [vpcId] }, ...tagFilters(tags)],
    query.profile
  );
  return subnetIds(
    subnets.filter((subnet) => subnet.VpcId === vpcId && matchesTags(tagsToRecord(subnet.Tags), tags))
  );
}

/**
 * Resolves the ids of the VPC's subnets with the given CIDR blocks,
 * ordered by availability zone.
 */
export async function resolveSubnetIds(
  context: AwsContext,
  query: SubnetsByCidrsQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const vpcId = requireValue("VPC id", query.vpcId);

  const subnets = await describeSubnets(
    context,
    region,
    [
      { Name: "vpc-id", Values: [vpcId] },
      { Name: "cidr-block", Values: query.cidrs },
    ],
    query.profile
  );
  return subnetIds([...subnets].sort(byAvailabilityZone));
}

/**
 * Resolves the ids of the VPC's subnets in one availability zone.
 */
export async function resolveSubnetIdsInZone(
  context: AwsContext,
  query: SubnetsInZoneQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const vpcId = requireValue("VPC id", query.vpcId);
  const zone = requireValue("availability zone", query.zone);

  const subnets = await describeSubnets(
    context,
    region,
    [
      { Name: "vpc-id", Values: [vpcId] },
      { Name: "availability-zone", Values: [zone] },
    ],
    query.profile
  );
  return subnetIds(subnets);
}
