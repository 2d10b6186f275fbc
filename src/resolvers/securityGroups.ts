/**
 * EC2 security group lookups.
 */

import {
  DescribeSecurityGroupsCommand,
  type Filter,
  type SecurityGroup,
} from "@aws-sdk/client-ec2";
import type { AwsContext } from "@core/context";
import { AmbiguousMatchError, NoMatchError, callAws } from "@core/errors";
import {
  matchesTags,
  projectField,
  requireTags,
  requireValue,
  tagFilters,
  tagsToRecord,
} from "@core/query";
import type { OptionalScope, TagConstraints } from "@/types";
import { setupLogger } from "@shared/utils/logger";

const logger = setupLogger("lookup-filters:security-groups");

export const DEFAULT_GROUP_KEY = "GroupId";

export interface GroupsByNamesQuery extends OptionalScope {
  names: string[];
  vpcId: string;
}

export interface GroupByNameQuery extends OptionalScope {
  name: string;
  vpcId: string;
}

export interface GroupsByTagsQuery extends OptionalScope {
  tags: TagConstraints;
  returnKey?: string;
}

/**
 * Lists security groups matching EC2 filters, following NextToken.
 */
export async function describeSecurityGroups(
  context: AwsContext,
  region: string,
  filters: Filter[],
  profile?: string
): Promise<SecurityGroup[]> {
  const client = context.ec2(region, profile);
  const groups: SecurityGroup[] = [];
  let nextToken: string | undefined;

  do {
    const command = new DescribeSecurityGroupsCommand({ Filters: filters, NextToken: nextToken });
    const response = await callAws("DescribeSecurityGroups", () => client.send(command));
    groups.push(...(response.SecurityGroups ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return groups;
}

/**
 * Resolves the ids of the VPC's security groups with the given group names.
 */
export async function resolveSecurityGroupIdsByNames(
  context: AwsContext,
  query: GroupsByNamesQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const vpcId = requireValue("VPC id", query.vpcId);

  const groups = await describeSecurityGroups(
    context,
    region,
    [
      { Name: "vpc-id", Values: [vpcId] },
      { Name: "group-name", Values: query.names },
    ],
    query.profile
  );
  return groups.flatMap((group) => (group.GroupId ? [group.GroupId] : []));
}

/**
 * Resolves the id of the VPC's single security group with the given group name.
 *
 * @throws {NoMatchError} If no group has the name
 * @throws {AmbiguousMatchError} If several groups have it
 */
export async function resolveSecurityGroupId(
  context: AwsContext,
  query: GroupByNameQuery
): Promise<string> {
  const name = requireValue("security group name", query.name);
  const ids = await resolveSecurityGroupIdsByNames(context, {
    names: [name],
    vpcId: query.vpcId,
    region: query.region,
    profile: query.profile,
  });
  if (ids.length > 1) {
    throw new AmbiguousMatchError(`Too many results for ${name}`);
  }
  if (ids.length === 0) {
    throw new NoMatchError(`Security group ${name} was not found`);
  }
  return ids[0];
}

/**
 * Resolves the CIDR ranges of the first ingress rule of the single security
 * group tagged Name=`name` in the VPC.
 *
 * @throws {NoMatchError} If no group is tagged with the name
 * @throws {AmbiguousMatchError} If several are
 */
export async function resolveSecurityGroupCidrs(
  context: AwsContext,
  query: GroupByNameQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const name = requireValue("security group name", query.name);
  const vpcId = requireValue("VPC id", query.vpcId);

  const groups = await describeSecurityGroups(
    context,
    region,
    [
      { Name: "tag:Name", Values: [name] },
      { Name: "vpc-id", Values: [vpcId] },
    ],
    query.profile
  );
  if (groups.length > 1) {
    throw new AmbiguousMatchError(
      `Too many results for ${name}: ${groups.map((group) => group.GroupId ?? "?").join(",")}`
    );
  }
  if (groups.length === 0) {
    throw new NoMatchError(`Security Group ${name} was not found`);
  }

  const [permission] = groups[0].IpPermissions ?? [];
  return (permission?.IpRanges ?? []).flatMap((range) => (range.CidrIp ? [range.CidrIp] : []));
}

/**
 * Resolves one attribute of every security group whose tags include every constraint.
 */
export async function resolveSecurityGroupsByTags(
  context: AwsContext,
  query: GroupsByTagsQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const tags = requireTags(query.tags);
  const returnKey = query.returnKey ?? DEFAULT_GROUP_KEY;

  const groups = await describeSecurityGroups(context, region, tagFilters(tags), query.profile);
  const values: string[] = [];
  for (const group of groups) {
    if (!matchesTags(tagsToRecord(group.Tags), tags)) {
      continue;
    }
    const value = projectField(group, returnKey);
    if (value === undefined) {
      logger.warn(
        { groupId: group.GroupId, returnKey },
        "Matching security group has no value for the requested attribute, skipping"
      );
      continue;
    }
    values.push(value);
  }
  return values;
}

/**
 * Like resolveSecurityGroupsByTags, but exactly one group must match.
 *
 * @throws {NoMatchError} If no group matches
 * @throws {AmbiguousMatchError} If several match
 */
export async function resolveSecurityGroupByTags(
  context: AwsContext,
  query: GroupsByTagsQuery
): Promise<string> {
  const values = await resolveSecurityGroupsByTags(context, query);
  const where = `tags ${JSON.stringify(query.tags)} in region ${context.region(query.region)}`;
  if (values.length > 1) {
    throw new AmbiguousMatchError(`More than 1 security group was found with ${where}`);
  }
  if (values.length === 0) {
    throw new NoMatchError(`No security group was found with ${where}`);
  }
  return values[0];
}
