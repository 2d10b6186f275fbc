/**
 * EC2 route table lookups.
 */

import {
  DescribeRouteTablesCommand,
  type DescribeRouteTablesCommandInput,
  type RouteTable,
} from "@aws-sdk/client-ec2";
import type { AwsContext } from "@core/context";
import { callAws } from "@core/errors";
import { requireValue } from "@core/query";
import type { OptionalScope } from "@/types";
import { resolveVpcIdsFromNames } from "@resolvers/vpcs";

export interface RouteTablesInVpcQuery extends OptionalScope {
  vpcId: string;
  /** Main route tables instead of custom ones */
  main?: boolean;
}

export interface RouteTablesExceptVpcQuery extends OptionalScope {
  vpcId: string;
}

export interface RouteTablesExceptVpcNamesQuery extends OptionalScope {
  vpcNames: string[];
}

export interface RouteTableSubnetsQuery extends OptionalScope {
  routeTableId: string;
}

const NON_MAIN = [{ Name: "association.main", Values: ["false"] }];

/**
 * Lists route tables for a DescribeRouteTables input, following NextToken.
 */
export async function describeRouteTables(
  context: AwsContext,
  region: string,
  input: Omit<DescribeRouteTablesCommandInput, "NextToken">,
  profile?: string
): Promise<RouteTable[]> {
  const client = context.ec2(region, profile);
  const routeTables: RouteTable[] = [];
  let nextToken: string | undefined;

  do {
    const command = new DescribeRouteTablesCommand({ ...input, NextToken: nextToken });
    const response = await callAws("DescribeRouteTables", () => client.send(command));
    routeTables.push(...(response.RouteTables ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return routeTables;
}

function routeTableIds(routeTables: readonly RouteTable[]): string[] {
  return routeTables.flatMap((table) => (table.RouteTableId ? [table.RouteTableId] : []));
}

/**
 * Resolves the VPC's custom (or, with `main`, main) route table ids.
 */
export async function resolveRouteTableIds(
  context: AwsContext,
  query: RouteTablesInVpcQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const vpcId = requireValue("VPC id", query.vpcId);

  const tables = await describeRouteTables(
    context,
    region,
    {
      Filters: [
        { Name: "vpc-id", Values: [vpcId] },
        { Name: "association.main", Values: [String(query.main ?? false)] },
      ],
    },
    query.profile
  );
  return routeTableIds(tables);
}

/**
 * Resolves the ids of every custom route table in the region.
 */
export async function resolveAllRouteTableIds(
  context: AwsContext,
  query: OptionalScope = {}
): Promise<string[]> {
  const region = context.region(query.region);
  const tables = await describeRouteTables(context, region, { Filters: NON_MAIN }, query.profile);
  return routeTableIds(tables);
}

/**
 * Resolves the ids of custom route tables outside one VPC.
 */
export async function resolveRouteTableIdsExceptVpc(
  context: AwsContext,
  query: RouteTablesExceptVpcQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const vpcId = requireValue("VPC id", query.vpcId);

  const tables = await describeRouteTables(context, region, { Filters: NON_MAIN }, query.profile);
  return routeTableIds(tables.filter((table) => table.VpcId !== vpcId));
}

/**
 * Resolves the ids of custom route tables outside every VPC whose Name tag
 * matches one of `vpcNames`.
 */
export async function resolveRouteTableIdsExceptVpcNames(
  context: AwsContext,
  query: RouteTablesExceptVpcNamesQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const excluded = new Set(
    await resolveVpcIdsFromNames(context, {
      vpcNames: query.vpcNames,
      region,
      profile: query.profile,
    })
  );

  const tables = await describeRouteTables(context, region, { Filters: NON_MAIN }, query.profile);
  return routeTableIds(tables.filter((table) => !table.VpcId || !excluded.has(table.VpcId)));
}

/**
 * Resolves the ids of subnets explicitly associated with a route table.
 */
export async function resolveSubnetIdsInRouteTable(
  context: AwsContext,
  query: RouteTableSubnetsQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const routeTableId = requireValue("route table id", query.routeTableId);

  const tables = await describeRouteTables(
    context,
    region,
    { RouteTableIds: [routeTableId] },
    query.profile
  );
  return tables.flatMap((table) =>
    (table.Associations ?? []).flatMap((association) =>
      association.SubnetId ? [association.SubnetId] : []
    )
  );
}
