import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mockClient } from "aws-sdk-client-mock";
import { EC2Client, DescribeRouteTablesCommand, DescribeVpcsCommand } from "@aws-sdk/client-ec2";
import type { AwsContext } from "@core/context";
import {
  resolveAllRouteTableIds,
  resolveRouteTableIds,
  resolveRouteTableIdsExceptVpc,
  resolveRouteTableIdsExceptVpcNames,
  resolveSubnetIdsInRouteTable,
} from "@resolvers/routeTables";
import { createTestContext, createVpc } from "../../helpers/fixtures";

const ec2Mock = mockClient(EC2Client);

const ROUTE_TABLES = [
  { RouteTableId: "rtb-app", VpcId: "vpc-app" },
  { RouteTableId: "rtb-ops", VpcId: "vpc-ops" },
  { RouteTableId: "rtb-shared", VpcId: "vpc-shared" },
];

describe("route table resolvers", () => {
  let context: AwsContext;

  beforeEach(() => {
    ec2Mock.reset();
    context = createTestContext();
  });

  afterEach(() => {
    context.destroy();
  });

  it("should list the VPC's custom route tables", async () => {
    ec2Mock.on(DescribeRouteTablesCommand).resolves({ RouteTables: [ROUTE_TABLES[0]] });

    await expect(resolveRouteTableIds(context, { vpcId: "vpc-app" })).resolves.toEqual(["rtb-app"]);
    expect(ec2Mock.call(0).args[0].input).toMatchObject({
      Filters: [
        { Name: "vpc-id", Values: ["vpc-app"] },
        { Name: "association.main", Values: ["false"] },
      ],
    });
  });

  it("should list the main route table when asked", async () => {
    ec2Mock.on(DescribeRouteTablesCommand).resolves({ RouteTables: [{ RouteTableId: "rtb-main" }] });

    await expect(resolveRouteTableIds(context, { vpcId: "vpc-app", main: true })).resolves.toEqual(["rtb-main"]);
    expect(ec2Mock.call(0).args[0].input).toMatchObject({
      Filters: [
        { Name: "vpc-id", Values: ["vpc-app"] },
        { Name: "association.main", Values: ["true"] },
      ],
    });
  });

  it("should list every custom route table across pages", async () => {
    ec2Mock
      .on(DescribeRouteTablesCommand)
      .resolvesOnce({ RouteTables: ROUTE_TABLES.slice(0, 2), NextToken: "more" })
      .resolvesOnce({ RouteTables: ROUTE_TABLES.slice(2) });

    await expect(resolveAllRouteTableIds(context)).resolves.toEqual(["rtb-app", "rtb-ops", "rtb-shared"]);
    expect(ec2Mock.calls()).toHaveLength(2);
  });

  it("should exclude one VPC", async () => {
    ec2Mock.on(DescribeRouteTablesCommand).resolves({ RouteTables: ROUTE_TABLES });

    await expect(resolveRouteTableIdsExceptVpc(context, { vpcId: "vpc-ops" })).resolves.toEqual([
      "rtb-app",
      "rtb-shared",
    ]);
  });

  it("should exclude VPCs by name pattern", async () => {
    ec2Mock.on(DescribeVpcsCommand).resolves({
      Vpcs: [createVpc("vpc-app", "app-prod"), createVpc("vpc-ops", "ops"), createVpc("vpc-shared", "shared")],
    });
    ec2Mock.on(DescribeRouteTablesCommand).resolves({ RouteTables: ROUTE_TABLES });

    await expect(
      resolveRouteTableIdsExceptVpcNames(context, { vpcNames: ["^app-", "SHARED"] })
    ).resolves.toEqual(["rtb-ops"]);
  });

  it("should list subnets associated with a route table", async () => {
    ec2Mock.on(DescribeRouteTablesCommand).resolves({
      RouteTables: [
        {
          RouteTableId: "rtb-app",
          Associations: [{ SubnetId: "subnet-1" }, { Main: true }, { SubnetId: "subnet-2" }],
        },
      ],
    });

    await expect(resolveSubnetIdsInRouteTable(context, { routeTableId: "rtb-app" })).resolves.toEqual([
      "subnet-1",
      "subnet-2",
    ]);
    expect(ec2Mock.call(0).args[0].input).toMatchObject({ RouteTableIds: ["rtb-app"] });
  });
});
