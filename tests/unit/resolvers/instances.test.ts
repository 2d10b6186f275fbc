import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mockClient } from "aws-sdk-client-mock";
import { EC2Client, DescribeInstancesCommand } from "@aws-sdk/client-ec2";
import type { AwsContext } from "@core/context";
import {
  AmbiguousMatchError,
  InvalidQueryError,
  NoMatchError,
  RemoteCallError,
} from "@core/errors";
import {
  resolveInstance,
  resolveInstanceByTags,
  resolveInstanceIdByName,
  resolveInstanceTagNameByIp,
  resolveInstanceTagNamesByTags,
  resolveInstancesByTags,
} from "@resolvers/instances";
import {
  TEST_REGION,
  createInstance,
  createServiceError,
  createTestContext,
} from "../../helpers/fixtures";

const ec2Mock = mockClient(EC2Client);

describe("instance resolvers", () => {
  let context: AwsContext;

  beforeEach(() => {
    ec2Mock.reset();
    context = createTestContext();
  });

  afterEach(() => {
    context.destroy();
  });

  describe("resolveInstancesByTags()", () => {
    it("should return the ids of running instances with the tags", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [
              createInstance("i-a1", { Cluster: "test-cluster" }),
              createInstance("i-b2", { Cluster: "test-cluster", Role: "db" }),
            ],
          },
        ],
      });

      const ids = await resolveInstancesByTags(context, {
        region: "ap-southeast-1",
        tags: { Cluster: "test-cluster" },
        state: "running",
      });

      expect(ids).toEqual(["i-a1", "i-b2"]);
      expect(ec2Mock.calls()).toHaveLength(1);
      expect(ec2Mock.call(0).args[0].input).toEqual({
        Filters: [
          { Name: "tag:Cluster", Values: ["test-cluster"] },
          { Name: "instance-state-name", Values: ["running"] },
        ],
        NextToken: undefined,
      });
    });

    it("should return an empty list when nothing matches", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({ Reservations: [] });

      await expect(
        resolveInstancesByTags(context, { region: TEST_REGION, tags: { Cluster: "nothing" } })
      ).resolves.toEqual([]);
    });

    it("should flatten reservations and follow pagination in order", async () => {
      ec2Mock
        .on(DescribeInstancesCommand)
        .resolvesOnce({
          Reservations: [
            { Instances: [createInstance("i-1", { App: "api" })] },
            { Instances: [createInstance("i-2", { App: "api" })] },
          ],
          NextToken: "page-2",
        })
        .resolvesOnce({
          Reservations: [{ Instances: [createInstance("i-3", { App: "api" })] }],
        });

      const ids = await resolveInstancesByTags(context, { region: TEST_REGION, tags: { App: "api" } });

      expect(ids).toEqual(["i-1", "i-2", "i-3"]);
      expect(ec2Mock.calls()).toHaveLength(2);
      expect(ec2Mock.call(1).args[0].input).toMatchObject({ NextToken: "page-2" });
    });

    it("should re-check tags and state on returned records", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [
              createInstance("i-match", { Cluster: "web" }),
              createInstance("i-other-cluster", { Cluster: "worker" }),
              createInstance("i-stopped", { Cluster: "web" }, "stopped"),
            ],
          },
        ],
      });

      const ids = await resolveInstancesByTags(context, {
        region: TEST_REGION,
        tags: { Cluster: "web" },
        state: "running",
      });

      expect(ids).toEqual(["i-match"]);
    });

    it("should narrow results when a constraint is added", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [
              createInstance("i-prod", { Cluster: "web", Env: "prod" }),
              createInstance("i-dev", { Cluster: "web", Env: "dev" }),
            ],
          },
        ],
      });

      const broad = await resolveInstancesByTags(context, { region: TEST_REGION, tags: { Cluster: "web" } });
      const narrow = await resolveInstancesByTags(context, {
        region: TEST_REGION,
        tags: { Cluster: "web", Env: "prod" },
      });

      expect(broad).toEqual(["i-prod", "i-dev"]);
      expect(narrow).toEqual(["i-prod"]);
    });

    it("should return the same result for repeated calls", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [{ Instances: [createInstance("i-1", { Cluster: "web" })] }],
      });
      const query = { region: TEST_REGION, tags: { Cluster: "web" } };

      const first = await resolveInstancesByTags(context, query);
      const second = await resolveInstancesByTags(context, query);

      expect(second).toEqual(first);
    });

    it("should project the requested attribute and skip instances without it", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [
              createInstance("i-1", { Cluster: "web" }, "running", { PrivateIpAddress: "10.0.1.5" }),
              createInstance("i-2", { Cluster: "web" }, "running", { PrivateIpAddress: undefined }),
            ],
          },
        ],
      });

      const ips = await resolveInstancesByTags(context, {
        region: TEST_REGION,
        tags: { Cluster: "web" },
        returnKey: "PrivateIpAddress",
      });

      expect(ips).toEqual(["10.0.1.5"]);
    });

    it("should reject non-scalar attributes", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [{ Instances: [createInstance("i-1", { Cluster: "web" })] }],
      });

      await expect(
        resolveInstancesByTags(context, { region: TEST_REGION, tags: { Cluster: "web" }, returnKey: "Tags" })
      ).rejects.toThrow(InvalidQueryError);
    });

    it("should reject empty tags and region without calling AWS", async () => {
      await expect(resolveInstancesByTags(context, { region: TEST_REGION, tags: {} })).rejects.toThrow(
        "At least one tag constraint is required"
      );
      await expect(resolveInstancesByTags(context, { region: "", tags: { Cluster: "web" } })).rejects.toThrow(
        "A non-empty region is required"
      );
      expect(ec2Mock.calls()).toHaveLength(0);
    });

    it("should surface SDK failures as RemoteCallError", async () => {
      ec2Mock.on(DescribeInstancesCommand).rejects(createServiceError("UnauthorizedOperation", "denied"));

      await expect(
        resolveInstancesByTags(context, { region: TEST_REGION, tags: { Cluster: "web" } })
      ).rejects.toThrow(RemoteCallError);
    });

    it("should send the request to the requested region", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({ Reservations: [] });

      await resolveInstancesByTags(context, { region: "eu-west-1", tags: { Cluster: "web" } });

      expect(context.clientCount).toBe(1);
      await expect(context.ec2("eu-west-1").config.region()).resolves.toBe("eu-west-1");
      expect(context.clientCount).toBe(1);
    });
  });

  describe("resolveInstanceByTags()", () => {
    it("should return the single match", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [{ Instances: [createInstance("i-only", { Role: "bastion" })] }],
      });

      await expect(
        resolveInstanceByTags(context, { region: TEST_REGION, tags: { Role: "bastion" } })
      ).resolves.toBe("i-only");
    });

    it("should fail when nothing matches", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({ Reservations: [] });

      const lookup = resolveInstanceByTags(context, { region: TEST_REGION, tags: { Role: "bastion" } });

      await expect(lookup).rejects.toThrow(NoMatchError);
      await expect(lookup).rejects.toThrow(
        'No instance was found with tags {"Role":"bastion"} in region ap-southeast-1'
      );
    });

    it("should fail when several instances match", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [createInstance("i-1", { Role: "bastion" }), createInstance("i-2", { Role: "bastion" })],
          },
        ],
      });

      await expect(
        resolveInstanceByTags(context, { region: TEST_REGION, tags: { Role: "bastion" } })
      ).rejects.toThrow(AmbiguousMatchError);
    });
  });

  describe("resolveInstance()", () => {
    it("should resolve by Name tag", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [{ Instances: [createInstance("i-web", { Name: "web-1" })] }],
      });

      await expect(resolveInstance(context, { name: "web-1", region: TEST_REGION })).resolves.toBe("i-web");
      expect(ec2Mock.call(0).args[0].input).toMatchObject({
        Filters: [{ Name: "tag:Name", Values: ["web-1"] }],
      });
    });

    it("should use another tag and attribute when asked", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [createInstance("i-web", { Hostname: "web-1" }, "running", { PrivateIpAddress: "10.0.2.9" })],
          },
        ],
      });

      await expect(
        resolveInstance(context, {
          name: "web-1",
          region: TEST_REGION,
          tagName: "Hostname",
          returnKey: "PrivateIpAddress",
        })
      ).resolves.toBe("10.0.2.9");
    });

    it("should drop instances carrying the ignore tag when the name is shared", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [
              createInstance("i-old", { Name: "web-1", Retired: "yes" }),
              createInstance("i-new", { Name: "web-1" }),
            ],
          },
        ],
      });

      await expect(
        resolveInstance(context, { name: "web-1", region: TEST_REGION, ignoreTagKey: "Retired" })
      ).resolves.toBe("i-new");
    });

    it("should fail when the name is shared and nothing is ignored", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [createInstance("i-1", { Name: "web-1" }), createInstance("i-2", { Name: "web-1" })],
          },
        ],
      });

      await expect(resolveInstance(context, { name: "web-1", region: TEST_REGION })).rejects.toThrow(
        "More than 1 instance was found with name web-1 in region ap-southeast-1"
      );
    });
  });

  describe("resolveInstanceIdByName()", () => {
    it("should look for running instances by default", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [{ Instances: [createInstance("i-web", { Name: "web-1" })] }],
      });

      await expect(resolveInstanceIdByName(context, "web-1", TEST_REGION)).resolves.toBe("i-web");
      expect(ec2Mock.call(0).args[0].input).toMatchObject({
        Filters: [
          { Name: "tag:Name", Values: ["web-1"] },
          { Name: "instance-state-name", Values: ["running"] },
        ],
      });
    });
  });

  describe("resolveInstanceTagNameByIp()", () => {
    it("should look up private addresses by default", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [{ Instances: [createInstance("i-1", { Name: "db-1" })] }],
      });

      await expect(resolveInstanceTagNameByIp(context, { ip: "10.0.0.10" })).resolves.toBe("db-1");
      expect(ec2Mock.call(0).args[0].input).toMatchObject({
        Filters: [{ Name: "private-ip-address", Values: ["10.0.0.10"] }],
      });
    });

    it("should look up public addresses when asked", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [{ Instances: [createInstance("i-1", { Name: "edge-1" })] }],
      });

      await resolveInstanceTagNameByIp(context, { ip: "203.0.113.7", ipType: "public" });

      expect(ec2Mock.call(0).args[0].input).toMatchObject({
        Filters: [{ Name: "ip-address", Values: ["203.0.113.7"] }],
      });
    });

    it("should fail when no instance holds the address", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({ Reservations: [] });

      await expect(resolveInstanceTagNameByIp(context, { ip: "10.9.9.9" })).rejects.toThrow(
        "No instance was found with ip 10.9.9.9 in region ap-southeast-1"
      );
    });
  });

  describe("resolveInstanceTagNamesByTags()", () => {
    it("should return Name tags and skip unnamed instances", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [
              createInstance("i-1", { Cluster: "web", Name: "web-1" }),
              createInstance("i-2", { Cluster: "web" }),
              createInstance("i-3", { Cluster: "web", Name: "web-3" }),
            ],
          },
        ],
      });

      await expect(resolveInstanceTagNamesByTags(context, { tags: { Cluster: "web" } })).resolves.toEqual([
        "web-1",
        "web-3",
      ]);
    });
  });
});
