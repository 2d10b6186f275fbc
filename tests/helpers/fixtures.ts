/**
 * Test fixtures and mock data factories.
 *
 * Provides SDK-shaped records for the resolver and filter tests.
 */

import type { Image, Instance, InstanceStateName, Subnet, Tag, Vpc } from "@aws-sdk/client-ec2";
import { AwsContext, type AwsContextOptions } from "@core/context";

export const TEST_REGION = "ap-southeast-1";

/**
 * Creates a context with a default region and no profile, so no
 * credentials are ever resolved.
 */
export function createTestContext(overrides: AwsContextOptions = {}): AwsContext {
  return new AwsContext({ region: TEST_REGION, ...overrides });
}

/**
 * Converts a tag record to an SDK tag list.
 */
export function toTags(tags: Record<string, string>): Tag[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}

/**
 * Creates an EC2 instance record.
 */
export function createInstance(
  id: string,
  tags: Record<string, string>,
  state: InstanceStateName = "running",
  overrides: Partial<Instance> = {}
): Instance {
  return {
    InstanceId: id,
    InstanceType: "t3.micro",
    PrivateIpAddress: "10.0.0.10",
    State: { Name: state },
    Tags: toTags(tags),
    ...overrides,
  };
}

/**
 * Creates a subnet record.
 */
export function createSubnet(
  id: string,
  vpcId: string,
  tags: Record<string, string>,
  availabilityZone = "ap-southeast-1a"
): Subnet {
  return {
    SubnetId: id,
    VpcId: vpcId,
    AvailabilityZone: availabilityZone,
    Tags: toTags(tags),
  };
}

/**
 * Creates an image record.
 */
export function createImage(
  id: string,
  name: string,
  creationDate: string,
  tags: Record<string, string> = {}
): Image {
  return {
    ImageId: id,
    Name: name,
    CreationDate: creationDate,
    Tags: toTags(tags),
  };
}

/**
 * Creates a VPC record.
 */
export function createVpc(id: string, name: string | undefined, cidr = "10.0.0.0/16"): Vpc {
  return {
    VpcId: id,
    CidrBlock: cidr,
    Tags: name === undefined ? [] : toTags({ Name: name }),
  };
}

/**
 * Creates an error shaped like an SDK service exception.
 */
export function createServiceError(name: string, message = `${name} error`): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}
