/**
 * EC2 instance lookups.
 *
 * Tag-based resolution of compute instances: query DescribeInstances with
 * tag and state filters, re-check the predicate on every returned record,
 * and project one attribute per match.
 */

import {
  DescribeInstancesCommand,
  type Filter,
  type Instance,
} from "@aws-sdk/client-ec2";
import type { AwsContext } from "@core/context";
import { AmbiguousMatchError, NoMatchError, callAws } from "@core/errors";
import {
  matchesTags,
  projectField,
  requireRegion,
  requireTags,
  requireValue,
  tagFilters,
  tagsToRecord,
} from "@core/query";
import type { InstanceState, OptionalScope, QueryScope, TagConstraints } from "@/types";
import { setupLogger } from "@shared/utils/logger";

const logger = setupLogger("lookup-filters:instances");

/** Attribute projected when no `returnKey` is given. */
export const DEFAULT_INSTANCE_KEY = "InstanceId";

export interface InstancesByTagsQuery extends QueryScope {
  tags: TagConstraints;
  state?: InstanceState;
  returnKey?: string;
}

export interface InstanceByNameQuery extends QueryScope {
  name: string;
  tagName?: string;
  state?: InstanceState;
  returnKey?: string;
  /** When several instances match, ignore those carrying this tag key */
  ignoreTagKey?: string;
}

export interface InstanceByIpQuery extends OptionalScope {
  ip: string;
  ipType?: "private" | "public";
}

export interface InstanceNamesByTagsQuery extends OptionalScope {
  tags: TagConstraints;
  state?: InstanceState;
}

/**
 * Lists instances matching EC2 filters, flattening reservations and
 * following NextToken. Order is the API's order.
 */
export async function describeInstances(
  context: AwsContext,
  region: string,
  filters: Filter[],
  profile?: string
): Promise<Instance[]> {
  const client = context.ec2(region, profile);
  const instances: Instance[] = [];
  let nextToken: string | undefined;

  do {
    const command = new DescribeInstancesCommand({
      Filters: filters.length > 0 ? filters : undefined,
      NextToken: nextToken,
    });
    const response = await callAws("DescribeInstances", () => client.send(command));

    for (const reservation of response.Reservations ?? []) {
      for (const instance of reservation.Instances ?? []) {
        instances.push(instance);
      }
    }
    nextToken = response.NextToken;
  } while (nextToken);

  return instances;
}

function stateFilters(state: InstanceState | undefined): Filter[] {
  return state ? [{ Name: "instance-state-name", Values: [state] }] : [];
}

function inState(instance: Instance, state: InstanceState | undefined): boolean {
  return !state || instance.State?.Name === state;
}

/**
 * Projects `returnKey` from each instance, skipping instances that lack it.
 */
function projectInstances(instances: readonly Instance[], returnKey: string): string[] {
  const values: string[] = [];
  for (const instance of instances) {
    const value = projectField(instance, returnKey);
    if (value === undefined) {
      logger.warn(
        { instanceId: instance.InstanceId, returnKey },
        "Matching instance has no value for the requested attribute, skipping"
      );
      continue;
    }
    values.push(value);
  }
  return values;
}

async function findInstancesByTags(
  context: AwsContext,
  region: string,
  tags: TagConstraints,
  state: InstanceState | undefined,
  profile: string | undefined
): Promise<Instance[]> {
  const filters = [...tagFilters(tags), ...stateFilters(state)];
  const instances = await describeInstances(context, region, filters, profile);
  return instances.filter(
    (instance) => matchesTags(tagsToRecord(instance.Tags), tags) && inState(instance, state)
  );
}

/**
 * Resolves instances whose tags include every constraint, optionally in a
 * given state, and returns one attribute per instance.
 *
 * @returns Projected values in API order; empty when nothing matches
 *
 * @throws {InvalidQueryError} If region or tags are empty
 * @throws {RemoteCallError} If DescribeInstances fails
 *
 * @example
 * await resolveInstancesByTags(context, {
 *   region: "ap-southeast-1",
 *   tags: { Cluster: "test-cluster" },
 *   state: "running",
 * });
 * // ["i-0a1b2c3d"]
 */
export async function resolveInstancesByTags(
  context: AwsContext,
  query: InstancesByTagsQuery
): Promise<string[]> {
  const region = requireRegion(query.region);
  const tags = requireTags(query.tags);
  const returnKey = query.returnKey ?? DEFAULT_INSTANCE_KEY;

  logger.debug({ region, tags, state: query.state, returnKey }, "Resolving instances by tags");

  const matches = await findInstancesByTags(context, region, tags, query.state, query.profile);
  return projectInstances(matches, returnKey);
}

/**
 * Like resolveInstancesByTags, but exactly one instance must match.
 *
 * @throws {NoMatchError} If no instance matches
 * @throws {AmbiguousMatchError} If more than one instance matches
 */
export async function resolveInstanceByTags(
  context: AwsContext,
  query: InstancesByTagsQuery
): Promise<string> {
  const values = await resolveInstancesByTags(context, query);
  if (values.length > 1) {
    throw new AmbiguousMatchError(
      `More than 1 instance (${values.join(", ")}) was found with tags ${JSON.stringify(query.tags)} in region ${query.region}`
    );
  }
  if (values.length === 0) {
    throw new NoMatchError(
      `No instance was found with tags ${JSON.stringify(query.tags)} in region ${query.region}`
    );
  }
  return values[0];
}

/**
 * Resolves one instance by its name tag (or another tag given by `tagName`).
 *
 * When several instances carry the name and `ignoreTagKey` is set, those
 * also carrying `ignoreTagKey` are discarded; a single survivor wins.
 *
 * @throws {NoMatchError} If no instance carries the name
 * @throws {AmbiguousMatchError} If the name is not unique
 */
export async function resolveInstance(
  context: AwsContext,
  query: InstanceByNameQuery
): Promise<string> {
  const region = requireRegion(query.region);
  const name = requireValue("instance name", query.name);
  const tagName = query.tagName ?? "Name";
  const returnKey = query.returnKey ?? DEFAULT_INSTANCE_KEY;

  let matches = await findInstancesByTags(
    context,
    region,
    { [tagName]: name },
    query.state,
    query.profile
  );

  if (matches.length > 1 && query.ignoreTagKey) {
    const ignoreTagKey = query.ignoreTagKey;
    matches = matches.filter(
      (instance) => !Object.prototype.hasOwnProperty.call(tagsToRecord(instance.Tags), ignoreTagKey)
    );
  }

  if (matches.length === 0) {
    throw new NoMatchError(`No instance was found with name ${name} in region ${region}`);
  }
  if (matches.length > 1) {
    throw new AmbiguousMatchError(
      `More than 1 instance was found with name ${name} in region ${region}`
    );
  }

  const value = projectField(matches[0], returnKey);
  if (value === undefined) {
    throw new NoMatchError(
      `Instance ${matches[0].InstanceId ?? name} has no value for attribute '${returnKey}'`
    );
  }
  return value;
}

/**
 * Resolves the instance id of the single instance with the given Name tag.
 */
export function resolveInstanceIdByName(
  context: AwsContext,
  name: string,
  region: string,
  state: InstanceState = "running"
): Promise<string> {
  return resolveInstance(context, { name, region, state, returnKey: "InstanceId" });
}

/**
 * Resolves the Name tag of the instance holding a private or public IP address.
 *
 * @throws {NoMatchError} If no instance has the address or it has no Name tag
 */
export async function resolveInstanceTagNameByIp(
  context: AwsContext,
  query: InstanceByIpQuery
): Promise<string> {
  const region = context.region(query.region);
  const ip = requireValue("ip address", query.ip);
  const filterName = (query.ipType ?? "private") === "private" ? "private-ip-address" : "ip-address";

  const instances = await describeInstances(
    context,
    region,
    [{ Name: filterName, Values: [ip] }],
    query.profile
  );
  if (instances.length === 0) {
    throw new NoMatchError(`No instance was found with ip ${ip} in region ${region}`);
  }

  const name = tagsToRecord(instances[0].Tags).Name;
  if (name === undefined) {
    throw new NoMatchError(`Instance with ip ${ip} has no Name tag`);
  }
  return name;
}

/**
 * Resolves the Name tags of every instance matching the tag constraints.
 * Instances without a Name tag contribute nothing.
 */
export async function resolveInstanceTagNamesByTags(
  context: AwsContext,
  query: InstanceNamesByTagsQuery
): Promise<string[]> {
  const region = context.region(query.region);
  const tags = requireTags(query.tags);

  const matches = await findInstancesByTags(context, region, tags, query.state, query.profile);
  const names: string[] = [];
  for (const instance of matches) {
    const name = tagsToRecord(instance.Tags).Name;
    if (name !== undefined) {
      names.push(name);
    }
  }
  return names;
}
