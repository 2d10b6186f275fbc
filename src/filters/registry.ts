/**
 * The filter registry handed to the automation engine.
 *
 * Maps each filter name to its definition. Parameter names and positional
 * order follow the filters' template signatures, so
 * `ami | latest_ami_id('ap-southeast-1', ami_owner_id='099720109477')`
 * binds `name`, `region` and `ami_owner_id`.
 */

import { z } from "zod";
import type { AwsContext } from "@core/context";
import { InvalidQueryError } from "@core/errors";
import type { FilterValue, TagConstraints } from "@/types";
import {
  defineFilter,
  flag,
  instanceState,
  required,
  stringList,
  tagRecord,
  tagValue,
  type FilterCall,
  type FilterDefinition,
  type FilterFunction,
} from "@filters/definition";
import { resolveAcmCertificateArn, resolveAcmCertificateArnByTagName } from "@resolvers/acm";
import { resolveDynamoDbBaseArn } from "@resolvers/dynamodb";
import { resolveElastiCacheEndpoint } from "@resolvers/elasticache";
import { resolveAccountId, resolveInstanceProfileArn, resolveServerCertificateArn } from "@resolvers/iam";
import {
  CANONICAL_OWNER_ID,
  listImages,
  resolveImageId,
  resolveLatestImageId,
  resolveOlderImageIds,
} from "@resolvers/images";
import {
  resolveInstance,
  resolveInstanceByTags,
  resolveInstanceIdByName,
  resolveInstanceTagNameByIp,
  resolveInstanceTagNamesByTags,
  resolveInstancesByTags,
} from "@resolvers/instances";
import { resolveKinesisStreamArn } from "@resolvers/kinesis";
import { resolveRdsEndpoint, resolveRdsHostedZoneId } from "@resolvers/rds";
import {
  resolveAllRouteTableIds,
  resolveRouteTableIds,
  resolveRouteTableIdsExceptVpc,
  resolveRouteTableIdsExceptVpcNames,
  resolveSubnetIdsInRouteTable,
} from "@resolvers/routeTables";
import {
  resolveSecurityGroupByTags,
  resolveSecurityGroupCidrs,
  resolveSecurityGroupId,
  resolveSecurityGroupIdsByNames,
  resolveSecurityGroupsByTags,
} from "@resolvers/securityGroups";
import { resolveQueueAttribute } from "@resolvers/sqs";
import { resolveSubnetIds, resolveSubnetIdsByTags, resolveSubnetIdsInZone } from "@resolvers/subnets";
import {
  listAvailabilityZones,
  listVpcsExcept,
  resolveVpcIdByName,
  resolveVpcIdsFromNames,
  vpcExists,
} from "@resolvers/vpcs";

const region = required;
const optionalRegion = required.optional();
const profile = required.optional();

/** Image tag filters: a record, or a list of [key, value] pairs. */
const imageTags = z
  .union([tagRecord, z.array(z.tuple([required, tagValue]))])
  .transform((value): TagConstraints => (Array.isArray(value) ? Object.fromEntries(value) : value));

/** Image listings default to x86_64 HVM images; latest_ami_id does not narrow by either. */
const imageAttributes = {
  arch: required.default("x86_64"),
  virt_type: required.default("hvm"),
};

export const FILTERS = {
  get_instances_by_tags: defineFilter({
    positional: ["region", "return_key", "state", "profile"],
    collectTags: true,
    schema: z.object({
      region,
      return_key: required.optional(),
      state: instanceState.optional(),
      profile,
      tags: tagRecord,
    }),
    run: (context, p) =>
      resolveInstancesByTags(context, {
        region: p.region,
        profile: p.profile,
        tags: p.tags,
        state: p.state,
        returnKey: p.return_key,
      }),
  }),

  get_instance_by_tags: defineFilter({
    positional: ["region", "return_key", "state", "profile"],
    collectTags: true,
    schema: z.object({
      region,
      return_key: required.optional(),
      state: instanceState.optional(),
      profile,
      tags: tagRecord,
    }),
    run: (context, p) =>
      resolveInstanceByTags(context, {
        region: p.region,
        profile: p.profile,
        tags: p.tags,
        state: p.state,
        returnKey: p.return_key,
      }),
  }),

  get_instance: defineFilter({
    positional: ["name", "region", "return_key", "state", "tag_name", "ignore_tag_key"],
    schema: z.object({
      name: required,
      region,
      return_key: required.optional(),
      state: instanceState.optional(),
      tag_name: required.optional(),
      ignore_tag_key: required.optional(),
    }),
    run: (context, p) =>
      resolveInstance(context, {
        name: p.name,
        region: p.region,
        returnKey: p.return_key,
        state: p.state,
        tagName: p.tag_name,
        ignoreTagKey: p.ignore_tag_key,
      }),
  }),

  get_instance_id_by_name: defineFilter({
    positional: ["name", "region", "state"],
    schema: z.object({ name: required, region, state: instanceState.default("running") }),
    run: (context, p) => resolveInstanceIdByName(context, p.name, p.region, p.state),
  }),

  get_instance_tag_name_by_ip: defineFilter({
    positional: ["region", "ip", "ip_type", "profile"],
    schema: z.object({
      region: optionalRegion,
      ip: required,
      ip_type: z.enum(["private", "public"]).optional(),
      profile,
    }),
    run: (context, p) =>
      resolveInstanceTagNameByIp(context, {
        region: p.region,
        profile: p.profile,
        ip: p.ip,
        ipType: p.ip_type,
      }),
  }),

  get_instances_tag_name_by_tags: defineFilter({
    positional: ["region", "state", "profile"],
    collectTags: true,
    schema: z.object({
      region: optionalRegion,
      state: instanceState.optional(),
      profile,
      tags: tagRecord,
    }),
    run: (context, p) =>
      resolveInstanceTagNamesByTags(context, {
        region: p.region,
        profile: p.profile,
        tags: p.tags,
        state: p.state,
      }),
  }),

  get_subnet_ids_by_tags: defineFilter({
    positional: ["vpc_id", "region", "profile"],
    collectTags: true,
    schema: z.object({ vpc_id: required, region, profile, tags: tagRecord }),
    run: (context, p) =>
      resolveSubnetIdsByTags(context, {
        vpcId: p.vpc_id,
        region: p.region,
        profile: p.profile,
        tags: p.tags,
      }),
  }),

  get_subnet_ids: defineFilter({
    positional: ["vpc_id", "cidrs", "region", "profile"],
    schema: z.object({ vpc_id: required, cidrs: stringList, region: optionalRegion, profile }),
    run: (context, p) =>
      resolveSubnetIds(context, {
        vpcId: p.vpc_id,
        cidrs: p.cidrs,
        region: p.region,
        profile: p.profile,
      }),
  }),

  get_subnet_ids_in_zone: defineFilter({
    positional: ["vpc_id", "zone", "region", "profile"],
    schema: z.object({ vpc_id: required, zone: required, region: optionalRegion, profile }),
    run: (context, p) =>
      resolveSubnetIdsInZone(context, {
        vpcId: p.vpc_id,
        zone: p.zone,
        region: p.region,
        profile: p.profile,
      }),
  }),

  latest_ami_id: defineFilter({
    positional: ["name", "region", "ami_owner_id"],
    schema: z.object({ name: required, region, ami_owner_id: required.default(CANONICAL_OWNER_ID) }),
    run: (context, p) =>
      resolveLatestImageId(context, {
        namePattern: p.name,
        region: p.region,
        ownerId: p.ami_owner_id,
      }),
  }),

  get_ami_images: defineFilter({
    positional: [
      "name",
      "region",
      "arch",
      "virt_type",
      "owner",
      "sort",
      "sort_by",
      "sort_by_tag",
      "tags",
      "order",
      "fail_if_empty",
    ],
    schema: z.object({
      name: required,
      region,
      ...imageAttributes,
      owner: required.default(CANONICAL_OWNER_ID),
      sort: flag.default(false),
      sort_by: required.default("CreationDate"),
      sort_by_tag: flag.default(false),
      tags: imageTags.optional(),
      order: z.enum(["asc", "desc"]).default("desc"),
      fail_if_empty: flag.default(false),
    }),
    run: (context, p) =>
      listImages(context, {
        name: p.name,
        region: p.region,
        architecture: p.arch,
        virtualizationType: p.virt_type,
        owner: p.owner,
        tags: p.tags,
        sortBy: p.sort ? p.sort_by : undefined,
        sortByTag: p.sort_by_tag,
        order: p.order,
        failIfEmpty: p.fail_if_empty,
      }),
  }),

  get_ami_image_id: defineFilter({
    positional: ["name", "region"],
    schema: z.object({
      name: required,
      region,
      ...imageAttributes,
      owner: required.default(CANONICAL_OWNER_ID),
      tags: imageTags.optional(),
    }),
    run: (context, p) =>
      resolveImageId(context, {
        name: p.name,
        region: p.region,
        architecture: p.arch,
        virtualizationType: p.virt_type,
        owner: p.owner,
        tags: p.tags,
      }),
  }),

  get_older_images: defineFilter({
    positional: ["name", "region", "exclude_ami", "exclude_archived"],
    schema: z.object({
      name: required,
      region,
      exclude_ami: required.optional(),
      exclude_archived: flag.default(true),
      ...imageAttributes,
    }),
    run: (context, p) =>
      resolveOlderImageIds(context, {
        name: p.name,
        region: p.region,
        excludeAmi: p.exclude_ami,
        excludeArchived: p.exclude_archived,
        architecture: p.arch,
        virtualizationType: p.virt_type,
      }),
  }),

  get_vpc_id_by_name: defineFilter({
    positional: ["name", "region", "profile"],
    schema: z.object({ name: required, region: optionalRegion, profile }),
    run: (context, p) => resolveVpcIdByName(context, p),
  }),

  vpc_exists: defineFilter({
    positional: ["name", "region"],
    schema: z.object({ name: required, region: optionalRegion }),
    run: (context, p) => vpcExists(context, p),
  }),

  get_vpc_ids_from_names: defineFilter({
    positional: ["vpc_names", "region", "profile"],
    schema: z.object({ vpc_names: stringList, region: optionalRegion, profile }),
    run: (context, p) =>
      resolveVpcIdsFromNames(context, { vpcNames: p.vpc_names, region: p.region, profile: p.profile }),
  }),

  get_all_vpcs_info_except: defineFilter({
    positional: ["except_ids", "region", "profile"],
    schema: z.object({ except_ids: z.array(required).default([]), region: optionalRegion, profile }),
    run: (context, p) =>
      listVpcsExcept(context, { exceptIds: p.except_ids, region: p.region, profile: p.profile }),
  }),

  zones: defineFilter({
    positional: ["region", "profile"],
    schema: z.object({ region: optionalRegion, profile }),
    run: (context, p) => listAvailabilityZones(context, p),
  }),

  get_sg: defineFilter({
    positional: ["name", "vpc_id", "region", "profile"],
    schema: z.object({ name: required, vpc_id: required, region: optionalRegion, profile }),
    run: (context, p) =>
      resolveSecurityGroupId(context, {
        name: p.name,
        vpcId: p.vpc_id,
        region: p.region,
        profile: p.profile,
      }),
  }),

  get_sg_ids_by_names: defineFilter({
    positional: ["names", "vpc_id", "region", "profile"],
    schema: z.object({ names: stringList, vpc_id: required, region: optionalRegion, profile }),
    run: (context, p) =>
      resolveSecurityGroupIdsByNames(context, {
        names: p.names,
        vpcId: p.vpc_id,
        region: p.region,
        profile: p.profile,
      }),
  }),

  get_sg_cidrs: defineFilter({
    positional: ["name", "vpc_id", "region", "profile"],
    schema: z.object({ name: required, vpc_id: required, region: optionalRegion, profile }),
    run: (context, p) =>
      resolveSecurityGroupCidrs(context, {
        name: p.name,
        vpcId: p.vpc_id,
        region: p.region,
        profile: p.profile,
      }),
  }),

  get_sgs_by_tags: defineFilter({
    positional: ["region", "return_key", "profile"],
    collectTags: true,
    schema: z.object({ region: optionalRegion, return_key: required.optional(), profile, tags: tagRecord }),
    run: (context, p) =>
      resolveSecurityGroupsByTags(context, {
        region: p.region,
        profile: p.profile,
        tags: p.tags,
        returnKey: p.return_key,
      }),
  }),

  get_sg_by_tags: defineFilter({
    positional: ["region", "return_key", "profile"],
    collectTags: true,
    schema: z.object({ region: optionalRegion, return_key: required.optional(), profile, tags: tagRecord }),
    run: (context, p) =>
      resolveSecurityGroupByTags(context, {
        region: p.region,
        profile: p.profile,
        tags: p.tags,
        returnKey: p.return_key,
      }),
  }),

  get_route_table_ids: defineFilter({
    positional: ["vpc_id", "main", "region", "profile"],
    schema: z.object({ vpc_id: required, main: flag.default(false), region: optionalRegion, profile }),
    run: (context, p) =>
      resolveRouteTableIds(context, {
        vpcId: p.vpc_id,
        main: p.main,
        region: p.region,
        profile: p.profile,
      }),
  }),

  get_all_route_table_ids: defineFilter({
    positional: ["region", "profile"],
    schema: z.object({ region, profile }),
    run: (context, p) => resolveAllRouteTableIds(context, p),
  }),

  get_all_route_table_ids_except: defineFilter({
    positional: ["vpc_id", "region", "profile"],
    schema: z.object({ vpc_id: required, region: optionalRegion, profile }),
    run: (context, p) =>
      resolveRouteTableIdsExceptVpc(context, { vpcId: p.vpc_id, region: p.region, profile: p.profile }),
  }),

  get_all_route_table_ids_except_vpc_names: defineFilter({
    positional: ["vpc_names", "region", "profile"],
    schema: z.object({ vpc_names: stringList, region: optionalRegion, profile }),
    run: (context, p) =>
      resolveRouteTableIdsExceptVpcNames(context, {
        vpcNames: p.vpc_names,
        region: p.region,
        profile: p.profile,
      }),
  }),

  get_all_subnet_ids_in_route_table: defineFilter({
    positional: ["route_table_id", "region", "profile"],
    schema: z.object({ route_table_id: required, region: optionalRegion, profile }),
    run: (context, p) =>
      resolveSubnetIdsInRouteTable(context, {
        routeTableId: p.route_table_id,
        region: p.region,
        profile: p.profile,
      }),
  }),

  get_rds_endpoint: defineFilter({
    positional: ["region", "instance_name", "profile"],
    schema: z.object({ region, instance_name: required, profile }),
    run: (context, p) =>
      resolveRdsEndpoint(context, { region: p.region, instanceName: p.instance_name, profile: p.profile }),
  }),

  get_rds_hosted_zone_id: defineFilter({
    positional: ["region", "instance_name", "profile"],
    schema: z.object({ region, instance_name: required, profile }),
    run: (context, p) =>
      resolveRdsHostedZoneId(context, {
        region: p.region,
        instanceName: p.instance_name,
        profile: p.profile,
      }),
  }),

  get_server_certificate: defineFilter({
    positional: ["name", "region", "profile"],
    schema: z.object({ name: required, region: optionalRegion, profile }),
    run: (context, p) => resolveServerCertificateArn(context, p),
  }),

  get_instance_profile: defineFilter({
    positional: ["name", "region", "profile"],
    schema: z.object({ name: required, region: optionalRegion, profile }),
    run: (context, p) => resolveInstanceProfileArn(context, p),
  }),

  get_account_id: defineFilter({
    positional: ["region", "profile"],
    schema: z.object({ region: optionalRegion, profile }),
    run: (context, p) => resolveAccountId(context, p),
  }),

  get_sqs: defineFilter({
    positional: ["name", "key", "region", "profile"],
    schema: z.object({
      name: required,
      key: z.enum(["arn", "url"]).default("arn"),
      region: optionalRegion,
      profile,
    }),
    run: (context, p) => resolveQueueAttribute(context, p),
  }),

  get_dynamodb_base_arn: defineFilter({
    positional: ["region", "profile"],
    schema: z.object({ region: optionalRegion, profile }),
    run: (context, p) => resolveDynamoDbBaseArn(context, p),
  }),

  get_kinesis_stream_arn: defineFilter({
    positional: ["stream_name", "region", "profile"],
    schema: z.object({ stream_name: required, region: optionalRegion, profile }),
    run: (context, p) =>
      resolveKinesisStreamArn(context, { streamName: p.stream_name, region: p.region, profile: p.profile }),
  }),

  get_acm_arn: defineFilter({
    positional: ["domain_name", "region", "profile"],
    schema: z.object({ domain_name: required, region, profile }),
    run: (context, p) =>
      resolveAcmCertificateArn(context, { domainName: p.domain_name, region: p.region, profile: p.profile }),
  }),

  get_acm_arn_by_tag_name: defineFilter({
    positional: ["region", "tag_name", "profile"],
    schema: z.object({ region, tag_name: required, profile }),
    run: (context, p) =>
      resolveAcmCertificateArnByTagName(context, {
        region: p.region,
        tagName: p.tag_name,
        profile: p.profile,
      }),
  }),

  get_elasticache_endpoint: defineFilter({
    positional: ["region", "name", "profile"],
    schema: z.object({ region, name: required, profile }),
    run: (context, p) => resolveElastiCacheEndpoint(context, p),
  }),
} satisfies Record<string, FilterDefinition>;

export type FilterName = keyof typeof FILTERS;

export const FILTER_NAMES: readonly string[] = Object.keys(FILTERS);

/**
 * Registers the lookup filters with the automation engine.
 *
 * The name → function table is built once, at construction, with every
 * filter bound to the given context.
 */
export class FilterModule {
  private readonly table = new Map<string, FilterFunction>();

  constructor(readonly context: AwsContext) {
    for (const [name, definition] of Object.entries<FilterDefinition>(FILTERS)) {
      this.table.set(name, definition.bind(name, context));
    }
  }

  /**
   * Returns the filter name → implementation mapping.
   */
  filters(): Record<string, FilterFunction> {
    return Object.fromEntries(this.table);
  }

  /**
   * Invokes a filter by name.
   *
   * @throws {InvalidQueryError} If no filter has that name
   */
  async invoke(name: string, call: FilterCall): Promise<FilterValue> {
    const filter = this.table.get(name);
    if (!filter) {
      throw new InvalidQueryError(`Unknown filter '${name}'`);
    }
    return filter(call);
  }
}
