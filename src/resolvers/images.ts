/**
 * AMI lookups.
 *
 * Image names are matched with AWS filter wildcards (`*`, `?`); the match is
 * applied server-side through the `name` filter and re-checked locally.
 */

import { DescribeImagesCommand, type Filter, type Image } from "@aws-sdk/client-ec2";
import type { AwsContext } from "@core/context";
import { AmbiguousMatchError, NoMatchError, callAws } from "@core/errors";
import {
  matchesTags,
  projectField,
  requireRegion,
  requireValue,
  tagValueOf,
  tagsToRecord,
  wildcardToRegExp,
} from "@core/query";
import type { ImageSummary, QueryScope, SortOrder, TagConstraints } from "@/types";
import { setupLogger } from "@shared/utils/logger";

const logger = setupLogger("lookup-filters:images");

/** Canonical's account, publisher of the official Ubuntu images. */
export const CANONICAL_OWNER_ID = "099720109477";

/** Tag marking images that were already archived. */
export const ARCHIVED_TAG = "ArchivedDate";

export interface LatestImageQuery extends QueryScope {
  namePattern: string;
  ownerId?: string;
}

export interface ImageListQuery extends QueryScope {
  name: string;
  owner?: string;
  architecture?: string;
  virtualizationType?: string;
  tags?: TagConstraints;
  /** Image attribute (e.g. "CreationDate") or, with sortByTag, a tag key */
  sortBy?: string;
  sortByTag?: boolean;
  order?: SortOrder;
  failIfEmpty?: boolean;
}

export interface OlderImagesQuery extends QueryScope {
  name: string;
  excludeAmi?: string;
  excludeArchived?: boolean;
  architecture?: string;
  virtualizationType?: string;
}

/**
 * Lists images owned by `owners` matching EC2 filters, following NextToken.
 */
export async function describeImages(
  context: AwsContext,
  region: string,
  owners: string[],
  filters: Filter[],
  profile?: string
): Promise<Image[]> {
  const client = context.ec2(region, profile);
  const images: Image[] = [];
  let nextToken: string | undefined;

  do {
    const command = new DescribeImagesCommand({
      Owners: owners,
      Filters: filters,
      NextToken: nextToken,
    });
    const response = await callAws("DescribeImages", () => client.send(command));
    images.push(...(response.Images ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return images;
}

function creationTime(image: Image): number {
  const time = Date.parse(image.CreationDate ?? "");
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

function toSummary(image: Image): ImageSummary {
  return {
    id: image.ImageId ?? "",
    name: image.Name ?? "",
    creationDate: image.CreationDate ?? "",
    tags: tagsToRecord(image.Tags),
  };
}

function sortKey(image: Image, sortBy: string, sortByTag: boolean): string {
  if (sortByTag) {
    return tagValueOf(tagsToRecord(image.Tags), sortBy) ?? "";
  }
  return projectField(image, sortBy) ?? "";
}

async function findImages(context: AwsContext, query: ImageListQuery): Promise<Image[]> {
  const region = requireRegion(query.region);
  const name = requireValue("image name", query.name);
  const owner = query.owner ?? CANONICAL_OWNER_ID;
  const tags = query.tags ?? {};

  const filters: Filter[] = [{ Name: "name", Values: [name] }];
  if (query.architecture) {
    filters.push({ Name: "architecture", Values: [query.architecture] });
  }
  if (query.virtualizationType) {
    filters.push({ Name: "virtualization-type", Values: [query.virtualizationType] });
  }
  for (const [key, value] of Object.entries(tags)) {
    filters.push({ Name: `tag:${key}`, Values: [value] });
  }

  logger.debug({ region, name, owner, filters }, "Listing images");

  const pattern = wildcardToRegExp(name);
  const images = await describeImages(context, region, [owner], filters, query.profile);
  const matches = images.filter(
    (image) => pattern.test(image.Name ?? "") && matchesTags(tagsToRecord(image.Tags), tags)
  );

  if (query.sortBy) {
    const sortBy = query.sortBy;
    const sortByTag = query.sortByTag ?? false;
    const direction = (query.order ?? "desc") === "desc" ? -1 : 1;
    matches.sort(
      (a, b) => direction * sortKey(a, sortBy, sortByTag).localeCompare(sortKey(b, sortBy, sortByTag))
    );
  }

  if (matches.length === 0 && query.failIfEmpty) {
    throw new NoMatchError(`No image was found with name ${name} in region ${region}`);
  }
  return matches;
}

/**
 * Lists images by name pattern, owner and optional attributes/tags.
 *
 * @returns Image summaries; sorted when `sortBy` is given, API order otherwise
 *
 * @throws {NoMatchError} If nothing matches and `failIfEmpty` is set
 */
export async function listImages(
  context: AwsContext,
  query: ImageListQuery
): Promise<ImageSummary[]> {
  const images = await findImages(context, query);
  return images.map(toSummary);
}

/**
 * Resolves the id of the most recently created image matching a name pattern.
 *
 * Images sharing the newest creation time keep the API's relative order,
 * so the first one listed wins.
 *
 * @throws {InvalidQueryError} If region or pattern are empty
 * @throws {NoMatchError} If no image matches
 * @throws {RemoteCallError} If DescribeImages fails
 *
 * @example
 * await resolveLatestImageId(context, {
 *   namePattern: "ubuntu/images/hvm-ssd/ubuntu-trusty-14.04-amd64-server-*",
 *   region: "ap-southeast-1",
 * });
 * // "ami-0b2c3d4e"
 */
export async function resolveLatestImageId(
  context: AwsContext,
  query: LatestImageQuery
): Promise<string> {
  const namePattern = requireValue("image name pattern", query.namePattern);
  const images = await findImages(context, {
    name: namePattern,
    region: query.region,
    profile: query.profile,
    owner: query.ownerId ?? CANONICAL_OWNER_ID,
  });

  // Array#sort is stable: ties keep API order.
  const newest = [...images].sort((a, b) => creationTime(b) - creationTime(a))[0];
  if (!newest?.ImageId) {
    throw new NoMatchError(
      `No image matching ${namePattern} owned by ${query.ownerId ?? CANONICAL_OWNER_ID} was found in region ${query.region}`
    );
  }
  return newest.ImageId;
}

/**
 * Resolves the id of the single image with the given name.
 *
 * @throws {NoMatchError} If no image matches
 * @throws {AmbiguousMatchError} If several images match
 */
export async function resolveImageId(
  context: AwsContext,
  query: ImageListQuery
): Promise<string> {
  const images = await findImages(context, { ...query, failIfEmpty: false });
  if (images.length > 1) {
    throw new AmbiguousMatchError(
      `More than 1 image was found with name ${query.name} in region ${query.region}`
    );
  }
  const imageId = images[0]?.ImageId;
  if (!imageId) {
    throw new NoMatchError(`No image was found with name ${query.name} in region ${query.region}`);
  }
  return imageId;
}

/**
 * Resolves ids of the account's own images with the given name, except
 * `excludeAmi` and, unless disabled, images already tagged as archived.
 */
export async function resolveOlderImageIds(
  context: AwsContext,
  query: OlderImagesQuery
): Promise<string[]> {
  const images = await findImages(context, {
    name: query.name,
    region: query.region,
    profile: query.profile,
    owner: "self",
    architecture: query.architecture,
    virtualizationType: query.virtualizationType,
  });
  const excludeArchived = query.excludeArchived ?? true;

  const ids = new Set<string>();
  for (const image of images) {
    if (!image.ImageId || image.ImageId === query.excludeAmi) {
      continue;
    }
    if (excludeArchived && ARCHIVED_TAG in tagsToRecord(image.Tags)) {
      continue;
    }
    ids.add(image.ImageId);
  }
  return [...ids];
}
