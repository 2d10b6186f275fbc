/**
 * Helpers shared by the resolvers: argument checks, EC2 filter building,
 * tag matching and field projection.
 */

import type { Filter, Tag } from "@aws-sdk/client-ec2";
import type { TagConstraints } from "@/types";
import { InvalidQueryError } from "@core/errors";

/**
 * Ensures a region was given.
 *
 * @throws {InvalidQueryError} If the region is missing or blank
 */
export function requireRegion(region: string | undefined): string {
  if (!region || region.trim() === "") {
    throw new InvalidQueryError("A non-empty region is required");
  }
  return region;
}

/**
 * Ensures at least one tag constraint was given; an empty set would match everything.
 *
 * @throws {InvalidQueryError} If `tags` is empty
 */
export function requireTags(tags: TagConstraints): TagConstraints {
  if (Object.keys(tags).length === 0) {
    throw new InvalidQueryError("At least one tag constraint is required");
  }
  return tags;
}

/**
 * Ensures a named argument is a non-empty string.
 */
export function requireValue(name: string, value: string | undefined): string {
  if (!value || value.trim() === "") {
    throw new InvalidQueryError(`A non-empty ${name} is required`);
  }
  return value;
}

/**
 * Converts tag constraints to EC2 `tag:<key>` filters.
 */
export function tagFilters(tags: TagConstraints): Filter[] {
  return Object.entries(tags).map(([key, value]) => ({
    Name: `tag:${key}`,
    Values: [value],
  }));
}

/**
 * Flattens an SDK tag list into a record. Tags without a value map to "".
 *
 * Built with Object.fromEntries so every key, `__proto__` included, becomes an own property.
 */
export function tagsToRecord(tags: readonly Tag[] | undefined): Record<string, string> {
  return Object.fromEntries(
    (tags ?? []).flatMap((tag) => (tag.Key ? [[tag.Key, tag.Value ?? ""] as const] : []))
  );
}

/**
 * Reads one tag from a flattened record, ignoring inherited properties.
 */
export function tagValueOf(record: Record<string, string>, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

/**
 * True when every constraint is present in `resourceTags` with the exact value.
 */
export function matchesTags(
  resourceTags: Record<string, string>,
  constraints: TagConstraints
): boolean {
  return Object.entries(constraints).every(([key, value]) => tagValueOf(resourceTags, key) === value);
}

/**
 * Reads one attribute of an SDK record as a string.
 *
 * Strings pass through, numbers and booleans are stringified, dates become
 * ISO-8601. Missing attributes yield undefined.
 *
 * @throws {InvalidQueryError} If the attribute holds a list or nested object
 */
export function projectField(record: object, field: string): string | undefined {
  if (!Object.prototype.hasOwnProperty.call(record, field)) {
    return undefined;
  }
  const value: unknown = Reflect.get(record, field);
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  throw new InvalidQueryError(`Attribute '${field}' is not a scalar value and cannot be returned`);
}

/**
 * Compiles an AWS filter wildcard (`*` any run, `?` one character) into an anchored RegExp.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  let source = "";
  for (const char of pattern) {
    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else {
      source += char.replace(/[.+^${}()|[\]\\/-]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}$`, "s");
}
