/**
 * Core type definitions for the AWS lookup filters.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * Tag key to required tag value. All entries must match (logical AND).
 */
export type TagConstraints = Record<string, string>;

/**
 * Where a query runs: an AWS region and, optionally, a named credentials profile.
 */
export interface QueryScope {
  region: string;
  profile?: string;
}

/**
 * Same as QueryScope for lookups that may fall back to the context's default region.
 */
export interface OptionalScope {
  region?: string;
  profile?: string;
}

/**
 * Valid EC2 instance lifecycle states.
 */
export type InstanceState =
  | "pending"
  | "running"
  | "stopping"
  | "stopped"
  | "shutting-down"
  | "terminated";

/**
 * Sort direction for image listings.
 */
export type SortOrder = "asc" | "desc";

/**
 * Image fields returned by the list-style image filters.
 */
export interface ImageSummary {
  id: string;
  name: string;
  creationDate: string;
  tags: Record<string, string>;
}

/**
 * VPC fields returned by `get_all_vpcs_info_except`.
 */
export interface VpcInfo {
  name: string;
  id: string;
  cidr: string;
}

/**
 * Any value a filter hands back to the automation engine.
 */
export type FilterValue = string | string[] | ImageSummary[] | VpcInfo[];

/**
 * Settings for the AWS context, from a config file or the environment.
 */
export interface Config {
  region?: string;
  profile?: string;
  max_attempts?: number;
}
