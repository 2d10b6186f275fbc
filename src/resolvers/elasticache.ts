/**
 * ElastiCache lookups.
 */

import { DescribeCacheClustersCommand } from "@aws-sdk/client-elasticache";
import type { AwsContext } from "@core/context";
import { NoMatchError, callAws } from "@core/errors";
import { requireRegion, requireValue } from "@core/query";
import type { QueryScope } from "@/types";

export interface CacheClusterQuery extends QueryScope {
  name: string;
}

/**
 * Resolves the configuration endpoint address of a cache cluster.
 *
 * @throws {NoMatchError} If the cluster does not exist or has no configuration endpoint
 */
export async function resolveElastiCacheEndpoint(
  context: AwsContext,
  query: CacheClusterQuery
): Promise<string> {
  const region = requireRegion(query.region);
  const name = requireValue("cache cluster name", query.name);
  const client = context.elasticache(region, query.profile);

  const response = await callAws(
    "DescribeCacheClusters",
    () => client.send(new DescribeCacheClustersCommand({ CacheClusterId: name })),
    ["CacheClusterNotFoundFault", "CacheClusterNotFound"]
  );
  const address = response.CacheClusters?.[0]?.ConfigurationEndpoint?.Address;
  if (!address) {
    throw new NoMatchError(`Could not retrieve the configuration endpoint for ${name}`);
  }
  return address;
}
