/**
 * AWS lookup filters for template-driven automation.
 *
 * The automation engine builds one FilterModule at startup and calls its
 * filters by name while rendering templates.
 */

import { createContext, loadConfigFromEnv, loadConfigFromFile } from "@core/config";
import type { AwsContext } from "@core/context";
import { FilterModule } from "@filters/registry";
import { setupLogger } from "@shared/utils/logger";

const logger = setupLogger("lookup-filters");

export interface FilterModuleOptions {
  /** YAML config file; the AWS environment variables are used when omitted */
  configPath?: string;
}

export interface LoadedFilterModule {
  module: FilterModule;
  context: AwsContext;
}

/**
 * Loads configuration and builds the filter module with its AWS context.
 * Call `context.destroy()` once the engine is done with the filters.
 */
export async function createFilterModule(
  options: FilterModuleOptions = {}
): Promise<LoadedFilterModule> {
  const config = options.configPath
    ? await loadConfigFromFile(options.configPath)
    : loadConfigFromEnv();
  const context = createContext(config);
  const module = new FilterModule(context);

  logger.info(
    { region: config.region, profile: config.profile, filters: Object.keys(module.filters()).length },
    "Lookup filters ready"
  );
  return { module, context };
}

export { AwsContext } from "@core/context";
export type { AwsContextOptions } from "@core/context";
export {
  ConfigError,
  ConfigNotFoundError,
  ConfigValidationError,
  clearConfigCache,
  createContext,
  loadConfigFromEnv,
  loadConfigFromFile,
} from "@core/config";
export {
  AmbiguousMatchError,
  InvalidQueryError,
  NoMatchError,
  RemoteCallError,
  ResolutionError,
} from "@core/errors";
export { FILTERS, FILTER_NAMES, FilterModule } from "@filters/registry";
export type { FilterName } from "@filters/registry";
export type { FilterCall, FilterFunction } from "@filters/definition";
export * from "@resolvers/index";
export type * from "@/types";
