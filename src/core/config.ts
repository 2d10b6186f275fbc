/**
 * Configuration loader for the AWS lookup filters.
 *
 * Loads context settings from a YAML file or from the standard AWS
 * environment variables, validates them, and caches parsed files.
 */

import { readFile } from "fs/promises";
import { LRUCache } from "lru-cache";
import yaml from "js-yaml";
import { z } from "zod";
import type { Config } from "@/types";
import { AwsContext } from "@core/context";
import { setupLogger } from "@shared/utils/logger";

const logger = setupLogger("lookup-filters:config");

/**
 * Configuration schema validation using Zod.
 */
const ConfigSchema = z
  .object({
    region: z.string().min(1).optional(),
    profile: z.string().min(1).optional(),
    max_attempts: z.number().int().positive().optional(),
  })
  .strict();

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Raised when the configuration file does not exist.
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigNotFoundError";
  }
}

/**
 * Raised when the configuration has unknown or mistyped fields.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigValidationError";
  }
}

/**
 * LRU cache for parsed configuration files.
 */
const configCache = new LRUCache<string, Config>({
  max: 32,
  ttl: 1000 * 60 * 5, // 5 minutes TTL
});

function validateConfig(source: string, config: unknown): Config {
  const result = ConfigSchema.safeParse(config ?? {});
  if (!result.success) {
    const fields = result.error.errors.map((e) => e.path.join(".") || e.message);
    throw new ConfigValidationError(
      `Configuration validation failed for ${source}. Invalid fields: ${fields.join(", ")}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Loads configuration from a YAML file.
 *
 * @param path - Path to the YAML file
 * @returns Parsed and validated configuration object
 *
 * @throws {ConfigNotFoundError} If the file does not exist
 * @throws {ConfigError} If the file cannot be read or parsed
 * @throws {ConfigValidationError} If fields are unknown or mistyped
 */
export async function loadConfigFromFile(path: string): Promise<Config> {
  const cached = configCache.get(path);
  if (cached) {
    logger.debug(`Using cached config for file: ${path}`);
    return cached;
  }

  logger.info(`Loading config from file: ${path}`);

  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (
      error &&
      typeof error === "object" &&
      "code" in error &&
      error.code === "ENOENT"
    ) {
      throw new ConfigNotFoundError(`Could not find config file: ${path}`, { cause: error });
    }
    throw new ConfigError(`Failed to read config file ${path}: ${String(error)}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML configuration from ${path}: ${String(error)}`, {
      cause: error,
    });
  }

  const config = validateConfig(path, parsed);
  configCache.set(path, config);

  logger.info("Config loaded successfully");
  return config;
}

/**
 * Builds configuration from the standard AWS environment variables.
 *
 * @param env - Environment to read (defaults to process.env)
 *
 * @throws {ConfigValidationError} If AWS_MAX_ATTEMPTS is not a positive integer
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const maxAttempts = env.AWS_MAX_ATTEMPTS;
  return validateConfig("environment", {
    region: env.AWS_REGION || env.AWS_DEFAULT_REGION || undefined,
    profile: env.AWS_PROFILE || undefined,
    max_attempts: maxAttempts ? Number(maxAttempts) : undefined,
  });
}

/**
 * Builds the AWS context described by a configuration.
 */
export function createContext(config: Config): AwsContext {
  return new AwsContext({
    region: config.region,
    profile: config.profile,
    maxAttempts: config.max_attempts,
  });
}

/**
 * Clears the configuration cache.
 * Useful for testing or forcing a fresh config reload.
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug("Config cache cleared");
}
