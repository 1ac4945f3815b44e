/**
 * Configuration loader for Cloud Cost Inventory.
 *
 * Loads configuration from AWS Systems Manager (SSM) Parameter Store or a
 * local YAML file, validates the structure, and resolves it together with
 * command-line overrides into the options of one inventory run.
 */

import { readFile } from 'node:fs/promises';
import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { LRUCache } from 'lru-cache';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { Config, InventoryOptions, ResourceKind } from '@shared/types';
import { RESOURCE_KINDS } from '@shared/types';
import { DEFAULT_PRICE_TABLE, ZERO_PRICE_TABLE, withPriceOverrides } from '@shared/pricing';
import { knownKindNames, parseKind } from '@shared/utils/kinds';
import { setupLogger } from '@shared/utils/logger';
import { DEFAULT_CONCURRENCY } from './orchestrator';
import { parseRegionSelection } from './regions';

const logger = setupLogger('cost-inventory:config');

const RatesSchema = z.record(z.number().nonnegative());

/**
 * Configuration schema validation using Zod.
 */
const ConfigSchema = z
  .object({
    version: z.string(),
    environment: z.string(),
    regions: z.union([z.string(), z.array(z.string())]).optional(),
    resource_kinds: z.union([z.string(), z.array(z.string())]).optional(),
    settings: z
      .object({
        concurrency: z.number().int().positive().optional(),
        no_cost: z.boolean().optional(),
        max_attempts: z.number().int().positive().optional(),
        profile: z.string().optional(),
      })
      .passthrough()
      .optional(),
    pricing: z
      .object({
        compute: RatesSchema.optional(),
        'block-volume': RatesSchema.optional(),
        'object-store': RatesSchema.optional(),
        'floating-ip': RatesSchema.optional(),
        snapshot: RatesSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .passthrough();

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the SSM parameter is not found.
 */
export class ParameterNotFoundError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ParameterNotFoundError';
  }
}

/**
 * Raised when the configuration is missing required fields or is invalid.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Raised for service names that match no resource kind.
 */
export class InvalidServiceError extends ConfigError {
  readonly invalid: readonly string[];

  constructor(invalid: readonly string[], options?: ErrorOptions) {
    super(
      `Invalid services: ${invalid.join(', ')}. Valid services: ${knownKindNames().join(', ')}`,
      options
    );
    this.name = 'InvalidServiceError';
    this.invalid = invalid;
  }
}

/**
 * LRU cache for configuration objects.
 * Prevents unnecessary SSM API calls for the same parameter.
 */
const configCache = new LRUCache<string, Config>({
  max: 128,
  ttl: 1000 * 60 * 5, // 5 minutes TTL
});

/**
 * Parse and validate a YAML configuration document.
 *
 * @param text - Raw YAML
 * @param source - Where the text came from, for error messages
 *
 * @throws {ConfigError} If the YAML cannot be parsed
 * @throws {ConfigValidationError} If required fields are missing or invalid
 */
export function parseConfig(text: string, source: string): Config {
  let config: unknown;
  try {
    config = yaml.load(text);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse YAML configuration from ${source}: ${String(error)}`,
      { cause: error }
    );
  }

  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const fields = result.error.errors.map((e) => e.path.join('.') || '(root)');
    throw new ConfigValidationError(
      `Configuration validation failed. Missing or invalid fields: ${fields.join(', ')}`,
      { cause: result.error }
    );
  }

  return result.data;
}

/**
 * Loads configuration from an AWS SSM parameter.
 *
 * @param parameterName - The name of the SSM parameter
 * @param client - Optional SSM client for testing
 * @returns Parsed and validated configuration object
 *
 * @throws {ParameterNotFoundError} If the parameter is not found
 * @throws {ConfigError} If the configuration cannot be retrieved or parsed
 * @throws {ConfigValidationError} If required fields are missing
 */
export async function loadConfigFromSsm(
  parameterName: string,
  client?: SSMClient
): Promise<Config> {
  const cached = configCache.get(parameterName);
  if (cached) {
    logger.debug(`Using cached config for parameter: ${parameterName}`);
    return cached;
  }

  logger.info(`Loading config from SSM: ${parameterName}`);

  const ssmClient = client ?? new SSMClient({});

  let parameterValue: string;
  try {
    const response = await ssmClient.send(new GetParameterCommand({ Name: parameterName }));
    parameterValue = response.Parameter?.Value ?? '';
  } catch (error) {
    if (error instanceof Error && error.name === 'ParameterNotFound') {
      throw new ParameterNotFoundError(`Could not find SSM parameter: ${parameterName}`, {
        cause: error,
      });
    }
    throw new ConfigError(`Failed to retrieve SSM parameter: ${String(error)}`, {
      cause: error,
    });
  }

  if (!parameterValue) {
    throw new ConfigError(`SSM parameter ${parameterName} exists but has no value`);
  }

  const config = parseConfig(parameterValue, `parameter ${parameterName}`);
  configCache.set(parameterName, config);

  logger.info('Config loaded successfully');
  return config;
}

/**
 * Loads configuration from a local YAML file. Not cached.
 *
 * @throws {ConfigError} If the file cannot be read or parsed
 * @throws {ConfigValidationError} If required fields are missing
 */
export async function loadConfigFromFile(filePath: string): Promise<Config> {
  logger.info(`Loading config from file: ${filePath}`);

  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Could not read config file ${filePath}: ${String(error)}`, {
      cause: error,
    });
  }

  return parseConfig(text, `file ${filePath}`);
}

/**
 * Clears the configuration cache.
 * Useful for testing or forcing a fresh config reload.
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Config cache cleared');
}

/**
 * Resolve a region selection. Missing or blank means all regions.
 *
 * @example
 * resolveRegions('us-east-1, eu-west-1'); // ['us-east-1', 'eu-west-1']
 * resolveRegions(undefined);              // 'all'
 */
export function resolveRegions(value: string | readonly string[] | undefined): 'all' | string[] {
  return value === undefined ? 'all' : parseRegionSelection(value);
}

/**
 * Resolve service names and aliases to resource kinds, in the order given,
 * without duplicates. Missing, blank or "all" selects every kind.
 *
 * @throws {InvalidServiceError} If any name matches no kind
 */
export function resolveKinds(value: string | readonly string[] | undefined): ResourceKind[] {
  if (value === undefined) {
    return [...RESOURCE_KINDS];
  }

  const names = (typeof value === 'string' ? value.split(',') : value)
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  if (names.length === 0 || names.some((name) => name.toLowerCase() === 'all')) {
    return [...RESOURCE_KINDS];
  }

  const kinds: ResourceKind[] = [];
  const invalid: string[] = [];

  for (const name of names) {
    const kind = parseKind(name);
    if (!kind) {
      invalid.push(name);
    } else if (!kinds.includes(kind)) {
      kinds.push(kind);
    }
  }

  if (invalid.length > 0) {
    throw new InvalidServiceError(invalid);
  }

  return kinds;
}

/**
 * Values given on the command line or in a Lambda event. They take
 * precedence over the configuration document.
 */
export interface InventoryOverrides {
  regions?: string;
  services?: string;
  profile?: string;
  noCost?: boolean;
  concurrency?: number;
}

/**
 * Combine configuration and overrides into run options.
 *
 * @throws {InvalidServiceError} If a service name is unknown
 * @throws {ConfigValidationError} If concurrency is not a positive integer
 */
export function resolveInventoryOptions(
  config: Config | undefined,
  overrides: InventoryOverrides = {}
): InventoryOptions {
  const settings: NonNullable<Config['settings']> = config?.settings ?? {};
  const concurrency = overrides.concurrency ?? settings.concurrency ?? DEFAULT_CONCURRENCY;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigValidationError(
      `Concurrency must be a positive integer, got: ${String(concurrency)}`
    );
  }

  const noCost = overrides.noCost ?? settings.no_cost ?? false;

  return {
    regions: resolveRegions(overrides.regions ?? config?.regions),
    kinds: resolveKinds(overrides.services ?? config?.resource_kinds),
    pricing: noCost ? ZERO_PRICE_TABLE : withPriceOverrides(DEFAULT_PRICE_TABLE, config?.pricing),
    concurrency,
    profile: overrides.profile ?? settings.profile,
    maxAttempts: settings.max_attempts,
  };
}
