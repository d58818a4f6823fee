/**
 * Configuration loading and management
 */

import { ConfigurationError } from '@candlefeed/contracts';
import type { Logger } from '@candlefeed/logger';
import { resolvePolicy, type ClassificationPolicy, type PolicyOverrides } from '@candlefeed/market-data-core';
import { configSchema, envMapping, type Config } from './schema.js';

/**
 * Load configuration from environment and defaults
 *
 * Blank variables count as unset. The classification policy is resolved
 * once here so a bad policy name fails at startup, not on the first request.
 *
 * @throws {ConfigurationError} When a variable fails validation
 */
export function loadConfig(logger?: Logger, env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      setNestedProperty(rawConfig, configPath, value.trim());
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  getClassificationPolicy(result.data);

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Builds the classification policy the config names, with threshold overrides
 *
 * @throws {ConfigurationError} For unknown policies or out-of-order thresholds
 */
export function getClassificationPolicy(config: Config): ClassificationPolicy {
  const { policy, dojiThreshold, weakThreshold, strongThreshold } = config.classification;
  const overrides: PolicyOverrides = {};

  if (dojiThreshold !== undefined) overrides.dojiThreshold = dojiThreshold;
  if (weakThreshold !== undefined) overrides.weakThreshold = weakThreshold;
  if (strongThreshold !== undefined) overrides.strongThreshold = strongThreshold;

  return resolvePolicy(policy, overrides);
}

function setNestedProperty(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get configuration summary for logging
 *
 * Leaves out credentials.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    version: config.app.version,
    server: {
      host: config.server.host,
      port: config.server.port,
    },
    provider: config.provider.type,
    classification: config.classification.policy,
    sessionMinutes: config.market.sessionMinutes,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
