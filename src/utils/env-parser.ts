/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * All env var access for the client and the search pipeline goes through here.
 */

import {
  appConfigSchema,
  cdpConfigSchema,
  logConfigSchema,
  searchConfigSchema,
  ConfigValidationError,
  type AppConfig,
  type CdpConfig,
  type LogConfig,
  type SearchConfig,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToCdpConfig(env: Env) {
  return {
    host: env.CHROME_CDP_HOST,
    port: env.CHROME_CDP_PORT,
    minDelayMs: env.MIN_DELAY_SECONDS,
    maxDelayMs: env.MAX_DELAY_SECONDS,
  };
}

function mapEnvToSearchConfig(env: Env) {
  return {
    baseUrl: env.SEARCH_BASE_URL,
    networkFilter: env.SEARCH_NETWORK_FILTER || undefined,
  };
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

/**
 * Parse the debug endpoint location and inter-action delay bounds.
 */
export function parseCdpConfig(env: Env = process.env): CdpConfig {
  const result = cdpConfigSchema.safeParse(mapEnvToCdpConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('cdp', result.error);
  }
  return result.data;
}

export function parseSearchConfig(env: Env = process.env): SearchConfig {
  const result = searchConfigSchema.safeParse(mapEnvToSearchConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('search', result.error);
  }
  return result.data;
}

// ============================================
// FULL CONFIGURATION
// ============================================

/**
 * Parse every section at once. Reports all invalid variables together
 * rather than stopping at the first bad section.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const result = appConfigSchema.safeParse({
    log: mapEnvToLogConfig(env),
    cdp: mapEnvToCdpConfig(env),
    search: mapEnvToSearchConfig(env),
  });
  if (!result.success) {
    throw new ConfigValidationError('application', result.error);
  }
  return result.data;
}
