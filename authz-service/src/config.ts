/**
 * Authorization Service Configuration
 *
 * Priority order (lowest to highest):
 * 1. AUTHZ_CONFIG_DEFAULTS
 * 2. JSON config file (optional; a missing file is skipped)
 * 3. Environment variables (AUTHZ_*)
 *
 * The merged result is validated; invalid config throws with every problem
 * listed.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({ configFile: './config/authz.json' });
 * const authz = await createAuthorization(config);
 * ```
 */

import { readFile } from 'node:fs/promises';
import { type } from 'arktype';
import { AUTHZ_CONFIG_DEFAULTS, type ConfigSection } from './config-defaults.js';
import { logger } from './common/logger.js';

// ═══════════════════════════════════════════════════════════════════
// Schema
// ═══════════════════════════════════════════════════════════════════

const AuthzConfigSchema = type({
  mongo: { uri: 'string', dbName: 'string > 0' },
  redis: { url: 'string' },
  cache: {
    ttlSeconds: 'number.integer >= 1',
    invalidation: "'ttl-only' | 'fan-out'",
    maxEntries: 'number.integer >= 1',
  },
  executor: {
    concurrency: 'number.integer >= 1',
    maxQueue: 'number.integer >= 0',
  },
  log: {
    level: "'debug' | 'info' | 'warn' | 'error'",
    format: "'json' | 'text' | 'pretty'",
  },
});

export type AuthzConfig = typeof AuthzConfigSchema.infer;

export class ConfigValidationError extends Error {
  constructor(readonly problems: string) {
    super(`Invalid configuration: ${problems}`);
    this.name = 'ConfigValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════
// Environment
// ═══════════════════════════════════════════════════════════════════

type EnvBinding = [section: ConfigSection, key: string, kind: 'string' | 'number'];

export const ENV_BINDINGS: Record<string, EnvBinding> = {
  AUTHZ_MONGO_URI: ['mongo', 'uri', 'string'],
  AUTHZ_MONGO_DB: ['mongo', 'dbName', 'string'],
  AUTHZ_REDIS_URL: ['redis', 'url', 'string'],
  AUTHZ_CACHE_TTL: ['cache', 'ttlSeconds', 'number'],
  AUTHZ_CACHE_INVALIDATION: ['cache', 'invalidation', 'string'],
  AUTHZ_CACHE_MAX_ENTRIES: ['cache', 'maxEntries', 'number'],
  AUTHZ_EXECUTOR_CONCURRENCY: ['executor', 'concurrency', 'number'],
  AUTHZ_EXECUTOR_MAX_QUEUE: ['executor', 'maxQueue', 'number'],
  AUTHZ_LOG_LEVEL: ['log', 'level', 'string'],
  AUTHZ_LOG_FORMAT: ['log', 'format', 'string'],
};

// ═══════════════════════════════════════════════════════════════════
// Loader
// ═══════════════════════════════════════════════════════════════════

export interface LoadConfigOptions {
  /** JSON file with any subset of the sections */
  configFile?: string;
  /** Environment to read AUTHZ_* from (default: process.env) */
  env?: Record<string, string | undefined>;
}

type RawConfig = Record<string, Record<string, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function defaults(): RawConfig {
  const raw: RawConfig = {};
  for (const [section, { value }] of Object.entries(AUTHZ_CONFIG_DEFAULTS)) {
    raw[section] = { ...value };
  }
  return raw;
}

async function loadConfigFile(filePath: string): Promise<Record<string, unknown> | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      logger.debug('Config file not found, skipping', { configFile: filePath });
      return null;
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) {
    throw new ConfigValidationError(`${filePath} must contain a JSON object`);
  }
  return parsed;
}

function applyFile(raw: RawConfig, file: Record<string, unknown>): void {
  for (const [section, values] of Object.entries(file)) {
    const target = raw[section];
    if (!target) {
      throw new ConfigValidationError(`unknown section "${section}"`);
    }
    if (!isRecord(values)) {
      throw new ConfigValidationError(`section "${section}" must be an object`);
    }
    Object.assign(target, values);
  }
}

function applyEnv(raw: RawConfig, env: Record<string, string | undefined>): void {
  for (const [name, [section, key, kind]] of Object.entries(ENV_BINDINGS)) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    raw[section][key] = kind === 'number' ? Number(value) : value;
  }
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AuthzConfig> {
  const { configFile, env = process.env } = options;
  const raw = defaults();

  if (configFile) {
    const file = await loadConfigFile(configFile);
    if (file) {
      applyFile(raw, file);
      logger.debug('Loaded config file', { configFile });
    }
  }

  applyEnv(raw, env);

  const config = AuthzConfigSchema(raw);
  if (config instanceof type.errors) {
    throw new ConfigValidationError(config.summary);
  }
  return config;
}

// ═══════════════════════════════════════════════════════════════════
// Redaction
// ═══════════════════════════════════════════════════════════════════

/**
 * Copy of the config with every non-empty sensitive value masked, for logging
 */
export function redactConfig(config: AuthzConfig): Record<string, Record<string, unknown>> {
  const redacted: Record<string, Record<string, unknown>> = {};

  for (const [section, values] of Object.entries(config)) {
    redacted[section] = { ...values };
  }

  for (const { sensitivePaths = [] } of Object.values(AUTHZ_CONFIG_DEFAULTS)) {
    for (const path of sensitivePaths) {
      const [section, key] = path.split('.');
      const values = redacted[section];
      if (values && values[key]) values[key] = '***';
    }
  }

  return redacted;
}
