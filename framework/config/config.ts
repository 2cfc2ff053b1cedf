/**
 * Configuration Management
 *
 * Loads configuration from a JSON file and the environment, validates it,
 * and fills in defaults.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../errors.ts';

const configSchema = z.object({
  /** Listen address, `host:port` with the host optional (`:8080`) */
  address: z.string().min(1).default(':8080'),
  env: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logFormat: z.enum(['json', 'pretty']).default('pretty'),
  session: z
    .object({
      /** Session cookie lifetime in seconds */
      lifetime: z.number().int().positive().default(30 * 60),
    })
    .default({}),
  static: z
    .object({
      /** Cache lifetime for static files in seconds */
      maxAge: z.number().int().nonnegative().default(86400),
    })
    .default({}),
  telemetry: z
    .object({
      otel: z.boolean().default(false),
    })
    .default({}),
});

export type ConfigInput = z.input<typeof configSchema>;
export type ResolvedConfig = z.output<typeof configSchema>;

/**
 * Validated configuration
 */
export class Config {
  private readonly config: ResolvedConfig;

  constructor(options: ConfigInput = {}) {
    this.config = parseConfig(options);
  }

  /**
   * Get a configuration value
   */
  get<K extends keyof ResolvedConfig>(key: K): ResolvedConfig[K] {
    return this.config[key];
  }

  /**
   * Get all configuration
   */
  all(): ResolvedConfig {
    return structuredClone(this.config);
  }
}

/**
 * Validate raw configuration and apply defaults
 */
export function parseConfig(input: unknown): ResolvedConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Load configuration from a JSON file, then the environment.
 * An absent file leaves the defaults in place.
 */
export async function loadConfig(
  configPath = './config/app.json',
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const fileConfig = await readConfigFile(configPath);
  const merged = mergeConfig(fileConfig, envOverrides(env));
  return new Config(parseConfig(merged));
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read ${configPath}`, [String(error)]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Malformed JSON in ${configPath}`, [String(error)]);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Environment variables that override file configuration
 */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (env.ADDRESS) overrides.address = env.ADDRESS;
  if (env.NODE_ENV) overrides.env = env.NODE_ENV;
  if (env.LOG_LEVEL) overrides.logLevel = env.LOG_LEVEL;
  if (env.LOG_FORMAT) overrides.logFormat = env.LOG_FORMAT;
  if (env.SESSION_LIFETIME) overrides.session = { lifetime: Number(env.SESSION_LIFETIME) };
  if (env.STATIC_MAX_AGE) overrides.static = { maxAge: Number(env.STATIC_MAX_AGE) };
  if (env.OTEL_ENABLED) overrides.telemetry = { otel: env.OTEL_ENABLED === 'true' };

  return overrides;
}

/**
 * Merge configurations, nested objects key by key
 */
function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const current = base[key];
    result[key] = isPlainObject(value) && isPlainObject(current)
      ? mergeConfig(current, value)
      : value;
  }

  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// Default config instance
let defaultConfig: Config | null = null;

/**
 * Get the default config instance
 */
export function getConfig(): Config {
  if (!defaultConfig) {
    defaultConfig = new Config();
  }
  return defaultConfig;
}
