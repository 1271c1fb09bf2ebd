/**
 * Configuration Management
 *
 * Defaults, overlaid by an optional JSON file, overlaid by environment
 * variables. The merged result is validated with zod before use.
 */

import { readFile } from 'node:fs/promises';
import { z, type ZodError } from 'zod';
import { LOG_LEVEL_NAMES } from '../telemetry/logger.ts';

// ============================================================================
// Schema
// ============================================================================

export const ConfigSchema = z.object({
  port: z.number().int().min(0).max(65535),
  host: z.string().min(1),
  env: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(LOG_LEVEL_NAMES),
  database: z.object({
    path: z.string().min(1),
  }),
  session: z.object({
    maxAge: z.number().int().positive(),
    secure: z.boolean(),
  }),
  media: z.object({
    root: z.string().min(1),
  }),
  cache: z.object({
    feedTtl: z.number().int().positive(),
    maxEntries: z.number().int().positive(),
  }),
  seed: z.object({
    groups: z.string().min(1),
  }),
});

export type ConfigOptions = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: ConfigOptions = {
  port: 8000,
  host: '0.0.0.0',
  env: 'development',
  logLevel: 'info',
  database: {
    path: './data/inkwell.db',
  },
  session: {
    maxAge: 86400 * 7, // 7 days
    secure: false,
  },
  media: {
    root: './media',
  },
  cache: {
    feedTtl: 20000,
    maxEntries: 300,
  },
  seed: {
    groups: './config/groups.json',
  },
};

/**
 * Raised when the merged configuration does not match the schema
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }

  static fromZod(error: ZodError): ConfigError {
    return new ConfigError(error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge `override` onto `base`. Undefined values in `override` are skipped.
 */
function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isRecord(value) && isRecord(current) ? mergeConfig(current, value) : value;
  }

  return result;
}

function validate(raw: Record<string, unknown>): ConfigOptions {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw ConfigError.fromZod(parsed.error);
  }
  return parsed.data;
}

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigOptions;

  constructor(options: Record<string, unknown> = {}) {
    this.config = validate(mergeConfig(DEFAULT_CONFIG, options));
  }

  /**
   * Typed view of the whole configuration
   */
  get values(): ConfigOptions {
    return this.config;
  }

  /**
   * Get a value by dotted path, e.g. `session.maxAge`
   */
  get(path: string): unknown {
    let current: unknown = this.config;
    for (const key of path.split('.')) {
      if (!isRecord(current)) return undefined;
      current = current[key];
    }
    return current;
  }

  /**
   * Set a value by dotted path. The result is validated again.
   */
  set(path: string, value: unknown): void {
    const override: Record<string, unknown> = {};
    const parts = path.split('.');
    let target = override;
    parts.forEach((part, index) => {
      if (index === parts.length - 1) {
        target[part] = value;
      } else {
        const next: Record<string, unknown> = {};
        target[part] = next;
        target = next;
      }
    });

    this.config = validate(mergeConfig(this.config, override));
  }

  has(path: string): boolean {
    return this.get(path) !== undefined;
  }

  all(): ConfigOptions {
    return structuredClone(this.config);
  }
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | string | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  // A non-numeric value is passed through so validation reports it
  return /^\d+$/.test(raw) ? parseInt(raw, 10) : raw;
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | string | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  return raw;
}

/**
 * Environment variable overlay
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  return {
    port: envNumber(env, 'PORT'),
    host: env.HOST,
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    database: { path: env.DATABASE_PATH },
    session: { secure: envBoolean(env, 'SESSION_SECURE') },
    media: { root: env.MEDIA_ROOT },
  };
}

/**
 * Load configuration from a JSON file (default `./config/app.json`, skipped
 * when missing) and the environment
 */
export async function loadConfig(
  configPath = './config/app.json',
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  let content: string | null = null;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (!(isRecord(error) && error.code === 'ENOENT')) {
      throw error;
    }
  }

  if (content !== null) {
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      throw new ConfigError([`${configPath}: expected a JSON object`]);
    }
    fileConfig = parsed;
  }

  return new Config(mergeConfig(fileConfig, configFromEnv(env)));
}
