/**
 * Configuration loading and validation.
 *
 * Resolution order, later wins: built-in defaults, the configuration file,
 * command-line overrides. The file is validated against
 * schemas/config.schema.json.
 */

import { fileURLToPath } from 'node:url';
import type { ConfigOverrides, PomobarConfig, PomobarConfigFile } from '../types/config.js';
import { FsError, isNotFound, readJsonFile } from './fs.js';
import { resolveDefaultConfigPath, resolveSocketPath } from './paths.js';
import { loadSchema, validateWithSchema } from './schema.js';
import { DEFAULT_GLYPHS } from './render.js';

type Env = Record<string, string | undefined>;

/** Location of the configuration JSON schema, beside src/ and dist/ */
export const CONFIG_SCHEMA_PATH = fileURLToPath(new URL('../../schemas/config.schema.json', import.meta.url));

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Built-in defaults. The socket path depends on the environment.
 */
export function defaultConfig(env: Env = process.env): PomobarConfig {
  return {
    work_minutes: 25,
    break_minutes: 5,
    socket_path: resolveSocketPath(env),
    poll_interval_ms: 900,
    output: 'plain',
    glyphs: { ...DEFAULT_GLYPHS },
    notifications: {
      enabled: true,
      command: 'notify-send',
    },
  };
}

/**
 * Reads and validates a configuration file.
 *
 * @throws {ConfigError} If the file cannot be read, is not JSON or violates the schema
 */
export async function readConfigFile(configPath: string): Promise<PomobarConfigFile> {
  let raw: unknown;
  try {
    raw = await readJsonFile(configPath);
  } catch (error) {
    if (error instanceof FsError) {
      throw new ConfigError(`Failed to read configuration file: ${error.message}`, configPath, error);
    }
    throw error;
  }

  const schema = await loadSchema(CONFIG_SCHEMA_PATH);
  const result = validateWithSchema<PomobarConfigFile>(raw, schema);
  if (!result.valid) {
    throw new ConfigError(`Invalid configuration file ${configPath}:\n  ${result.errors.join('\n  ')}`, configPath);
  }
  return result.data;
}

/**
 * Layers a configuration file and overrides on top of a base configuration.
 */
export function mergeConfig(
  base: PomobarConfig,
  file: PomobarConfigFile = {},
  overrides: ConfigOverrides = {}
): PomobarConfig {
  return {
    work_minutes: overrides.work_minutes ?? file.work_minutes ?? base.work_minutes,
    break_minutes: overrides.break_minutes ?? file.break_minutes ?? base.break_minutes,
    socket_path: overrides.socket_path ?? file.socket_path ?? base.socket_path,
    poll_interval_ms: overrides.poll_interval_ms ?? file.poll_interval_ms ?? base.poll_interval_ms,
    output: overrides.output ?? file.output ?? base.output,
    glyphs: { ...base.glyphs, ...file.glyphs },
    notifications: { ...base.notifications, ...file.notifications },
  };
}

export interface LoadConfigOptions {
  /** Explicit file; must exist */
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: Env;
}

export interface LoadedConfig {
  config: PomobarConfig;
  /** File the configuration came from, or null when only defaults applied */
  source: string | null;
}

/**
 * Loads the effective configuration.
 *
 * An explicit `configPath` must exist. The default location is optional.
 *
 * @throws {ConfigError} If a file that is used cannot be read or is invalid
 *
 * @example
 * ```typescript
 * const { config } = await loadConfig({ overrides: { work_minutes: 50 } });
 * ```
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const base = defaultConfig(env);

  if (options.configPath) {
    const file = await readConfigFile(options.configPath);
    return { config: mergeConfig(base, file, options.overrides), source: options.configPath };
  }

  const defaultPath = resolveDefaultConfigPath(env);
  try {
    const file = await readConfigFile(defaultPath);
    return { config: mergeConfig(base, file, options.overrides), source: defaultPath };
  } catch (error) {
    if (error instanceof ConfigError && isNotFound(error.cause)) {
      return { config: mergeConfig(base, {}, options.overrides), source: null };
    }
    throw error;
  }
}

/** Phase lengths in seconds for the session */
export function sessionDurations(config: PomobarConfig): { workSeconds: number; breakSeconds: number } {
  return {
    workSeconds: config.work_minutes * 60,
    breakSeconds: config.break_minutes * 60,
  };
}
