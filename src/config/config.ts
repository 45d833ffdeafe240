// Unified configuration system for blockcat
// Schema-driven with layered overrides: defaults < file < env < cli

import { join } from 'node:path';
import schema from './schema.json' with { type: 'json' };
import { Env } from '../env.ts';
import { ConfigError, ERROR_MESSAGES } from '../errors.ts';
import { getLogger, isLogLevel, type LogLevel } from '../logging.ts';
import { existsSync, readTextFileSync } from '../runtime/mod.ts';
import { ANSI_OUTPUT_FORMATS, type AnsiOutputFormat } from '../types.ts';
import { getConfigDir } from '../xdg.ts';

const logger = getLogger('config');

/**
 * Schema property definition
 */
export interface ConfigProperty {
  type: string;
  default?: unknown;
  env?: string;
  flag?: string;
  short?: string;
  enum?: string[];
  description?: string;
}

/**
 * Config schema structure
 */
export interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

/**
 * Options for BlockcatConfig.load()
 */
export interface ConfigLoadOptions {
  cliFlags?: Record<string, unknown>;
  /** Config file to read instead of $XDG_CONFIG_HOME/blockcat/config.json */
  configPath?: string;
}

/**
 * Where a resolved value came from.
 *
 * Priority order (lowest to highest):
 * 1. Schema defaults
 * 2. File config (~/.config/blockcat/config.json)
 * 3. Env vars
 * 4. CLI flags (highest - explicit user intent)
 */
export type ConfigSource = 'default' | 'file' | 'env' | 'cli';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isAnsiOutputFormat(value: unknown): value is AnsiOutputFormat {
  return ANSI_OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Get the default config file path
 */
export function getConfigFilePath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Coerce a raw string (flag or env value) to the property's type.
 * Enum values match case-insensitively and are returned in their schema spelling.
 */
export function parseValue(path: string, value: string, prop: ConfigProperty): unknown {
  switch (prop.type) {
    case 'boolean':
      return value === 'true' || value === '1';
    case 'integer':
      return parseInt(value, 10);
    case 'number':
      return parseFloat(value);
    default: {
      if (!prop.enum) return value;
      const match = prop.enum.find((option) => option.toLowerCase() === value.toLowerCase());
      if (match === undefined) {
        throw new ConfigError(ERROR_MESSAGES.invalidOption(path, value, prop.enum));
      }
      return match;
    }
  }
}

/**
 * Resolved configuration. Each value remembers which layer supplied it.
 */
export class BlockcatConfig {
  private data: Record<string, unknown> = {};
  private sources: Record<string, ConfigSource> = {};

  private constructor(
    readonly configPath: string,
    fileConfig: Record<string, unknown>,
    cliFlags: Record<string, unknown>
  ) {
    for (const [path, prop] of Object.entries(BlockcatConfig.getSchema().properties)) {
      const { value, source } = resolveValue(path, prop, fileConfig, cliFlags);
      if (prop.enum && value !== undefined && !prop.enum.some((option) => option === value)) {
        throw new ConfigError(ERROR_MESSAGES.invalidOption(path, value, prop.enum));
      }
      this.data[path] = value;
      this.sources[path] = source;
    }
  }

  /**
   * Read the config file and environment and layer the CLI flags on top.
   * Every call resolves afresh.
   *
   * @throws ConfigError for an unreadable config file or a value outside its enum
   */
  static load(options: ConfigLoadOptions = {}): BlockcatConfig {
    const configPath = options.configPath ?? getConfigFilePath();
    const config = new BlockcatConfig(configPath, loadConfigFile(configPath), options.cliFlags ?? {});
    logger.debug('configuration resolved', { configPath, sources: config.sources });
    return config;
  }

  static getSchema(): ConfigSchema {
    return schema as ConfigSchema;
  }

  /**
   * Current config with the source of each value, one line per option
   */
  getConfigText(): string {
    const lines = [
      `Config file: ${this.configPath} ${existsSync(this.configPath) ? '(exists)' : '(not found)'}`,
      'Priority: default < file < env < cli',
      '',
    ];

    for (const [path, prop] of Object.entries(BlockcatConfig.getSchema().properties)) {
      const value = this.data[path];
      const shown = value === undefined ? '(not set)' : JSON.stringify(value);
      const origin = {
        default: '',
        file: ' <- config.json',
        env: ` <- ${prop.env}`,
        cli: ` <- ${prop.flag}`,
      }[this.sources[path]];
      lines.push(`  ${path} = ${shown}${origin}`);
    }

    return lines.join('\n');
  }

  // ============================================================================
  // Generic getters
  // ============================================================================

  getString(key: string, defaultValue: string): string {
    const value = this.data[key];
    if (value === undefined || value === null) return defaultValue;
    return String(value);
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.data[key];
    if (value === undefined || value === null) return defaultValue;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value === 'true' || value === '1';
    return Boolean(value);
  }

  getSource(key: string): ConfigSource | undefined {
    return this.sources[key];
  }

  // ============================================================================
  // Typed getters
  // ============================================================================

  /** Requested size as `NxM`, unset when it should follow the terminal */
  get size(): string | undefined {
    const value = this.getString('size', '');
    return value === '' ? undefined : value;
  }

  /** Stretch to the full size, ignoring the aspect ratio */
  get force(): boolean {
    return this.getBoolean('force', false);
  }

  get ansi(): AnsiOutputFormat {
    const value = this.data['ansi'];
    return isAnsiOutputFormat(value) ? value : 'truecolor';
  }

  /** True when the output style was chosen rather than defaulted */
  get ansiExplicit(): boolean {
    return this.getSource('ansi') !== 'default';
  }

  get logLevel(): LogLevel {
    const value = this.getString('log.level', 'INFO');
    return isLogLevel(value) ? value : 'INFO';
  }

  get logFile(): string {
    return this.getString('log.file', '');
  }
}

/**
 * Pick the highest-priority layer that sets `path`: cli, env, file, then the default.
 */
function resolveValue(
  path: string,
  prop: ConfigProperty,
  fileConfig: Record<string, unknown>,
  cliFlags: Record<string, unknown>
): { value: unknown; source: ConfigSource } {
  if (prop.flag && cliFlags[path] !== undefined) {
    return { value: cliFlags[path], source: 'cli' };
  }

  const envVal = prop.env ? Env.get(prop.env) : undefined;
  if (envVal !== undefined) {
    return { value: parseValue(path, envVal, prop), source: 'env' };
  }

  const fileVal = getPath(fileConfig, path);
  if (fileVal !== undefined) {
    return { value: fileVal, source: 'file' };
  }

  return { value: prop.default, source: 'default' };
}

/**
 * Look up a dotted path, first as a flat key then through nested objects.
 */
function getPath(obj: Record<string, unknown>, path: string): unknown {
  if (path in obj) {
    return obj[path];
  }

  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function loadConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readTextFileSync(configPath));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(ERROR_MESSAGES.invalidConfigFile(configPath, reason));
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(ERROR_MESSAGES.invalidConfigFile(configPath, 'expected a JSON object'));
  }
  return parsed;
}
