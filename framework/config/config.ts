/**
 * Configuration Management
 *
 * Loads and manages application configuration from multiple sources.
 */

import { readFile } from 'node:fs/promises';
import { ConfigError } from '../http/errors.ts';
import { parseLogLevel, type LogLevel } from '../telemetry/logger.ts';

export interface ConfigOptions {
  port?: number;
  host?: string;
  env?: string;
  debug?: boolean;
  logLevel?: LogLevel;
  /** Where the server list is read from */
  serverConfigPath?: string;
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  port: 8000,
  host: '0.0.0.0',
  env: 'development',
  debug: false,
  logLevel: 'info',
  serverConfigPath: 'server_conf.json',
};

const DEFAULT_LOCATIONS = ['./config/app.json', './config.json'];
const CONFIG_KEY = 'switchyard';

/**
 * Configuration manager
 */
export class Config {
  private config: Record<string, unknown>;

  constructor(options: ConfigOptions = {}) {
    this.config = mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dotted path
   */
  get(key: string): unknown {
    return getNestedValue(this.config, key);
  }

  /**
   * Get a string value, or the default when missing or not a string
   */
  string(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  number(key: string, defaultValue: number): number {
    const value = this.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
  }

  boolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  /**
   * Set a configuration value
   */
  set(key: string, value: unknown): void {
    setNestedValue(this.config, key, value);
  }

  /**
   * Check if a configuration key exists
   */
  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Get all configuration
   */
  all(): Record<string, unknown> {
    return { ...this.config };
  }

  get port(): number {
    return this.number('port', 8000);
  }

  get host(): string {
    return this.string('host', '0.0.0.0');
  }

  get env(): string {
    return this.string('env', 'development');
  }

  get debug(): boolean {
    return this.boolean('debug', false);
  }

  get logLevel(): LogLevel {
    return parseLogLevel(this.string('logLevel', 'info'));
  }

  get serverConfigPath(): string {
    return this.string('serverConfigPath', 'server_conf.json');
  }
}

/**
 * Load configuration from a config file and the environment.
 *
 * An explicit path is read as a whole; otherwise the default locations are
 * tried in turn for a `switchyard` section. A missing file is skipped.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  if (configPath) {
    fileConfig = (await readJsonFile(configPath)) ?? {};
  } else {
    for (const path of DEFAULT_LOCATIONS) {
      const parsed = await readJsonFile(path);
      const section = parsed?.[CONFIG_KEY];
      if (isRecord(section)) {
        fileConfig = section;
        break;
      }
    }
  }

  const config = new Config(fileConfig);

  // Override with environment variables
  if (env.PORT !== undefined) {
    const port = Number.parseInt(env.PORT, 10);
    if (Number.isNaN(port)) {
      throw new ConfigError(`PORT must be a number, got '${env.PORT}'`, 'port');
    }
    config.set('port', port);
  }
  if (env.HOST) config.set('host', env.HOST);
  if (env.NODE_ENV) config.set('env', env.NODE_ENV);
  if (env.DEBUG !== undefined) config.set('debug', env.DEBUG === 'true' || env.DEBUG === '1');
  if (env.LOG_LEVEL) config.set('logLevel', parseLogLevel(env.LOG_LEVEL, config.logLevel));
  if (env.SERVER_CONFIG) config.set('serverConfigPath', env.SERVER_CONFIG);

  return config;
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

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a JSON object file; undefined when the file does not exist
 */
async function readJsonFile(path: string): Promise<Record<string, unknown> | undefined> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined;
    throw new ConfigError(`Cannot read config file ${path}`, undefined, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, undefined, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isRecord(value) ? mergeConfig(isRecord(current) ? current : {}, value) : value;
  }

  return result;
}

function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const key of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop() ?? path;
  let current = obj;

  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}
