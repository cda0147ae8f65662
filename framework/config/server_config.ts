/**
 * Server Configuration File
 *
 * The list of servers an application listens on, kept in a JSON file
 * (`server_conf.json` by default) with snake_case keys. Durations are in
 * seconds. A missing file is created with one default server.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { ConfigError } from '../http/errors.ts';
import { parseLogLevel, type LogLevel } from '../telemetry/logger.ts';
import { isRecord } from './config.ts';

export interface ServerConfig {
  domain: string;
  port: number;
  /** Seconds allowed to receive a whole request */
  readTimeout: number;
  /** Seconds a response may take; informational on node:http */
  writeTimeout: number;
  maxHeaderBytes: number;
  rateLimit: {
    /** Requests per client per second; 0 disables limiting */
    requestsPerSecond: number;
  };
  logging: {
    logLevel: LogLevel;
  };
  security: {
    /** Host names accepted in the Host header; empty accepts any */
    allowedHosts: string[];
  };
  timeouts: {
    idleTimeout: number;
    headerTimeout: number;
  };
  keepAlive: {
    enabled: boolean;
    timeout: number;
  };
  staticFiles: {
    staticDir: string;
    indexFile: string;
  };
  /** Listener middleware names, outermost first */
  middleware: string[];
}

export interface ServerConfigFile {
  servers: ServerConfig[];
}

export const DEFAULT_SERVER_CONFIG_PATH = 'server_conf.json';

/**
 * Values used for keys a server entry leaves out
 */
export function defaultServerConfig(): ServerConfig {
  return {
    domain: 'localhost',
    port: 8080,
    readTimeout: 5,
    writeTimeout: 10,
    maxHeaderBytes: 1048576,
    rateLimit: { requestsPerSecond: 100 },
    logging: { logLevel: 'info' },
    security: { allowedHosts: [] },
    timeouts: { idleTimeout: 120, headerTimeout: 0 },
    keepAlive: { enabled: true, timeout: 30 },
    staticFiles: { staticDir: './static', indexFile: 'index.html' },
    middleware: ['logging', 'rateLimiting'],
  };
}

/**
 * Read the server list, writing the default file when none exists
 */
export async function loadServerConfig(path = DEFAULT_SERVER_CONFIG_PATH): Promise<ServerConfig[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      const servers = [defaultServerConfig()];
      await saveServerConfig(servers, path);
      return servers;
    }
    throw new ConfigError(`Cannot read server config ${path}`, undefined, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Server config ${path} is not valid JSON`, undefined, { cause: error });
  }

  return parseServerConfigFile(parsed).servers;
}

/**
 * Append a server to the file and persist it
 */
export async function registerServer(
  config: ServerConfig,
  path = DEFAULT_SERVER_CONFIG_PATH
): Promise<ServerConfig[]> {
  const servers = [...(await loadServerConfig(path)), config];
  await saveServerConfig(servers, path);
  return servers;
}

/**
 * Write the server list with 4-space indentation
 */
export async function saveServerConfig(servers: ServerConfig[], path = DEFAULT_SERVER_CONFIG_PATH): Promise<void> {
  const file = { servers: servers.map(toFileEntry) };
  await writeFile(path, JSON.stringify(file, null, 4) + '\n', 'utf8');
}

/**
 * Validate a parsed file into server configs
 */
export function parseServerConfigFile(value: unknown): ServerConfigFile {
  if (!isRecord(value)) {
    throw new ConfigError('Server config must be a JSON object');
  }
  const servers = value.servers;
  if (servers === undefined) return { servers: [] };
  if (!Array.isArray(servers)) {
    throw new ConfigError('Expected an array', 'servers');
  }
  return { servers: servers.map((entry, i) => parseServerConfig(entry, `servers[${i}]`)) };
}

/**
 * Validate one snake_case server entry; missing keys take their defaults
 */
export function parseServerConfig(value: unknown, path = 'server'): ServerConfig {
  const src = new Reader(value, path);
  const defaults = defaultServerConfig();

  const rateLimit = src.section('rate_limit');
  const logging = src.section('logging');
  const security = src.section('security');
  const timeouts = src.section('timeouts');
  const keepAlive = src.section('keep_alive');
  const staticFiles = src.section('static_files');

  const logLevel = logging.string('log_level', defaults.logging.logLevel);
  const port = src.number('port', defaults.port);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Expected a port number, got ${port}`, `${path}.port`);
  }

  return {
    domain: src.string('domain', defaults.domain),
    port,
    readTimeout: src.number('read_timeout', defaults.readTimeout),
    writeTimeout: src.number('write_timeout', defaults.writeTimeout),
    maxHeaderBytes: src.number('max_header_bytes', defaults.maxHeaderBytes),
    rateLimit: {
      requestsPerSecond: rateLimit.number('requests_per_second', defaults.rateLimit.requestsPerSecond),
    },
    logging: { logLevel: parseLogLevel(logLevel, defaults.logging.logLevel) },
    security: {
      allowedHosts: security.strings('allowed_hosts', defaults.security.allowedHosts),
    },
    timeouts: {
      idleTimeout: timeouts.number('idle_timeout', defaults.timeouts.idleTimeout),
      headerTimeout: timeouts.number('header_timeout', defaults.timeouts.headerTimeout),
    },
    keepAlive: {
      enabled: keepAlive.boolean('enabled', defaults.keepAlive.enabled),
      timeout: keepAlive.number('timeout', defaults.keepAlive.timeout),
    },
    staticFiles: {
      staticDir: staticFiles.string('static_dir', defaults.staticFiles.staticDir),
      indexFile: staticFiles.string('index_file', defaults.staticFiles.indexFile),
    },
    middleware: src.strings('middleware', defaults.middleware),
  };
}

function toFileEntry(config: ServerConfig): Record<string, unknown> {
  return {
    domain: config.domain,
    port: config.port,
    read_timeout: config.readTimeout,
    write_timeout: config.writeTimeout,
    max_header_bytes: config.maxHeaderBytes,
    rate_limit: { requests_per_second: config.rateLimit.requestsPerSecond },
    logging: { log_level: config.logging.logLevel },
    security: { allowed_hosts: config.security.allowedHosts },
    timeouts: {
      idle_timeout: config.timeouts.idleTimeout,
      header_timeout: config.timeouts.headerTimeout,
    },
    keep_alive: { enabled: config.keepAlive.enabled, timeout: config.keepAlive.timeout },
    static_files: {
      static_dir: config.staticFiles.staticDir,
      index_file: config.staticFiles.indexFile,
    },
    middleware: config.middleware,
  };
}

/**
 * Typed reads from one JSON object, reporting failures by key path
 */
class Reader {
  private readonly values: Record<string, unknown>;
  private readonly path: string;

  constructor(value: unknown, path: string) {
    if (!isRecord(value)) {
      throw new ConfigError('Expected an object', path);
    }
    this.values = value;
    this.path = path;
  }

  section(key: string): Reader {
    const value = this.values[key];
    return new Reader(value === undefined || value === null ? {} : value, this.keyPath(key));
  }

  string(key: string, fallback: string): string {
    const value = this.values[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'string') throw this.typeError(key, 'a string', value);
    return value;
  }

  /**
   * A non-negative finite number
   */
  number(key: string, fallback: number): number {
    const value = this.values[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw this.typeError(key, 'a non-negative number', value);
    }
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.values[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'boolean') throw this.typeError(key, 'a boolean', value);
    return value;
  }

  strings(key: string, fallback: string[]): string[] {
    const value = this.values[key];
    if (value === undefined || value === null) return [...fallback];
    if (!Array.isArray(value)) throw this.typeError(key, 'an array of strings', value);
    return value.map((item, i) => {
      if (typeof item !== 'string') throw this.typeError(`${key}[${i}]`, 'a string', item);
      return item;
    });
  }

  private keyPath(key: string): string {
    return `${this.path}.${key}`;
  }

  private typeError(key: string, expected: string, value: unknown): ConfigError {
    return new ConfigError(`Expected ${expected}, got ${JSON.stringify(value)}`, this.keyPath(key));
  }
}
