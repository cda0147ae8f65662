/**
 * Configuration & Environment Management
 *
 * Application settings from file and environment, and the server list
 * the application listens on.
 */

export { Config, type ConfigOptions, getConfig, loadConfig } from './config.ts';
export {
  DEFAULT_SERVER_CONFIG_PATH,
  defaultServerConfig,
  loadServerConfig,
  parseServerConfig,
  parseServerConfigFile,
  registerServer,
  saveServerConfig,
  type ServerConfig,
  type ServerConfigFile,
} from './server_config.ts';
