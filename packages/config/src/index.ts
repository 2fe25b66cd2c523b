// Export all configuration functionality
export {
  loadServerConfig,
  findProjectRoot,
  CONFIG_FILENAME,
  type LoadServerConfigOptions,
} from './loader';

export {
  ServerConfigSchema,
  MountConfigSchema,
  LogLevelSchema,
} from './types';

export type {
  ServerConfig,
  MountConfig,
  LogLevel,
} from './types';
