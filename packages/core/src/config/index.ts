export {
  applyEnvironment,
  DEFAULT_FILESYSTEM_CONFIG,
  FILESYSTEM_CONFIG_SCHEMA,
  loadFilesystemConfig,
  parseFilesystemConfig,
  validateFilesystemConfig,
} from './config';
export { FilesystemConfigError } from './config.errors';
export type { FilesystemConfig } from './config.types';
