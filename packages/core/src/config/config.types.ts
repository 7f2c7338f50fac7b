import type { LogLevel } from '../logger';

/**
 * Filesystem configuration, as read from a YAML file.
 */
export interface FilesystemConfig {
  /** Basename prefix marking hidden entries */
  hiddenPrefix: string;
  /** Longest link chain followed before reporting a cycle */
  maxLinkDepth: number;
  /** Log level; unset leaves the choice to the logger factory */
  logLevel?: LogLevel;
}
