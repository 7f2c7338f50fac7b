/**
 * Filesystem - owner of one adapter and sole producer of its nodes
 *
 * @module filesystem
 */

import { FilesystemClosedError } from '../errors';
import type { Adapter } from '../adapter';
import { DEFAULT_FILESYSTEM_CONFIG } from '../config';
import type { FilesystemConfig } from '../config';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { FileNode } from '../node';
import { Pathname } from '../pathname';
import type { PathConventions } from '../pathname';

/**
 * Options for Filesystem
 */
export interface FilesystemOptions {
  /** Basename prefix marking hidden entries (default: ".") */
  hiddenPrefix?: string;
  /** Longest link chain followed before reporting a cycle (default: 40) */
  maxLinkDepth?: number;
  logger?: Logger;
}

/**
 * A tree of nodes backed by one adapter.
 *
 * Nodes are handles: they hold a pathname and ask the adapter on every call.
 * Once the filesystem is destroyed, every node operation fails with
 * FilesystemClosedError.
 *
 * @example
 * ```typescript
 * const fs = new Filesystem(new MemoryAdapter());
 * const readme = fs.getFile('/docs/README.md');
 * await readme.write('# Docs', { parents: true });
 * await fs.getFile('/docs').ls('*.md');
 * ```
 */
export class Filesystem {
  readonly hiddenPrefix: string;
  readonly maxLinkDepth: number;
  readonly logger: Logger;
  readonly conventions: PathConventions;
  readonly id: string;

  private adapter: Adapter | null;

  constructor(adapter: Adapter, options: FilesystemOptions = {}) {
    this.adapter = adapter;
    this.id = adapter.id;
    this.conventions = adapter.conventions;
    this.hiddenPrefix = options.hiddenPrefix ?? DEFAULT_FILESYSTEM_CONFIG.hiddenPrefix;
    this.maxLinkDepth = options.maxLinkDepth ?? DEFAULT_FILESYSTEM_CONFIG.maxLinkDepth;
    this.logger = options.logger ?? createLogger(`[treefs:${adapter.id}] `);
    this.logger.debug(`Filesystem created on adapter ${adapter.id}`);
  }

  get destroyed(): boolean {
    return this.adapter === null;
  }

  /**
   * The adapter, for node operations on `pathname`.
   * @throws FilesystemClosedError after destroy()
   */
  getAdapter(pathname: Pathname): Adapter {
    if (!this.adapter) {
      throw new FilesystemClosedError(pathname.toString());
    }
    return this.adapter;
  }

  /**
   * Node for a raw path (in the adapter's conventions) or a pathname.
   * @throws InvalidPathError for malformed raw paths
   */
  getFile(path: string | Pathname): FileNode {
    const pathname = typeof path === 'string' ? Pathname.normalize(path, this.conventions) : path;
    return new FileNode(this, pathname);
  }

  getRoot(): FileNode {
    return new FileNode(this, Pathname.root(this.conventions));
  }

  destroy(): void {
    if (this.adapter) {
      this.logger.debug(`Filesystem on adapter ${this.id} destroyed`);
    }
    this.adapter = null;
  }
}

/**
 * Builds a filesystem from a loaded configuration.
 */
export function createFilesystem(adapter: Adapter, config: Partial<FilesystemConfig> = {}): Filesystem {
  return new Filesystem(adapter, {
    hiddenPrefix: config.hiddenPrefix,
    maxLinkDepth: config.maxLinkDepth,
    logger: createLogger(`[treefs:${adapter.id}] `, config.logLevel),
  });
}
