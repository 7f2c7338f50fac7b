import type { Readable, Writable } from 'stream';
import type { Pathname } from '../pathname';
import type { PathConventions } from '../pathname';

/**
 * Node type as reported by a backend. `unknown` covers sockets, devices and
 * anything else a backend cannot classify.
 */
export type NodeType = 'file' | 'directory' | 'link' | 'unknown';

/**
 * Metadata returned by `Adapter.stat()`.
 * Optional fields are absent when the adapter lacks the matching capability.
 */
export interface NodeMetadata {
  type: NodeType;
  /** Size in bytes */
  size: number;
  accessTime?: Date;
  modifyTime?: Date;
  creationTime?: Date;
  owner?: string | number;
  group?: string | number;
  /** POSIX permission bits */
  mode?: number;
}

/**
 * One entry of a directory enumeration.
 */
export interface DirectoryEntry {
  name: string;
  /** The backend's idea of the entry type; the node re-stats on demand */
  typeHint: NodeType;
}

/**
 * Optional traits an adapter may advertise.
 */
export type AdapterCapability = 'timestamps' | 'ownership' | 'mode' | 'rename' | 'urls';

/**
 * Writable metadata fields and their value types.
 */
export interface MetadataValues {
  accessTime: Date;
  modifyTime: Date;
  owner: string | number;
  group: string | number;
  mode: number;
}

export type MetadataField = keyof MetadataValues;

/**
 * Capability each metadata field depends on.
 */
export const FIELD_CAPABILITIES: Readonly<Record<MetadataField | 'creationTime', AdapterCapability>> = {
  accessTime: 'timestamps',
  modifyTime: 'timestamps',
  creationTime: 'timestamps',
  owner: 'ownership',
  group: 'ownership',
  mode: 'mode',
};

/**
 * Core capability set every backend implements.
 *
 * Adapters report failures with the errors from `../errors`; anything else
 * they throw is treated as an I/O failure by the node layer.
 *
 * @example
 * ```typescript
 * // In-memory backend (testing)
 * import { MemoryAdapter } from '@treefs/core/memory';
 * const adapter = new MemoryAdapter();
 * adapter.addFile('/a/b.txt', 'hello');
 *
 * const fs = new Filesystem(adapter);
 * const files = await fs.getFile('/a').ls(typeMask(TypeBits.FILE));
 * ```
 */
export interface Adapter {
  /** Identifier used in logs and error messages */
  readonly id: string;

  /** Raw path conventions of this backend */
  readonly conventions: PathConventions;

  /** Optional traits this adapter implements */
  readonly capabilities: ReadonlySet<AdapterCapability>;

  /**
   * Metadata of the entity itself; a final link is not followed.
   * @throws NotFoundError when nothing exists at the pathname
   */
  stat(pathname: Pathname): Promise<NodeMetadata>;

  /**
   * Immediate children of a directory (links followed).
   * @throws NotFoundError | NotADirectoryError
   */
  readDirectory(pathname: Pathname): Promise<DirectoryEntry[]>;

  openRead(pathname: Pathname): Promise<Readable>;

  /**
   * Opens a sink, creating the file when missing. Without `append` the
   * file is truncated on open.
   */
  openWrite(pathname: Pathname, append: boolean): Promise<Writable>;

  /**
   * Target of a link, resolved to a canonical pathname.
   * @throws NotALinkError
   */
  resolveLink(pathname: Pathname): Promise<Pathname>;

  createDirectory(pathname: Pathname, parents: boolean): Promise<void>;

  createFile(pathname: Pathname, parents: boolean): Promise<void>;

  /**
   * Removes an entity; links are removed, never followed.
   * `force` turns a missing entity into a no-op.
   */
  delete(pathname: Pathname, recursive: boolean, force: boolean): Promise<void>;

  /**
   * @throws UnsupportedError when the field's capability is missing
   */
  setMetadata<F extends MetadataField>(pathname: Pathname, field: F, value: MetadataValues[F]): Promise<void>;
}

/**
 * `rename` trait: move within the same backend without copying.
 */
export interface RenameCapability {
  rename(from: Pathname, to: Pathname): Promise<void>;
}

/**
 * `urls` trait: addresses of an entity outside this library.
 */
export interface UrlCapability {
  /** Backend-native URL, e.g. `file:///real/path` */
  realUrl(pathname: Pathname): string;
  /** Publicly reachable URL, or null when the entity has none */
  publicUrl(pathname: Pathname): string | null;
}
