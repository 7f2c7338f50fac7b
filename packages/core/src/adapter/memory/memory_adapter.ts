/**
 * MemoryAdapter - In-memory Adapter for testing
 *
 * Keeps a directory tree in Maps and implements the full capability set,
 * links included. Used for unit testing without actual I/O.
 *
 * @module adapter/memory/memory_adapter
 */

import { Readable, Writable } from 'stream';
import {
  AlreadyExistsError,
  CyclicStructureError,
  DirectoryNotEmptyError,
  InvalidPathError,
  NotADirectoryError,
  NotAFileError,
  NotALinkError,
  NotFoundError,
  UnsupportedError,
} from '../../errors';
import { Pathname, POSIX_CONVENTIONS } from '../../pathname';
import type { PathConventions } from '../../pathname';
import { FIELD_CAPABILITIES } from '../adapter.types';
import type {
  Adapter,
  AdapterCapability,
  DirectoryEntry,
  MetadataField,
  MetadataValues,
  NodeMetadata,
  RenameCapability,
  UrlCapability,
} from '../adapter.types';

type MemoryMeta = MetadataValues & { creationTime: Date };

type MemoryFile = { type: 'file'; content: Buffer; meta: MemoryMeta };
type MemoryDirectory = { type: 'directory'; children: Map<string, MemoryEntry>; meta: MemoryMeta };
type MemoryLink = { type: 'link'; target: string; meta: MemoryMeta };
type MemoryEntry = MemoryFile | MemoryDirectory | MemoryLink;

type Located = {
  entry: MemoryEntry;
  /** Pathname with every followed link resolved */
  real: Pathname;
  /** Directory holding the entry; null for the root */
  parent: MemoryDirectory | null;
};

/**
 * Adapter calls that can be made to fail with `failOn()`.
 */
export type MemoryOperation =
  | 'stat'
  | 'readDirectory'
  | 'openRead'
  | 'openWrite'
  | 'resolveLink'
  | 'createDirectory'
  | 'createFile'
  | 'delete'
  | 'setMetadata'
  | 'rename';

/**
 * Options for MemoryAdapter
 */
export interface MemoryAdapterOptions {
  /** Adapter id (default: "memory") */
  id?: string;
  /** Path conventions (default: POSIX) */
  conventions?: PathConventions;
  /** Advertised optional traits (default: all of them) */
  capabilities?: AdapterCapability[];
  /** Size of the chunks read streams emit (default: 64 KiB) */
  chunkSize?: number;
  /** Clock used for timestamps */
  now?: () => Date;
  owner?: string | number;
  group?: string | number;
  /** Base of public URLs; without it entities have none */
  publicBaseUrl?: string;
}

const ALL_CAPABILITIES: AdapterCapability[] = ['timestamps', 'ownership', 'mode', 'rename', 'urls'];
const DEFAULT_CHUNK_SIZE = 64 * 1024;
const MAX_LINK_HOPS = 40;

/**
 * In-memory Adapter for testing.
 *
 * @example
 * ```typescript
 * const adapter = new MemoryAdapter();
 * adapter.addFile('/a/b.txt', 'hello');
 * adapter.addLink('/a/loop', '/a');
 *
 * const fs = new Filesystem(adapter);
 * await fs.getFile('/a/b.txt').readText(); // 'hello'
 *
 * // Inject a transport failure
 * adapter.failOn('openRead', '/a/b.txt');
 * ```
 */
export class MemoryAdapter implements Adapter, RenameCapability, UrlCapability {
  readonly id: string;
  readonly conventions: PathConventions;
  readonly capabilities: ReadonlySet<AdapterCapability>;

  private readonly root: MemoryDirectory;
  private readonly chunkSize: number;
  private readonly now: () => Date;
  private readonly owner: string | number;
  private readonly group: string | number;
  private readonly publicBaseUrl: string | undefined;
  private readonly faults = new Map<string, Error>();

  constructor(options: MemoryAdapterOptions = {}) {
    this.id = options.id ?? 'memory';
    this.conventions = options.conventions ?? POSIX_CONVENTIONS;
    this.capabilities = new Set(options.capabilities ?? ALL_CAPABILITIES);
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.now = options.now ?? (() => new Date());
    this.owner = options.owner ?? 'user';
    this.group = options.group ?? 'users';
    this.publicBaseUrl = options.publicBaseUrl;
    this.root = this.newDirectory();
  }

  // ============================================
  // Adapter
  // ============================================

  async stat(pathname: Pathname): Promise<NodeMetadata> {
    this.checkFault('stat', pathname);
    try {
      return this.describe(this.require(pathname, false).entry);
    } catch (error) {
      // a file in the middle of the path means nothing lives there
      if (error instanceof NotADirectoryError) {
        throw new NotFoundError(pathname.toString());
      }
      throw error;
    }
  }

  async readDirectory(pathname: Pathname): Promise<DirectoryEntry[]> {
    this.checkFault('readDirectory', pathname);
    const { entry } = this.require(pathname, true);
    if (entry.type !== 'directory') {
      throw new NotADirectoryError(pathname.toString());
    }
    return Array.from(entry.children.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, child]) => ({ name, typeHint: child.type }));
  }

  async openRead(pathname: Pathname): Promise<Readable> {
    this.checkFault('openRead', pathname);
    const { entry } = this.require(pathname, true);
    if (entry.type !== 'file') {
      throw new NotAFileError(pathname.toString());
    }
    const chunks: Buffer[] = [];
    for (let offset = 0; offset < entry.content.length; offset += this.chunkSize) {
      chunks.push(entry.content.subarray(offset, offset + this.chunkSize));
    }
    return Readable.from(chunks, { objectMode: false });
  }

  async openWrite(pathname: Pathname, append: boolean): Promise<Writable> {
    this.checkFault('openWrite', pathname);
    const found = this.locate(pathname, true);
    let file: MemoryFile;
    if (found) {
      if (found.entry.type !== 'file') {
        throw new NotAFileError(pathname.toString());
      }
      file = found.entry;
    } else {
      file = this.newFile(Buffer.alloc(0));
      this.insert(pathname, file);
    }
    if (!append) {
      file.content = Buffer.alloc(0);
    }
    file.meta.modifyTime = this.now();

    return new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        file.content = Buffer.concat([file.content, chunk]);
        file.meta.modifyTime = this.now();
        callback();
      },
    });
  }

  async resolveLink(pathname: Pathname): Promise<Pathname> {
    this.checkFault('resolveLink', pathname);
    const { entry, real } = this.require(pathname, false);
    if (entry.type !== 'link') {
      throw new NotALinkError(pathname.toString());
    }
    return real.resolveTarget(entry.target);
  }

  async createDirectory(pathname: Pathname, parents: boolean): Promise<void> {
    this.checkFault('createDirectory', pathname);
    if (this.locate(pathname, false)) {
      throw new AlreadyExistsError(pathname.toString());
    }
    if (parents) {
      this.ensureDirectory(pathname);
      return;
    }
    this.insert(pathname, this.newDirectory());
  }

  async createFile(pathname: Pathname, parents: boolean): Promise<void> {
    this.checkFault('createFile', pathname);
    if (this.locate(pathname, false)) {
      throw new AlreadyExistsError(pathname.toString());
    }
    const parent = pathname.parent();
    if (parents && parent) {
      this.ensureDirectory(parent);
    }
    this.insert(pathname, this.newFile(Buffer.alloc(0)));
  }

  async delete(pathname: Pathname, recursive: boolean, force: boolean): Promise<void> {
    this.checkFault('delete', pathname);
    const found = this.locate(pathname, false);
    if (!found) {
      if (force) return;
      throw new NotFoundError(pathname.toString());
    }
    if (!found.parent) {
      throw new InvalidPathError(pathname.toString(), 'the root cannot be deleted');
    }
    if (found.entry.type === 'directory' && found.entry.children.size > 0 && !recursive) {
      throw new DirectoryNotEmptyError(pathname.toString());
    }
    found.parent.children.delete(pathname.basename());
  }

  async setMetadata<F extends MetadataField>(pathname: Pathname, field: F, value: MetadataValues[F]): Promise<void> {
    this.checkFault('setMetadata', pathname);
    const capability = FIELD_CAPABILITIES[field];
    if (!this.capabilities.has(capability)) {
      throw new UnsupportedError(pathname.toString(), capability, this.id);
    }
    const { entry } = this.require(pathname, true);
    Object.assign(entry.meta, { [field]: value });
  }

  // ============================================
  // Optional traits
  // ============================================

  async rename(from: Pathname, to: Pathname): Promise<void> {
    this.checkFault('rename', from);
    if (!this.capabilities.has('rename')) {
      throw new UnsupportedError(from.toString(), 'rename', this.id);
    }
    const source = this.require(from, false);
    if (!source.parent) {
      throw new InvalidPathError(from.toString(), 'the root cannot be moved');
    }
    if (this.locate(to, false)) {
      throw new AlreadyExistsError(to.toString());
    }
    if (from.contains(to)) {
      throw new InvalidPathError(to.toString(), `is inside ${from.toString()}`);
    }
    this.insert(to, source.entry);
    source.parent.children.delete(from.basename());
  }

  realUrl(pathname: Pathname): string {
    return `memory://${this.id}${pathname.toString()}`;
  }

  publicUrl(pathname: Pathname): string | null {
    if (this.publicBaseUrl === undefined) return null;
    return `${this.publicBaseUrl.replace(/\/+$/, '')}${pathname.toString()}`;
  }

  // ============================================
  // Testing utilities
  // ============================================

  /** Adds a file, creating missing parent directories. */
  addFile(path: string, content: string | Buffer = ''): this {
    const pathname = this.parse(path);
    const parent = pathname.parent();
    if (parent) this.ensureDirectory(parent);
    const found = this.locate(pathname, false);
    if (found && found.entry.type === 'file') {
      found.entry.content = Buffer.from(content);
      return this;
    }
    this.insert(pathname, this.newFile(Buffer.from(content)));
    return this;
  }

  /** Adds a directory and its missing parents. */
  addDirectory(path: string): this {
    this.ensureDirectory(this.parse(path));
    return this;
  }

  /** Adds a link holding `target` verbatim (relative targets allowed). */
  addLink(path: string, target: string): this {
    const pathname = this.parse(path);
    const parent = pathname.parent();
    if (parent) this.ensureDirectory(parent);
    this.insert(pathname, { type: 'link', target, meta: this.newMeta(0o777) });
    return this;
  }

  /** Makes the next calls of `operation` on `path` throw `error`. */
  failOn(operation: MemoryOperation, path: string, error: Error = new Error(`injected ${operation} failure`)): void {
    this.faults.set(this.faultKey(operation, this.parse(path)), error);
  }

  clearFaults(): void {
    this.faults.clear();
  }

  /** Whether anything (links included) exists at `path`. */
  has(path: string): boolean {
    return this.locate(this.parse(path), false) !== null;
  }

  /** UTF-8 content of the file at `path`, or null when there is none. */
  contentOf(path: string): string | null {
    const found = this.locate(this.parse(path), true);
    return found && found.entry.type === 'file' ? found.entry.content.toString('utf8') : null;
  }

  // ============================================
  // Internals
  // ============================================

  private parse(path: string): Pathname {
    return Pathname.normalize(path, this.conventions);
  }

  private faultKey(operation: MemoryOperation, pathname: Pathname): string {
    return `${operation} ${pathname.toString()}`;
  }

  private checkFault(operation: MemoryOperation, pathname: Pathname): void {
    const fault = this.faults.get(this.faultKey(operation, pathname));
    if (fault) throw fault;
  }

  private newMeta(mode: number): MemoryMeta {
    const now = this.now();
    return {
      accessTime: now,
      modifyTime: now,
      creationTime: now,
      owner: this.owner,
      group: this.group,
      mode,
    };
  }

  private newFile(content: Buffer): MemoryFile {
    return { type: 'file', content, meta: this.newMeta(0o644) };
  }

  private newDirectory(): MemoryDirectory {
    return { type: 'directory', children: new Map(), meta: this.newMeta(0o755) };
  }

  private describe(entry: MemoryEntry): NodeMetadata {
    const metadata: NodeMetadata = {
      type: entry.type,
      size: entry.type === 'file' ? entry.content.length : entry.type === 'link' ? Buffer.byteLength(entry.target) : 0,
    };
    if (this.capabilities.has('timestamps')) {
      metadata.accessTime = entry.meta.accessTime;
      metadata.modifyTime = entry.meta.modifyTime;
      metadata.creationTime = entry.meta.creationTime;
    }
    if (this.capabilities.has('ownership')) {
      metadata.owner = entry.meta.owner;
      metadata.group = entry.meta.group;
    }
    if (this.capabilities.has('mode')) {
      metadata.mode = entry.meta.mode;
    }
    return metadata;
  }

  /**
   * Walks the tree segment by segment. Links in intermediate segments are
   * always followed; the final one only with `followFinal`.
   */
  private locate(pathname: Pathname, followFinal: boolean, hops: number = 0): Located | null {
    let current: MemoryEntry = this.root;
    let real = Pathname.normalize(pathname.root, pathname.conventions);
    let parent: MemoryDirectory | null = null;

    const names = pathname.segments;
    for (const [index, name] of names.entries()) {
      if (current.type !== 'directory') {
        throw new NotADirectoryError(real.toString());
      }
      let next: MemoryEntry | undefined = current.children.get(name);
      if (!next) return null;

      let nextReal = real.join(name);
      parent = current;

      const isLast = index === names.length - 1;
      if (next.type === 'link' && (!isLast || followFinal)) {
        if (hops >= MAX_LINK_HOPS) {
          throw new CyclicStructureError(nextReal.toString(), next.target);
        }
        const resolved = this.locate(nextReal.resolveTarget(next.target), true, hops + 1);
        if (!resolved) return null;
        next = resolved.entry;
        nextReal = resolved.real;
        parent = resolved.parent;
      }

      current = next;
      real = nextReal;
    }

    return { entry: current, real, parent };
  }

  private require(pathname: Pathname, followFinal: boolean): Located {
    const found = this.locate(pathname, followFinal);
    if (!found) {
      throw new NotFoundError(pathname.toString());
    }
    return found;
  }

  private insert(pathname: Pathname, entry: MemoryEntry): void {
    const parent = pathname.parent();
    if (!parent) {
      throw new AlreadyExistsError(pathname.toString());
    }
    const { entry: container } = this.require(parent, true);
    if (container.type !== 'directory') {
      throw new NotADirectoryError(parent.toString());
    }
    const name = pathname.basename();
    if (container.children.has(name)) {
      throw new AlreadyExistsError(pathname.toString());
    }
    container.children.set(name, entry);
    container.meta.modifyTime = this.now();
  }

  private ensureDirectory(pathname: Pathname): MemoryDirectory {
    const found = this.locate(pathname, true);
    if (found) {
      if (found.entry.type !== 'directory') {
        throw new NotADirectoryError(pathname.toString());
      }
      return found.entry;
    }
    const parent = pathname.parent();
    const container = parent ? this.ensureDirectory(parent) : this.root;
    const directory = this.newDirectory();
    container.children.set(pathname.basename(), directory);
    return directory;
  }
}
