/**
 * FileNode - the public file/directory contract
 *
 * A node is a live handle on one pathname of one filesystem. It holds no
 * state besides that pair: every query goes back to the adapter, so a node
 * stays valid (and simply reports NotFound) when the entity behind it is
 * removed or replaced out of band.
 *
 * @module node
 */

import { Readable, Writable } from 'stream';
import { finished, pipeline } from 'stream/promises';
import { FIELD_CAPABILITIES, hasCapability, supportsRename, supportsUrls } from '../adapter';
import type { Adapter, AdapterCapability, MetadataField, MetadataValues, NodeMetadata, NodeType } from '../adapter';
import { digestStream } from '../crypto';
import type { DigestAlgorithm } from '../crypto';
import {
  AlreadyExistsError,
  CyclicStructureError,
  DirectoryNotEmptyError,
  IncompleteOperationError,
  InvalidPathError,
  NotADirectoryError,
  NotAFileError,
  NotFoundError,
  UnsupportedError,
  toFilesystemError,
} from '../errors';
import type { Filesystem } from '../filesystem';
import { compileFilters, recursive } from '../filter';
import type { FilterInput } from '../filter';
import { traverse } from '../listing';
import type { TraversableNode } from '../listing';
import type { Pathname } from '../pathname';
import type { CreateOptions, DeleteOptions, StreamMode, TransferOptions, WriteOptions } from './node.types';

type ResolvedChain = { pathname: Pathname; metadata: NodeMetadata | null };

function toBuffer(content: string | Uint8Array): Buffer {
  return typeof content === 'string'
    ? Buffer.from(content, 'utf8')
    : Buffer.from(content.buffer, content.byteOffset, content.byteLength);
}

function contentStream(content: Buffer): Readable {
  return Readable.from(content.length > 0 ? [content] : [], { objectMode: false });
}

/**
 * File or directory node.
 *
 * @example
 * ```typescript
 * const fs = new Filesystem(adapter);
 * const notes = fs.getFile('/home/me/notes');
 *
 * await notes.createDirectory({ parents: true });
 * await notes.resolve('todo.md').write('- ship it');
 *
 * const markdown = await notes.ls(typeMask(TypeBits.FILE), '*.md', recursive());
 * const digest = await notes.resolve('todo.md').getSHA1();
 * ```
 */
export class FileNode implements TraversableNode<FileNode> {
  readonly filesystem: Filesystem;
  readonly pathname: Pathname;

  constructor(filesystem: Filesystem, pathname: Pathname) {
    this.filesystem = filesystem;
    this.pathname = pathname;
  }

  private get path(): string {
    return this.pathname.toString();
  }

  private get adapter(): Adapter {
    return this.filesystem.getAdapter(this.pathname);
  }

  /**
   * Runs an adapter call; anything outside the taxonomy becomes IOFailureError.
   */
  private async call<T>(operation: (adapter: Adapter) => Promise<T>, pathname: Pathname = this.pathname): Promise<T> {
    const adapter = this.filesystem.getAdapter(pathname);
    try {
      return await operation(adapter);
    } catch (error) {
      throw toFilesystemError(error, pathname.toString());
    }
  }

  private async pump(source: Readable, sink: Writable): Promise<void> {
    try {
      await pipeline(source, sink);
    } catch (error) {
      throw toFilesystemError(error, this.path);
    }
  }

  // ============================================
  // Identity
  // ============================================

  getFilesystem(): Filesystem {
    return this.filesystem;
  }

  getPathname(): string {
    return this.path;
  }

  getBasename(suffix: string = ''): string {
    return this.pathname.basename(suffix);
  }

  getExtension(): string {
    return this.pathname.extension;
  }

  getParent(): FileNode | null {
    const parent = this.pathname.parent();
    return parent ? this.filesystem.getFile(parent) : null;
  }

  /** Node at a path relative to this one */
  resolve(relative: string): FileNode {
    return this.filesystem.getFile(this.pathname.join(relative));
  }

  equals(other: FileNode): boolean {
    return this.filesystem === other.filesystem && this.pathname.equals(other.pathname);
  }

  toString(): string {
    return this.path;
  }

  // ============================================
  // Type queries
  // ============================================

  private async statAt(pathname: Pathname): Promise<NodeMetadata | null> {
    try {
      return await this.call(adapter => adapter.stat(pathname), pathname);
    } catch (error) {
      // a non-directory in the middle of the path is absence as well
      if (error instanceof NotFoundError || error instanceof NotADirectoryError) return null;
      throw error;
    }
  }

  /** Metadata of the entity itself, null when missing */
  private lstat(): Promise<NodeMetadata | null> {
    return this.statAt(this.pathname);
  }

  /**
   * Follows the link chain of the final segment.
   * @throws CyclicStructureError past maxLinkDepth hops
   */
  private async resolveChain(): Promise<ResolvedChain> {
    let pathname = this.pathname;
    for (let hops = 0; ; hops++) {
      const metadata = await this.statAt(pathname);
      if (!metadata || metadata.type !== 'link') {
        return { pathname, metadata };
      }
      if (hops >= this.filesystem.maxLinkDepth) {
        throw new CyclicStructureError(this.path, pathname.toString());
      }
      const link = pathname;
      pathname = await this.call(adapter => adapter.resolveLink(link), link);
    }
  }

  /** Metadata with links followed, null when missing or dangling */
  private async statFollow(): Promise<NodeMetadata | null> {
    return (await this.resolveChain()).metadata;
  }

  /** Like statFollow(), but a link cycle reads as "nothing there" */
  private async probe(): Promise<NodeMetadata | null> {
    try {
      return await this.statFollow();
    } catch (error) {
      if (error instanceof CyclicStructureError) return null;
      throw error;
    }
  }

  /**
   * Own type; links are reported as links.
   * @throws NotFoundError
   */
  async getType(): Promise<NodeType> {
    const metadata = await this.lstat();
    if (!metadata) {
      throw new NotFoundError(this.path);
    }
    return metadata.type;
  }

  /** True if the entity exists and is (or links to) a file */
  async isFile(): Promise<boolean> {
    return (await this.probe())?.type === 'file';
  }

  /** True if the entity exists and is (or links to) a directory */
  async isDirectory(): Promise<boolean> {
    return (await this.probe())?.type === 'directory';
  }

  async isLink(): Promise<boolean> {
    return (await this.lstat())?.type === 'link';
  }

  /** True if anything exists here, dangling links included */
  async exists(): Promise<boolean> {
    return (await this.lstat()) !== null;
  }

  /**
   * @throws NotALinkError | NotFoundError
   */
  async getLinkTarget(): Promise<Pathname> {
    return this.call(adapter => adapter.resolveLink(this.pathname));
  }

  /**
   * Pathname after following the final link chain.
   * @throws NotFoundError for missing entities and dangling links
   */
  async getRealPathname(): Promise<Pathname> {
    const { pathname, metadata } = await this.resolveChain();
    if (!metadata) {
      throw new NotFoundError(pathname.toString());
    }
    return pathname;
  }

  // ============================================
  // Metadata
  // ============================================

  private async requireMetadata(): Promise<NodeMetadata> {
    const metadata = await this.statFollow();
    if (!metadata) {
      throw new NotFoundError(this.path);
    }
    return metadata;
  }

  private async capableMetadata(capability: AdapterCapability): Promise<NodeMetadata> {
    const adapter = this.adapter;
    if (!hasCapability(adapter, capability)) {
      throw new UnsupportedError(this.path, capability, adapter.id);
    }
    return this.requireMetadata();
  }

  private present<T>(value: T | undefined, capability: AdapterCapability): T {
    if (value === undefined) {
      throw new UnsupportedError(this.path, capability, this.adapter.id);
    }
    return value;
  }

  async getSize(): Promise<number> {
    return (await this.requireMetadata()).size;
  }

  async getAccessTime(): Promise<Date> {
    return this.present((await this.capableMetadata('timestamps')).accessTime, 'timestamps');
  }

  async getModifyTime(): Promise<Date> {
    return this.present((await this.capableMetadata('timestamps')).modifyTime, 'timestamps');
  }

  async getCreationTime(): Promise<Date> {
    return this.present((await this.capableMetadata('timestamps')).creationTime, 'timestamps');
  }

  async getOwner(): Promise<string | number> {
    return this.present((await this.capableMetadata('ownership')).owner, 'ownership');
  }

  async getGroup(): Promise<string | number> {
    return this.present((await this.capableMetadata('ownership')).group, 'ownership');
  }

  async getMode(): Promise<number> {
    return this.present((await this.capableMetadata('mode')).mode, 'mode');
  }

  async isReadable(): Promise<boolean> {
    return ((await this.getMode()) & 0o400) !== 0;
  }

  async isWritable(): Promise<boolean> {
    return ((await this.getMode()) & 0o200) !== 0;
  }

  async isExecutable(): Promise<boolean> {
    return ((await this.getMode()) & 0o100) !== 0;
  }

  /**
   * Returns false instead of throwing when the adapter lacks the capability.
   */
  private async applyMetadata<F extends MetadataField>(field: F, value: MetadataValues[F]): Promise<boolean> {
    const adapter = this.adapter;
    if (!hasCapability(adapter, FIELD_CAPABILITIES[field])) {
      this.filesystem.logger.debug(`Adapter ${adapter.id} cannot set ${field} on ${this.path}`);
      return false;
    }
    try {
      await this.call(target => target.setMetadata(this.pathname, field, value));
      return true;
    } catch (error) {
      if (error instanceof UnsupportedError) return false;
      throw error;
    }
  }

  setAccessTime(time: Date): Promise<boolean> {
    return this.applyMetadata('accessTime', time);
  }

  setModifyTime(time: Date): Promise<boolean> {
    return this.applyMetadata('modifyTime', time);
  }

  setOwner(owner: string | number): Promise<boolean> {
    return this.applyMetadata('owner', owner);
  }

  setGroup(group: string | number): Promise<boolean> {
    return this.applyMetadata('group', group);
  }

  setMode(mode: number): Promise<boolean> {
    return this.applyMetadata('mode', mode);
  }

  /**
   * Creates the file when missing, then sets both timestamps.
   * Resolves false when the adapter cannot store timestamps.
   */
  async touch(modifyTime: Date = new Date(), accessTime: Date = modifyTime): Promise<boolean> {
    if (!(await this.exists())) {
      await this.createFile();
    }
    const modified = await this.applyMetadata('modifyTime', modifyTime);
    const accessed = await this.applyMetadata('accessTime', accessTime);
    return modified && accessed;
  }

  // ============================================
  // Content
  // ============================================

  /**
   * @throws NotFoundError | NotAFileError
   */
  private async requireFile(): Promise<void> {
    const metadata = await this.statFollow();
    if (!metadata) {
      throw new NotFoundError(this.path);
    }
    if (metadata.type !== 'file') {
      throw new NotAFileError(this.path);
    }
  }

  private async requireParentDirectory(): Promise<void> {
    const parent = this.getParent();
    if (!parent || (await parent.isDirectory())) return;
    throw (await parent.exists()) ? new NotADirectoryError(parent.path) : new NotFoundError(parent.path);
  }

  private async prepareParent(parents: boolean): Promise<void> {
    const parent = this.getParent();
    if (!parent || (await parent.isDirectory())) return;
    if (parents && !(await parent.exists())) {
      await parent.createDirectory({ parents: true });
      return;
    }
    await this.requireParentDirectory();
  }

  /**
   * Checks a write target: an existing entity must be a file, a missing one
   * needs its parent directory.
   */
  private async prepareWrite(parents: boolean): Promise<void> {
    const metadata = await this.statFollow();
    if (metadata) {
      if (metadata.type !== 'file') {
        throw new NotAFileError(this.path);
      }
      return;
    }
    await this.prepareParent(parents);
  }

  async read(): Promise<Buffer> {
    const chunks: Buffer[] = [];
    await this.withReadStream(source =>
      this.pump(
        source,
        new Writable({
          write(chunk: Buffer, _encoding, callback) {
            chunks.push(chunk);
            callback();
          },
        })
      )
    );
    return Buffer.concat(chunks);
  }

  async readText(encoding: BufferEncoding = 'utf8'): Promise<string> {
    return (await this.read()).toString(encoding);
  }

  /** Replaces the content, creating the file when missing */
  async write(content: string | Uint8Array, options: WriteOptions = {}): Promise<void> {
    await this.writeContent(toBuffer(content), false, options.parents ?? false);
  }

  async append(content: string | Uint8Array, options: WriteOptions = {}): Promise<void> {
    await this.writeContent(toBuffer(content), true, options.parents ?? false);
  }

  private async writeContent(content: Buffer, append: boolean, parents: boolean): Promise<void> {
    await this.prepareWrite(parents);
    const sink = await this.call(adapter => adapter.openWrite(this.pathname, append));
    await this.pump(contentStream(content), sink);
  }

  /**
   * Cuts the file to `size` bytes, or pads it with zero bytes.
   * @returns the new size
   */
  async truncate(size: number = 0): Promise<number> {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Cannot truncate ${this.path} to ${size} bytes`);
    }
    const current = await this.read();
    const next = current.length >= size
      ? current.subarray(0, size)
      : Buffer.concat([current, Buffer.alloc(size - current.length)]);
    await this.writeContent(next, false, false);
    return size;
  }

  /**
   * Opens a raw stream. The caller must end or destroy it on every path;
   * withReadStream() and withWriteStream() do that for you.
   */
  openStream(mode?: 'r'): Promise<Readable>;
  openStream(mode: 'w' | 'a'): Promise<Writable>;
  async openStream(mode: StreamMode = 'r'): Promise<Readable | Writable> {
    if (mode === 'r') {
      await this.requireFile();
      return this.call(adapter => adapter.openRead(this.pathname));
    }
    await this.prepareWrite(false);
    return this.call(adapter => adapter.openWrite(this.pathname, mode === 'a'));
  }

  /** Runs `consume` on a read stream that is destroyed afterwards */
  async withReadStream<T>(consume: (stream: Readable) => Promise<T>): Promise<T> {
    const stream = await this.openStream('r');
    try {
      return await consume(stream);
    } finally {
      stream.destroy();
    }
  }

  /**
   * Runs `produce` on a write stream, then ends it and waits until the
   * content is flushed. On failure the stream is destroyed.
   */
  async withWriteStream<T>(produce: (stream: Writable) => Promise<T>, append: boolean = false): Promise<T> {
    const stream = await this.openStream(append ? 'a' : 'w');
    let result: T;
    try {
      result = await produce(stream);
    } catch (error) {
      stream.destroy();
      throw error;
    }
    stream.end();
    try {
      await finished(stream);
    } catch (error) {
      throw toFilesystemError(error, this.path);
    }
    return result;
  }

  // ============================================
  // Hashing
  // ============================================

  private async digest(algorithm: DigestAlgorithm): Promise<Buffer> {
    const metadata = await this.statFollow();
    if (!metadata) {
      throw new NotFoundError(this.path);
    }
    if (metadata.type !== 'file') {
      throw new UnsupportedError(this.path, `${algorithm} of a ${metadata.type}`, this.adapter.id);
    }
    const stream = await this.call(adapter => adapter.openRead(this.pathname));
    try {
      return await digestStream(stream, algorithm);
    } catch (error) {
      throw toFilesystemError(error, this.path);
    }
  }

  /** MD5 of the content, hex-encoded unless `raw` */
  getMD5(raw?: false): Promise<string>;
  getMD5(raw: true): Promise<Buffer>;
  getMD5(raw: boolean): Promise<string | Buffer>;
  async getMD5(raw: boolean = false): Promise<string | Buffer> {
    const digest = await this.digest('md5');
    return raw ? digest : digest.toString('hex');
  }

  /** SHA-1 of the content, hex-encoded unless `raw` */
  getSHA1(raw?: false): Promise<string>;
  getSHA1(raw: true): Promise<Buffer>;
  getSHA1(raw: boolean): Promise<string | Buffer>;
  async getSHA1(raw: boolean = false): Promise<string | Buffer> {
    const digest = await this.digest('sha1');
    return raw ? digest : digest.toString('hex');
  }

  // ============================================
  // Structure
  // ============================================

  /**
   * @throws AlreadyExistsError | NotFoundError (missing parent without `parents`)
   */
  async createDirectory(options: CreateOptions = {}): Promise<void> {
    const parents = options.parents ?? false;
    if (await this.exists()) {
      throw new AlreadyExistsError(this.path);
    }
    if (!parents) {
      await this.requireParentDirectory();
    }
    await this.call(adapter => adapter.createDirectory(this.pathname, parents));
    this.filesystem.logger.debug(`Created directory ${this.path}`);
  }

  async createFile(options: CreateOptions = {}): Promise<void> {
    const parents = options.parents ?? false;
    if (await this.exists()) {
      throw new AlreadyExistsError(this.path);
    }
    if (!parents) {
      await this.requireParentDirectory();
    }
    await this.call(adapter => adapter.createFile(this.pathname, parents));
    this.filesystem.logger.debug(`Created file ${this.path}`);
  }

  /**
   * Deletes the entity; links are removed, never followed.
   *
   * Recursive deletion is not transactional: when it fails midway, the
   * IncompleteOperationError lists what was already removed.
   *
   * @throws NotFoundError (unless `force`) | DirectoryNotEmptyError (unless `recursive`)
   */
  async delete(options: DeleteOptions = {}): Promise<void> {
    const recursive = options.recursive ?? false;
    const force = options.force ?? false;
    if (this.pathname.isRoot) {
      throw new InvalidPathError(this.path, 'the root cannot be deleted');
    }

    const metadata = await this.lstat();
    if (!metadata) {
      if (force) return;
      throw new NotFoundError(this.path);
    }

    if (metadata.type === 'directory') {
      const children = await this.children();
      if (children.length > 0 && !recursive) {
        throw new DirectoryNotEmptyError(this.path);
      }
    }

    const completed: string[] = [];
    try {
      await this.remove(this, force, completed);
    } catch (error) {
      const failure = toFilesystemError(error, this.path);
      if (completed.length === 0) throw failure;
      throw new IncompleteOperationError('delete', completed, failure);
    }
    this.filesystem.logger.debug(`Deleted ${this.path} (${completed.length} entries)`);
  }

  private async remove(node: FileNode, force: boolean, completed: string[]): Promise<void> {
    const metadata = await node.lstat();
    if (!metadata) return;
    if (metadata.type === 'directory') {
      for (const child of await node.children()) {
        await this.remove(child, force, completed);
      }
    }
    await node.call(adapter => adapter.delete(node.pathname, false, force));
    completed.push(node.path);
  }

  /**
   * Copies to `destination`, which may live on another filesystem.
   *
   * Files overwrite an existing destination file. Directories are copied
   * recursively and merged into an existing destination directory. Links
   * are copied as what they point to; dangling ones are skipped.
   *
   * @throws IncompleteOperationError when a recursive copy fails midway
   */
  async copyTo(destination: FileNode, options: TransferOptions = {}): Promise<void> {
    const source = await this.statFollow();
    if (!source) {
      throw new NotFoundError(this.path);
    }
    if (this.equals(destination)) {
      throw new InvalidPathError(destination.path, 'source and destination are the same');
    }
    if (
      source.type === 'directory' &&
      destination.filesystem === this.filesystem &&
      this.pathname.contains(destination.pathname)
    ) {
      throw new InvalidPathError(destination.path, `cannot copy ${this.path} into itself`);
    }
    await destination.prepareParent(options.parents ?? false);

    if (source.type !== 'directory') {
      await this.copyFileTo(destination);
      this.filesystem.logger.debug(`Copied ${this.path} to ${destination.path}`);
      return;
    }

    const target = await destination.statFollow();
    if (target && target.type !== 'directory') {
      throw new AlreadyExistsError(destination.path);
    }
    const entries = await this.ls(recursive());

    const completed: string[] = [];
    try {
      if (!target) {
        await destination.createDirectory();
        completed.push(destination.path);
      }
      for (const entry of entries) {
        const counterpart = destination.resolve(entry.pathname.relativeTo(this.pathname));
        const metadata = await entry.statFollow();
        if (!metadata) {
          this.filesystem.logger.warn(`Skipping dangling link ${entry.path}`);
          continue;
        }
        if (metadata.type === 'directory') {
          if (!(await counterpart.isDirectory())) {
            await counterpart.createDirectory();
          }
        } else {
          await entry.copyFileTo(counterpart);
        }
        completed.push(counterpart.path);
      }
    } catch (error) {
      const failure = toFilesystemError(error, destination.path);
      if (completed.length === 0) throw failure;
      this.filesystem.logger.warn(`Copy of ${this.path} stopped after ${completed.length} entries`);
      throw new IncompleteOperationError('copy', completed, failure);
    }
    this.filesystem.logger.debug(`Copied ${this.path} to ${destination.path} (${completed.length} entries)`);
  }

  private async copyFileTo(destination: FileNode): Promise<void> {
    const target = await destination.statFollow();
    if (target && target.type === 'directory') {
      throw new AlreadyExistsError(destination.path);
    }
    const source = await this.openStream('r');
    let sink: Writable;
    try {
      sink = await destination.openStream('w');
    } catch (error) {
      source.destroy();
      throw error;
    }
    await destination.pump(source, sink);
  }

  /**
   * Moves to `destination`, which must not exist yet. Within one filesystem
   * the adapter's rename trait is used when advertised; otherwise the node
   * is copied and then deleted.
   *
   * @throws AlreadyExistsError | IncompleteOperationError
   */
  async moveTo(destination: FileNode, options: TransferOptions = {}): Promise<void> {
    if (!(await this.exists())) {
      throw new NotFoundError(this.path);
    }
    if (await destination.exists()) {
      throw new AlreadyExistsError(destination.path);
    }
    const sameFilesystem = destination.filesystem === this.filesystem;
    if (sameFilesystem && this.pathname.contains(destination.pathname)) {
      throw new InvalidPathError(destination.path, `cannot move ${this.path} into itself`);
    }
    await destination.prepareParent(options.parents ?? false);

    const adapter = this.adapter;
    if (sameFilesystem && supportsRename(adapter)) {
      await this.call(() => adapter.rename(this.pathname, destination.pathname));
      this.filesystem.logger.debug(`Renamed ${this.path} to ${destination.path}`);
      return;
    }

    try {
      await this.copyTo(destination);
    } catch (error) {
      if (error instanceof IncompleteOperationError) {
        throw new IncompleteOperationError('move', error.completed, error.failure);
      }
      throw error;
    }

    try {
      await this.delete({ recursive: true });
    } catch (error) {
      const failure = error instanceof IncompleteOperationError ? error.failure : toFilesystemError(error, this.path);
      const removed = error instanceof IncompleteOperationError ? error.completed : [];
      throw new IncompleteOperationError('move', [destination.path, ...removed], failure);
    }
    this.filesystem.logger.debug(`Moved ${this.path} to ${destination.path}`);
  }

  // ============================================
  // Listing
  // ============================================

  /**
   * Immediate children in adapter order, unfiltered.
   * @throws NotFoundError | NotADirectoryError
   */
  async children(): Promise<FileNode[]> {
    const entries = await this.call(adapter => adapter.readDirectory(this.pathname));
    return entries.map(entry => this.filesystem.getFile(this.pathname.join(entry.name)));
  }

  /**
   * Lists children matching every filter; see compileFilters() for how
   * filters combine. Recursive listings are depth-first and pre-order.
   *
   * @throws NotFoundError | NotADirectoryError | CyclicStructureError | InvalidFilterError
   */
  async ls(...filters: FilterInput<FileNode>[]): Promise<FileNode[]> {
    const evaluator = compileFilters(filters, { hiddenPrefix: this.filesystem.hiddenPrefix });
    const metadata = await this.statFollow();
    if (!metadata) {
      throw new NotFoundError(this.path);
    }
    if (metadata.type !== 'directory') {
      throw new NotADirectoryError(this.path);
    }
    return traverse<FileNode>(this, evaluator, this.filesystem.logger);
  }

  async count(...filters: FilterInput<FileNode>[]): Promise<number> {
    return (await this.ls(...filters)).length;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<FileNode, void, undefined> {
    yield* await this.children();
  }

  // ============================================
  // URLs
  // ============================================

  /** Backend-native URL of this node */
  getRealURL(): string {
    const adapter = this.adapter;
    if (!supportsUrls(adapter)) {
      throw new UnsupportedError(this.path, 'urls', adapter.id);
    }
    return adapter.realUrl(this.pathname);
  }

  /** Public URL of this node, or null when the backend has none for it */
  getPublicURL(): string | null {
    const adapter = this.adapter;
    if (!supportsUrls(adapter)) {
      throw new UnsupportedError(this.path, 'urls', adapter.id);
    }
    return adapter.publicUrl(this.pathname);
  }
}
