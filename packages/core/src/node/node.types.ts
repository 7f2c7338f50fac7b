/**
 * Options for createFile() / createDirectory().
 */
export interface CreateOptions {
  /** Create missing ancestor directories. Default: false */
  parents?: boolean;
}

/**
 * Options for write() / append().
 */
export interface WriteOptions {
  /** Create missing ancestor directories. Default: false */
  parents?: boolean;
}

/**
 * Options for delete().
 */
export interface DeleteOptions {
  /** Remove directory contents first. Default: false */
  recursive?: boolean;
  /** A missing entity is not an error. Default: false */
  force?: boolean;
}

/**
 * Options for copyTo() / moveTo().
 */
export interface TransferOptions {
  /** Create missing ancestor directories of the destination. Default: false */
  parents?: boolean;
}

/**
 * `r` reads, `w` truncates and writes, `a` appends.
 */
export type StreamMode = 'r' | 'w' | 'a';
