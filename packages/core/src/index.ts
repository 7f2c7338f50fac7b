export * as Adapter from "./adapter";
export * as Config from "./config";
export * as Crypto from "./crypto";
export * as Errors from "./errors";
export * as Filter from "./filter";
export * as Listing from "./listing";
export * as Logger from "./logger";
export * as Paths from "./pathname";

// Node contract
export { Filesystem, createFilesystem } from "./filesystem";
export type { FilesystemOptions } from "./filesystem";
export { FileNode } from "./node";
export type { CreateOptions, DeleteOptions, StreamMode, TransferOptions, WriteOptions } from "./node";
