export { FileNode } from './node';
export type { CreateOptions, DeleteOptions, StreamMode, TransferOptions, WriteOptions } from './node.types';
