export { Filesystem, createFilesystem } from './filesystem';
export type { FilesystemOptions } from './filesystem';
