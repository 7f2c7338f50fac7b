export { Pathname, normalize, join, parent, basename, segments } from './pathname';
export { POSIX_CONVENTIONS, WINDOWS_CONVENTIONS, URL_CONVENTIONS } from './pathname.types';
export type { PathConventions } from './pathname.types';
