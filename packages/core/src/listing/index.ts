export { traverse } from './listing';
export type { TraversableNode } from './listing';
