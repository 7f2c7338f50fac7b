/**
 * In-memory implementations (no storage backend required)
 *
 * Suitable for testing and for tools that build throwaway trees.
 */

// Adapter
export { MemoryAdapter } from './adapter/memory/memory_adapter';
export type { MemoryAdapterOptions, MemoryOperation } from './adapter/memory/memory_adapter';
