// Core interfaces - backend-agnostic
export { hasCapability, supportsRename, supportsUrls } from './adapter';
export { FIELD_CAPABILITIES } from './adapter.types';
export type {
  Adapter,
  AdapterCapability,
  DirectoryEntry,
  MetadataField,
  MetadataValues,
  NodeMetadata,
  NodeType,
  RenameCapability,
  UrlCapability,
} from './adapter.types';

// NOTE: Implementations are exported via subpaths:
// - @treefs/core/memory -> MemoryAdapter
