/**
 * Adapter capability helpers
 *
 * Nodes never call an optional trait without checking that the adapter both
 * advertises it and actually carries the method.
 *
 * @module adapter
 */

import type { Adapter, AdapterCapability, RenameCapability, UrlCapability } from './adapter.types';

export function hasCapability(adapter: Adapter, capability: AdapterCapability): boolean {
  return adapter.capabilities.has(capability);
}

export function supportsRename(adapter: Adapter): adapter is Adapter & RenameCapability {
  return hasCapability(adapter, 'rename') && 'rename' in adapter && typeof adapter.rename === 'function';
}

export function supportsUrls(adapter: Adapter): adapter is Adapter & UrlCapability {
  return (
    hasCapability(adapter, 'urls') &&
    'realUrl' in adapter && typeof adapter.realUrl === 'function' &&
    'publicUrl' in adapter && typeof adapter.publicUrl === 'function'
  );
}
