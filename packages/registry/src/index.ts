/**
 * @pairmint/registry — Ownership of unique collectibles and their metadata pointers.
 */

export { CollectibleRegistry } from "./collectible-registry.js";
export type { CollectibleRegistryConfig } from "./collectible-registry.js";

export {
  checkMetadataPointer,
  validateMetadataPointer,
  METADATA_POINTER_PREFIXES,
  MAX_METADATA_POINTER_LENGTH,
} from "./metadata-pointer.js";
export type { MetadataPointerCheck } from "./metadata-pointer.js";

export type {
  CollectibleRecord,
  RegistrySnapshot,
  PairRegistry,
  RegistryErrorCode,
} from "./types.js";

export { RegistryError } from "./types.js";
