/**
 * @pairmint/registry — Metadata pointer validation.
 *
 * A pointer is an external web or content-addressed location describing a
 * collectible. Accepted schemes: http://, https://, ipfs://, each followed
 * by at least one character.
 */

import { RegistryError } from "./types.js";

export const METADATA_POINTER_PREFIXES = ["http://", "https://", "ipfs://"] as const;

export const MAX_METADATA_POINTER_LENGTH = 2048;

export type MetadataPointerCheck =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string };

/**
 * Check a pointer without throwing.
 */
export function checkMetadataPointer(pointer: unknown): MetadataPointerCheck {
  if (typeof pointer !== "string" || pointer.length === 0) {
    return { valid: false, reason: "metadata pointer must be a non-empty string" };
  }
  if (pointer.length > MAX_METADATA_POINTER_LENGTH) {
    return {
      valid: false,
      reason: `metadata pointer exceeds ${String(MAX_METADATA_POINTER_LENGTH)} characters`,
    };
  }
  if (/\s/.test(pointer)) {
    return { valid: false, reason: "metadata pointer must not contain whitespace" };
  }

  const prefix = METADATA_POINTER_PREFIXES.find((p) => pointer.startsWith(p));
  if (prefix === undefined) {
    return {
      valid: false,
      reason: `metadata pointer must start with ${METADATA_POINTER_PREFIXES.join(", ")}`,
    };
  }
  if (pointer.length < prefix.length + 1) {
    return {
      valid: false,
      reason: `metadata pointer must be at least ${String(prefix.length + 1)} characters for ${prefix}`,
    };
  }
  return { valid: true };
}

/**
 * Throw INVALID_METADATA_POINTER unless the pointer passes checkMetadataPointer().
 */
export function validateMetadataPointer(pointer: unknown): asserts pointer is string {
  const result = checkMetadataPointer(pointer);
  if (!result.valid) {
    throw new RegistryError("INVALID_METADATA_POINTER", result.reason);
  }
}
