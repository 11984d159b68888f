/**
 * Path parameter parsing shared by the routes.
 */

import type { TokenId } from "@pairmint/types";

/**
 * Parse a decimal token identifier. Undefined for anything else.
 */
export function parseTokenId(raw: string): TokenId | undefined {
  if (!/^\d+$/.test(raw)) {
    return undefined;
  }
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : undefined;
}
