/**
 * @pairmint/access — Role-gated access and pause lifecycle.
 *
 * Reused by the ledger, the registry and the pairing engine. Each
 * component owns its own AccessController instance.
 */

export { AccessController } from "./access-controller.js";

export type {
  Role,
  Capability,
  AccessSnapshot,
  AccessErrorCode,
} from "./types.js";

export { AccessError, PERMISSIONS, ROLES } from "./types.js";
