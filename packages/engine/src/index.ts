/**
 * @pairmint/engine — The pairing invariant engine.
 *
 * Mints, burns and transfers pairs: one fungible unit bound to one
 * collectible, created and destroyed together. Holds the fee escrow and
 * is the only caller permitted to move either half.
 */

export { PairingEngine } from "./pairing-engine.js";

export { applyStaged, checkpoint, checkpointMap } from "./staged-apply.js";
export type { Checkpoint } from "./staged-apply.js";

export type {
  PairRecord,
  PairView,
  PairingEngineConfig,
  PairingEngineDeps,
  InvariantViolationKind,
  InvariantViolation,
  InvariantReport,
  EngineSnapshot,
  PairingErrorCode,
} from "./types.js";

export { PairingError } from "./types.js";
