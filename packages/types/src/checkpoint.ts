/**
 * Checkpoint Types
 *
 * Components whose full state can be captured and put back. The pairing
 * engine checkpoints every participant before applying an operation and
 * restores them all if any step throws.
 */

export interface Checkpointable<TSnapshot> {
  /** Capture the full state as plain, JSON-safe data. */
  snapshot(): TSnapshot;

  /** Replace the full state with a previously captured snapshot. */
  restore(snapshot: TSnapshot): void;
}

export function isCheckpointable(value: unknown): value is Checkpointable<unknown> {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.snapshot === "function" && typeof v.restore === "function";
}
