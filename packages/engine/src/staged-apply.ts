/**
 * @pairmint/engine — Staged apply.
 *
 * Every participant touched by an operation is checkpointed before the
 * first mutation. If any step throws, every checkpoint is restored in
 * reverse order and the original error is rethrown.
 *
 * Callers validate preconditions before entering, and put calls into
 * participants that cannot be checkpointed last.
 */

import type { Checkpointable } from "@pairmint/types";

export interface Checkpoint {
  rollback(): void;
}

export function checkpoint<TSnapshot>(participant: Checkpointable<TSnapshot>): Checkpoint {
  const saved = participant.snapshot();
  return {
    rollback: () => {
      participant.restore(saved);
    },
  };
}

/**
 * Checkpoint a plain map by copying its entries.
 */
export function checkpointMap<K, V>(map: Map<K, V>): Checkpoint {
  const saved = [...map];
  return {
    rollback: () => {
      map.clear();
      for (const [key, value] of saved) {
        map.set(key, value);
      }
    },
  };
}

/**
 * Run `apply` with all checkpoints taken up front.
 */
export function applyStaged<T>(checkpoints: readonly Checkpoint[], apply: () => T): T {
  try {
    return apply();
  } catch (err) {
    for (const cp of [...checkpoints].reverse()) {
      cp.rollback();
    }
    throw err;
  }
}
