/**
 * Event Types
 *
 * Append-only event architecture.
 * Every committed state change in the pairing engine is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Events are only emitted for committed operations
 * - Payloads are plain JSON (amounts as base-unit strings)
 */

/**
 * Component that emitted an event.
 */
export type EventSource = "engine" | "ledger" | "registry" | "access";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address that submitted the operation */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Operation ID shared by every event of one committed operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "pair.minted", "engine.pause-changed") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
