/**
 * Caller, Logger, and Domain Events
 *
 * Cross-cutting types shared by the engine, its adapters, and the
 * domain's event subscribers.
 */

import type { CallerType, Role } from "./permission.js";

/**
 * Identifies who is invoking an operation.
 * Supplied by the identity provider; the engine never authenticates.
 */
export interface Caller {
  /** Unique user identifier */
  userId: string;

  /** Workflow roles this caller may act under */
  roles: Role[];

  /** What kind of caller this is */
  type: CallerType;
}

/**
 * Structured logger.
 * Platform code uses this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * A domain event published after a workflow operation commits.
 */
export interface DomainEvent {
  /** Event name. Convention: "workflow.verb_past_tense" (e.g., "workflow.transitioned") */
  type: string;

  /** The data associated with this event */
  payload: Record<string, unknown>;

  /** When the event occurred */
  timestamp?: Date;
}

/**
 * An event subscriber — a function that reacts to domain events.
 *
 * @example
 * const onTransition: EventSubscriber = {
 *   eventType: "workflow.transitioned",
 *   name: "LogTransition",
 *   handler: async (event) => {
 *     console.log("Moved to", event.payload.toState);
 *   },
 * };
 */
export interface EventSubscriber {
  /** The event type to listen for. Exact match, or "*" for all events. */
  eventType: string;

  /** Human-readable name for logging and debugging */
  name: string;

  handler: (event: DomainEvent) => Promise<void>;
}
