/**
 * Event Bus
 *
 * In-process fan-out for the DomainEvents the workflow engine publishes
 * after an operation commits (transitions, template applications, removals)
 * and for the notification requests sent by EventBusNotifier.
 *
 * A subscriber listens on one event type or on "*". Handlers run together;
 * one that rejects is reported to the console and to observability, and
 * publish() still resolves.
 */

import type { DomainEvent, EventSubscriber } from "@curriflow/contracts";
import { captureException } from "../observability/index.js";

const WILDCARD = "*";

const registry = new Map<string, EventSubscriber[]>();

/** Registers a subscriber. Bootstrap calls this once per domain subscriber. */
export function subscribe(subscriber: EventSubscriber): void {
  registry.set(subscriber.eventType, [...(registry.get(subscriber.eventType) ?? []), subscriber]);
}

export function subscribeAll(subscribers: readonly EventSubscriber[]): void {
  subscribers.forEach(subscribe);
}

/** Exact-type subscribers first, in registration order, then wildcards */
function listenersFor(type: string): EventSubscriber[] {
  return [...(registry.get(type) ?? []), ...(type === WILDCARD ? [] : registry.get(WILDCARD) ?? [])];
}

function reportFailure(subscriber: EventSubscriber, event: DomainEvent, reason: unknown): void {
  console.error(`[event-bus] Subscriber "${subscriber.name}" failed for event "${event.type}":`, reason);
  if (reason instanceof Error) {
    captureException(reason, { subscriber: subscriber.name, eventType: event.type });
  }
}

/**
 * Delivers an event to every matching subscriber and waits for all of them.
 * Events published without a timestamp are stamped with the current time.
 */
export async function publish(event: DomainEvent): Promise<void> {
  const listeners = listenersFor(event.type);
  if (listeners.length === 0) return;

  const stamped: DomainEvent = { ...event, timestamp: event.timestamp ?? new Date() };
  const outcomes = await Promise.allSettled(listeners.map((listener) => listener.handler(stamped)));

  outcomes.forEach((outcome, index) => {
    const listener = listeners[index];
    if (outcome.status === "rejected" && listener) reportFailure(listener, stamped, outcome.reason);
  });
}

/** Removes every subscriber; tests call this between cases. */
export function clearSubscribers(): void {
  registry.clear();
}
