/**
 * Domain Event Subscribers
 *
 * Reactive logic that responds to events published by the workflow engine
 * and the notifier. Subscribers run AFTER the operation commits; a failing
 * subscriber never breaks the operation that emitted the event.
 *
 *   Operation commits → Event published → Subscriber reacts
 *
 * In a production deployment these would dispatch email, update search
 * indexes, or trigger downstream automations. Here they log.
 */

import type { EventSubscriber } from "@curriflow/contracts";

/**
 * Logs every state change.
 *
 * Listens for: "workflow.transitioned"
 */
const onWorkflowTransitioned: EventSubscriber = {
  eventType: "workflow.transitioned",
  name: "LogWorkflowTransition",
  async handler(event) {
    const { contentUid, templateId, fromState, toState, userId, role } = event.payload;
    console.log(
      `[subscriber] ${String(contentUid)} (${String(templateId)}): ${String(fromState)} → ${String(toState)} by ${String(userId)} as ${String(role)}`
    );
  },
};

/**
 * Logs content reaching a final state.
 *
 * Listens for: "workflow.transitioned"
 * Filters within the subscriber: only final states are of interest.
 */
const onWorkflowCompleted: EventSubscriber = {
  eventType: "workflow.transitioned",
  name: "LogWorkflowCompleted",
  async handler(event) {
    if (event.payload.isFinal !== true) return;

    console.log(
      `[subscriber] ${String(event.payload.contentUid)} completed its workflow in "${String(event.payload.toState)}"`
    );
  },
};

/**
 * Logs template applications, noting when an existing workflow was replaced.
 *
 * Listens for: "workflow.template_applied"
 */
const onTemplateApplied: EventSubscriber = {
  eventType: "workflow.template_applied",
  name: "LogTemplateApplied",
  async handler(event) {
    const { contentUid, templateId, appliedBy, replacedTemplateId } = event.payload;
    console.log(
      `[subscriber] ${String(appliedBy)} applied "${String(templateId)}" to ${String(contentUid)}` +
        (typeof replacedTemplateId === "string" ? ` (replaced "${replacedTemplateId}")` : "")
    );
  },
};

/**
 * Stand-in delivery channel for workflow notifications.
 *
 * Listens for: "notification.requested"
 */
const deliverNotificationsToLog: EventSubscriber = {
  eventType: "notification.requested",
  name: "LogNotificationDelivery",
  async handler(event) {
    const recipients = Array.isArray(event.payload.recipients) ? event.payload.recipients : [];
    console.log(
      `[notify] ${recipients.map(String).join(", ")}: ${String(event.payload.message)}`
    );
  },
};

/**
 * All domain event subscribers.
 * Registered with the platform's EventBus during bootstrap.
 */
export const eventSubscribers: EventSubscriber[] = [
  onWorkflowTransitioned,
  onWorkflowCompleted,
  onTemplateApplied,
  deliverNotificationsToLog,
];
