/**
 * Workflow Notifications
 *
 * The default Notifier: turns each notification into a
 * "notification.requested" domain event on the Event Bus. Delivery
 * channels (email, chat, in-app) subscribe to that event; the domain
 * package ships a subscriber that logs it.
 *
 * Usage:
 *   const notifier = new EventBusNotifier();
 *   await notifier.notify(["u1", "u2"], {
 *     type: "workflow.transitioned",
 *     contentUid: "doc-1",
 *     templateId: "simple_review",
 *     message: "Content moved to Review",
 *     data: { toState: "review" },
 *   });
 */

import type { Notifier, WorkflowNotification } from "@curriflow/contracts";
import { publish } from "../event-bus/index.js";

export const NOTIFICATION_REQUESTED = "notification.requested";

export class EventBusNotifier implements Notifier {
  async notify(userIds: string[], event: WorkflowNotification): Promise<void> {
    if (userIds.length === 0) return;

    await publish({
      type: NOTIFICATION_REQUESTED,
      payload: {
        recipients: [...userIds],
        notificationType: event.type,
        contentUid: event.contentUid,
        templateId: event.templateId,
        message: event.message,
        data: event.data,
      },
    });
  }
}
