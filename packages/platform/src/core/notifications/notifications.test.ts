import { describe, it, expect, beforeEach, vi } from "vitest";
import type { DomainEvent } from "@curriflow/contracts";
import { EventBusNotifier, NOTIFICATION_REQUESTED } from "./index.js";
import { clearSubscribers, subscribe } from "../event-bus/index.js";

beforeEach(() => {
  clearSubscribers();
});

describe("EventBusNotifier", () => {
  it("publishes a notification.requested event", async () => {
    const handler = vi.fn(async (_event: DomainEvent) => {});
    subscribe({ eventType: NOTIFICATION_REQUESTED, name: "capture", handler });

    await new EventBusNotifier().notify(["editor-1"], {
      type: "workflow.transitioned",
      contentUid: "doc-1",
      templateId: "simple_review",
      message: "Content moved to Review",
      data: { toState: "review" },
    });

    expect(handler).toHaveBeenCalledOnce();
    expect(handler.mock.calls[0][0].payload).toEqual({
      recipients: ["editor-1"],
      notificationType: "workflow.transitioned",
      contentUid: "doc-1",
      templateId: "simple_review",
      message: "Content moved to Review",
      data: { toState: "review" },
    });
  });

  it("publishes nothing without recipients", async () => {
    const handler = vi.fn(async (_event: DomainEvent) => {});
    subscribe({ eventType: "*", name: "capture", handler });

    await new EventBusNotifier().notify([], {
      type: "workflow.transitioned",
      contentUid: "doc-1",
      templateId: "simple_review",
      message: "",
      data: {},
    });

    expect(handler).not.toHaveBeenCalled();
  });
});
