import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { EventSubscriber } from "@curriflow/contracts";
import { eventSubscribers } from "./index.js";

function subscriber(name: string): EventSubscriber {
  const found = eventSubscribers.find((s) => s.name === name);
  if (!found) throw new Error(`No subscriber named ${name}`);
  return found;
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

const TRANSITIONED = {
  type: "workflow.transitioned",
  payload: {
    contentUid: "doc-1",
    templateId: "simple_review",
    fromState: "review",
    toState: "published",
    transitionId: "approve_content",
    userId: "u2",
    role: "editor",
    isFinal: true,
  },
};

describe("eventSubscribers", () => {
  it("logs a transition", async () => {
    await subscriber("LogWorkflowTransition").handler(TRANSITIONED);

    expect(console.log).toHaveBeenCalledWith("[subscriber] doc-1 (simple_review): review → published by u2 as editor");
  });

  it("logs completion only for final states", async () => {
    const completed = subscriber("LogWorkflowCompleted");

    await completed.handler({ ...TRANSITIONED, payload: { ...TRANSITIONED.payload, isFinal: false } });
    expect(console.log).not.toHaveBeenCalled();

    await completed.handler(TRANSITIONED);
    expect(console.log).toHaveBeenCalledWith('[subscriber] doc-1 completed its workflow in "published"');
  });

  it("notes the replaced template on a forced apply", async () => {
    await subscriber("LogTemplateApplied").handler({
      type: "workflow.template_applied",
      payload: {
        contentUid: "doc-1",
        templateId: "extended_review",
        initialState: "draft",
        appliedBy: "admin-1",
        replacedTemplateId: "simple_review",
      },
    });

    expect(console.log).toHaveBeenCalledWith(
      '[subscriber] admin-1 applied "extended_review" to doc-1 (replaced "simple_review")'
    );
  });

  it("logs notification recipients", async () => {
    await subscriber("LogNotificationDelivery").handler({
      type: "notification.requested",
      payload: { recipients: ["u1", "u3"], message: '"Approve and Publish" moved content to Published' },
    });

    expect(console.log).toHaveBeenCalledWith('[notify] u1, u3: "Approve and Publish" moved content to Published');
  });
});
