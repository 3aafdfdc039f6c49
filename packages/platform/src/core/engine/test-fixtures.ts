/**
 * Shared fixtures for engine tests.
 */

import { vi } from "vitest";
import {
  defineTemplate,
  type Logger,
  type WorkflowNotification,
} from "@curriflow/contracts";
import { WorkflowEngine } from "./engine.js";
import type { WorkflowEngineOptions } from "./types.js";
import { InMemoryContentStore } from "../content/index.js";
import { InMemoryAuditSink } from "../audit/memory-sink.js";

export const FIXED_NOW = "2026-03-01T10:00:00.000Z";

/** draft → review → published, with an editor rejection loop */
export const SIMPLE_REVIEW = defineTemplate({
  id: "simple_review",
  name: "Simple Review Workflow",
  description: "Author drafts, editor approves",
  category: "educational",
  version: "1.0.0",
  states: [
    {
      id: "draft",
      title: "Draft",
      description: "Being written",
      stateType: "draft",
      isInitial: true,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view", "edit", "submit"] },
        { role: "editor", actions: ["view"] },
      ],
    },
    {
      id: "review",
      title: "In Review",
      description: "Waiting for the editor",
      stateType: "review",
      isInitial: false,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "editor", actions: ["view", "review", "approve", "reject"] },
      ],
    },
    {
      id: "published",
      title: "Published",
      description: "Live",
      stateType: "published",
      isInitial: false,
      isFinal: true,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "editor", actions: ["view"] },
      ],
    },
  ],
  transitions: [
    {
      id: "submit_for_review",
      title: "Submit for Review",
      fromState: "draft",
      toState: "review",
      requiredRole: "author",
    },
    {
      id: "approve_content",
      title: "Approve",
      fromState: "review",
      toState: "published",
      requiredRole: "editor",
      conditions: { requireComments: true },
    },
    {
      id: "reject_to_draft",
      title: "Reject",
      fromState: "review",
      toState: "draft",
      requiredRole: "editor",
    },
  ],
  defaultPermissions: {},
  metadata: { complexity: "simple" },
});

/** Submission needs a minimum body length; administrators may drive every step */
export const GUARDED_REVIEW = defineTemplate({
  id: "guarded_review",
  name: "Guarded Review Workflow",
  description: "Length-checked submission with administrator override",
  category: "educational",
  version: "1.0.0",
  states: [
    {
      id: "draft",
      title: "Draft",
      description: "",
      stateType: "draft",
      isInitial: true,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view", "edit", "submit"] },
        { role: "administrator", actions: ["view", "manage_workflow"] },
      ],
    },
    {
      id: "review",
      title: "Review",
      description: "",
      stateType: "review",
      isInitial: false,
      isFinal: false,
      permissions: [
        { role: "editor", actions: ["view", "approve"] },
        { role: "administrator", actions: ["view", "manage_workflow"] },
      ],
    },
    {
      id: "done",
      title: "Done",
      description: "",
      stateType: "published",
      isInitial: false,
      isFinal: true,
      permissions: [],
    },
  ],
  transitions: [
    {
      id: "submit",
      title: "Submit",
      fromState: "draft",
      toState: "review",
      requiredRole: "author",
      conditions: { minContentLength: 10 },
    },
    {
      id: "publish",
      title: "Publish",
      fromState: "review",
      toState: "done",
      requiredRole: "editor",
    },
  ],
  defaultPermissions: {},
  metadata: { complexity: "moderate" },
});

export function mockLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

/**
 * An engine over in-memory collaborators, a fixed clock, and
 * sequential audit ids ("audit-1", "audit-2", ...).
 */
export function createTestEngine(overrides: Partial<WorkflowEngineOptions> = {}) {
  const contentStore = new InMemoryContentStore();
  const auditSink = new InMemoryAuditSink();
  const notify = vi.fn(async (_userIds: string[], _event: WorkflowNotification) => {});
  const logger = mockLogger();
  let nextId = 0;

  const engine = new WorkflowEngine({
    contentStore,
    notifier: { notify },
    auditSink,
    logger,
    clock: () => new Date(FIXED_NOW),
    idGenerator: () => `audit-${++nextId}`,
    ...overrides,
  });

  return { engine, contentStore, auditSink, notify, logger };
}
