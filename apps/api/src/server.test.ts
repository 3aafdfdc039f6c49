/**
 * API Server — Integration Tests
 *
 * Boots the real bootstrap (built-in templates, domain subscribers,
 * in-memory audit sink, development auth) and drives a full review cycle
 * through Fastify's inject(). No database, no network.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import {
  InMemoryContentStore,
  clearSubscribers,
  clearTemplateRegistry,
  resetAuthProvider,
  resetObservability,
  resetWorkflowEngine,
  type WorkflowEngine,
} from "@curriflow/platform";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

const ADMIN = { authorization: "Bearer admin-1:administrator" };
const AUTHOR = { authorization: "Bearer u1:author" };
const EDITOR = { authorization: "Bearer u2:editor" };

const observability = {
  name: "mock",
  captureException: vi.fn(),
  captureMessage: vi.fn(),
  flush: vi.fn(async () => {}),
};

let app: FastifyInstance;
let engine: WorkflowEngine;
let contentStore: InMemoryContentStore;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  contentStore = new InMemoryContentStore();

  const booted = await bootstrap({ env: {}, observability, contentStore });
  engine = booted.engine;
  app = await buildServer(booted.config);
  await app.ready();
});

afterEach(async () => {
  await app.close();
  await engine.drain();
  vi.restoreAllMocks();
  clearTemplateRegistry();
  clearSubscribers();
  resetWorkflowEngine();
  resetAuthProvider();
  resetObservability();
});

describe("bootstrap", () => {
  it("registers the built-in templates", async () => {
    const res = await app.inject({ method: "GET", url: "/api/health" });

    expect(res.json()).toEqual({ status: "ok", templates: 3, engine: "ready" });
  });

  it("lists built-ins for an authenticated caller", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/workflows/templates?category=research",
      headers: AUTHOR,
    });

    expect(res.json().data.map((t: { id: string }) => t.id)).toEqual(["collaborative_review"]);
  });

  it("sends security headers", async () => {
    const res = await app.inject({ method: "GET", url: "/api/health" });

    expect(res.headers["x-content-type-options"]).toBe("nosniff");
  });
});

describe("simple review over HTTP", () => {
  it("runs draft → review → published and records the audit trail", async () => {
        const applied = await app.inject({
      method: "POST",
      url: "/api/workflows/apply/simple_review",
      headers: ADMIN,
      payload: {
        contentUid: "doc-1",
        roleAssignments: { author: ["u1"], editor: ["u2"] },
      },
    });
    expect(applied.statusCode).toBe(201);

    const submitted = await app.inject({
      method: "POST",
      url: "/api/workflows/transition",
      headers: AUTHOR,
      payload: { contentUid: "doc-1", transitionId: "submit_for_review", role: "author" },
    });
    expect(submitted.json().data.currentState).toBe("review");

    const approved = await app.inject({
      method: "POST",
      url: "/api/workflows/transition",
      headers: EDITOR,
      payload: {
        contentUid: "doc-1",
        transitionId: "approve_content",
        role: "editor",
        comments: "Looks good",
      },
    });
    expect(approved.json().data).toMatchObject({ currentState: "published", isFinal: true });

    await engine.drain();
    expect(console.log).toHaveBeenCalledWith('[notify] u1: "Approve and Publish" moved content to Published');

    const audit = await app.inject({ method: "GET", url: "/api/workflows/audit/summary", headers: ADMIN });
    expect(audit.json().data).toMatchObject({ totalOperations: 3, successfulOperations: 3 });
  });

  it("refuses to submit content shorter than the template requires", async () => {
    contentStore.setContent("doc-2", "too short");
    await app.inject({
      method: "POST",
      url: "/api/workflows/apply/collaborative_review",
      headers: ADMIN,
      payload: {
        contentUid: "doc-2",
        roleAssignments: { author: ["u1"], peer_reviewer: ["u3"], subject_expert: ["u4"] },
      },
    });

    const res = await app.inject({
      method: "POST",
      url: "/api/workflows/transition",
      headers: AUTHOR,
      payload: { contentUid: "doc-2", transitionId: "submit_for_peer_review", role: "author" },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json().errorType).toBe("condition_not_met");
  });
});
