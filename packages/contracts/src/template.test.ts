/**
 * Template Definition — Test Suite
 *
 * Validates that defineTemplate is an identity helper and that the zod
 * schema enforces SHAPE: id format, name length, enum membership, semver,
 * and minimum counts. Graph rules live in the platform validator.
 */

import { describe, it, expect } from "vitest";
import { defineTemplate, workflowTemplateSchema, type WorkflowTemplate } from "./template.js";
import { isRole, ROLES, ACTIONS } from "./permission.js";

const MINIMAL: WorkflowTemplate = {
  id: "two_step",
  name: "Two Step",
  description: "",
  category: "corporate",
  version: "1.0.0",
  states: [
    {
      id: "open",
      title: "Open",
      description: "",
      stateType: "draft",
      isInitial: true,
      isFinal: false,
      permissions: [{ role: "author", actions: ["view", "submit"] }],
    },
    {
      id: "closed",
      title: "Closed",
      description: "",
      stateType: "archived",
      isInitial: false,
      isFinal: true,
      permissions: [],
    },
  ],
  transitions: [
    { id: "close", title: "Close", fromState: "open", toState: "closed", requiredRole: "author" },
  ],
  defaultPermissions: {},
  metadata: {},
};

function issuePaths(input: unknown): string[] {
  const result = workflowTemplateSchema.safeParse(input);
  return result.success ? [] : result.error.issues.map((i) => i.path.join("."));
}

describe("defineTemplate", () => {
  it("returns the same object passed in", () => {
    expect(defineTemplate(MINIMAL)).toBe(MINIMAL);
  });
});

describe("workflowTemplateSchema", () => {
  it("accepts a minimal template", () => {
    expect(workflowTemplateSchema.safeParse(MINIMAL).success).toBe(true);
  });

  it("fills defaults for omitted optional fields", () => {
    const parsed = workflowTemplateSchema.parse({
      id: "two_step",
      name: "Two Step",
      states: [
        { id: "open", title: "Open", stateType: "draft", isInitial: true },
        { id: "closed", title: "Closed", stateType: "archived", isFinal: true },
      ],
      transitions: MINIMAL.transitions,
    });

    expect(parsed.category).toBe("educational");
    expect(parsed.version).toBe("1.0.0");
    expect(parsed.description).toBe("");
    expect(parsed.defaultPermissions).toEqual({});
    expect(parsed.states[1]).toMatchObject({ permissions: [], isInitial: false, description: "" });
  });

  it("accepts any template id of two or more characters", () => {
    expect(issuePaths({ ...MINIMAL, id: "Two Step" })).toEqual([]);
    expect(issuePaths({ ...MINIMAL, id: "t" })).toEqual(["id"]);
  });

  it("lowercases state ids and the transition endpoints that name them", () => {
    const parsed = workflowTemplateSchema.parse({
      ...MINIMAL,
      states: [{ ...MINIMAL.states[0], id: "Open" }, { ...MINIMAL.states[1], id: "CLOSED" }],
      transitions: [{ ...MINIMAL.transitions[0], fromState: "Open", toState: "Closed" }],
    });

    expect(parsed.states.map((s) => s.id)).toEqual(["open", "closed"]);
    expect(parsed.transitions[0]).toMatchObject({ fromState: "open", toState: "closed" });
  });

  it("rejects a state id with spaces", () => {
    const states = [{ ...MINIMAL.states[0], id: "in review" }, MINIMAL.states[1]];
    expect(issuePaths({ ...MINIMAL, states })).toEqual(["states.0.id"]);
  });

  it("rejects a one-character state id", () => {
    const states = [{ ...MINIMAL.states[0], id: "o" }, MINIMAL.states[1]];
    expect(issuePaths({ ...MINIMAL, states })).toEqual(["states.0.id"]);
  });

  it("trims the name before checking its length", () => {
    expect(issuePaths({ ...MINIMAL, name: "  ab  " })).toEqual(["name"]);
  });

  it("requires semantic versions", () => {
    expect(issuePaths({ ...MINIMAL, version: "1.0" })).toEqual(["version"]);
  });

  it("rejects roles and actions outside the vocabulary", () => {
    const states = [
      { ...MINIMAL.states[0], permissions: [{ role: "janitor", actions: ["fly"] }] },
      MINIMAL.states[1],
    ];

    expect(issuePaths({ ...MINIMAL, states })).toEqual([
      "states.0.permissions.0.role",
      "states.0.permissions.0.actions.0",
    ]);
  });

  it("needs two states and one transition", () => {
    expect(issuePaths({ ...MINIMAL, states: [MINIMAL.states[0]], transitions: [] })).toEqual([
      "states",
      "transitions",
    ]);
  });

  it("keeps unknown condition keys and rejects a negative length", () => {
    const transitions = [{ ...MINIMAL.transitions[0], conditions: { minPeerReviews: 2 } }];
    const parsed = workflowTemplateSchema.parse({ ...MINIMAL, transitions });
    expect(parsed.transitions[0].conditions).toEqual({ minPeerReviews: 2 });

    const negative = [{ ...MINIMAL.transitions[0], conditions: { minContentLength: -1 } }];
    expect(issuePaths({ ...MINIMAL, transitions: negative })).toEqual([
      "transitions.0.conditions.minContentLength",
    ]);
  });
});

describe("vocabularies", () => {
  it("lists seven roles and eleven actions", () => {
    expect(ROLES).toHaveLength(7);
    expect(ACTIONS).toHaveLength(11);
  });

  it("narrows strings to roles", () => {
    expect(isRole("editor")).toBe(true);
    expect(isRole("Editor")).toBe(false);
    expect(isRole(3)).toBe(false);
  });
});
