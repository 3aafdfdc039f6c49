import { describe, it, expect } from "vitest";
import { validateTemplate } from "./validator.js";
import { SIMPLE_REVIEW } from "../engine/test-fixtures.js";

/** The fixture with some top-level fields replaced */
function variant(patch: Record<string, unknown>): Record<string, unknown> {
  return { ...SIMPLE_REVIEW, ...patch };
}

const [DRAFT, REVIEW, PUBLISHED] = SIMPLE_REVIEW.states;

describe("validateTemplate — valid input", () => {
  it("accepts a well-formed template with no warnings", () => {
    const result = validateTemplate(SIMPLE_REVIEW);

    expect(result.isValid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.template?.id).toBe("simple_review");
  });

  it("applies defaults for omitted optional fields", () => {
    const { description, category, version, metadata, defaultPermissions, ...rest } = SIMPLE_REVIEW;

    const result = validateTemplate(rest);

    expect(result.isValid).toBe(true);
    expect(result.template?.description).toBe("");
    expect(result.template?.category).toBe("educational");
    expect(result.template?.version).toBe("1.0.0");
    expect(result.template?.metadata).toEqual({});
    expect(result.template?.defaultPermissions).toEqual({});
  });
});

describe("validateTemplate — shape", () => {
  it("rejects non-object input", () => {
    const result = validateTemplate(null);

    expect(result.isValid).toBe(false);
    expect(result.errors[0].rule).toBe("schema");
  });

  it("rejects a short name", () => {
    const result = validateTemplate(variant({ name: "ab" }));

    expect(result.errors).toContainEqual({
      rule: "schema",
      message: "Workflow name must be at least 3 characters",
      path: "name",
    });
  });

  it("rejects a version that is not x.y.z", () => {
    const result = validateTemplate(variant({ version: "1.0" }));

    expect(result.errors).toContainEqual({
      rule: "schema",
      message: "Version must follow semantic versioning (x.y.z)",
      path: "version",
    });
  });

  it("accepts a template id in any case or punctuation", () => {
    const result = validateTemplate(variant({ id: "SimpleReview.v2" }));

    expect(result.isValid).toBe(true);
    expect(result.template?.id).toBe("SimpleReview.v2");
  });

  it("rejects a one-character template id", () => {
    const result = validateTemplate(variant({ id: "s" }));

    expect(result.errors).toContainEqual({
      rule: "schema",
      message: "Template ID must be at least 2 characters",
      path: "id",
    });
  });

  it("matches mixed-case state references after lowercasing them", () => {
    const result = validateTemplate(
      variant({
        states: [{ ...DRAFT, id: "Draft" }, REVIEW, PUBLISHED],
        transitions: SIMPLE_REVIEW.transitions.map((t) =>
          t.fromState === "draft" ? { ...t, fromState: "DRAFT" } : t
        ),
      })
    );

    expect(result.isValid).toBe(true);
    expect(result.template?.states[0].id).toBe("draft");
    expect(result.template?.transitions[0].fromState).toBe("draft");
  });

  it("reports enum violations under their own rule", () => {
    const result = validateTemplate(
      variant({ states: [{ ...DRAFT, stateType: "limbo" }, REVIEW, PUBLISHED] })
    );

    expect(result.isValid).toBe(false);
    expect(result.errors.map((e) => [e.rule, e.path])).toEqual([["enum_membership", "states.0.stateType"]]);
  });

  it("rejects an unknown role on a transition", () => {
    const [submit, ...others] = SIMPLE_REVIEW.transitions;
    const result = validateTemplate(
      variant({ transitions: [{ ...submit, requiredRole: "janitor" }, ...others] })
    );

    expect(result.errors.map((e) => [e.rule, e.path])).toEqual([
      ["enum_membership", "transitions.0.requiredRole"],
    ]);
  });

  it("rejects a template with a single state", () => {
    const result = validateTemplate(variant({ states: [DRAFT] }));

    expect(result.errors).toContainEqual({
      rule: "schema",
      message: "A workflow needs at least 2 states",
      path: "states",
    });
  });
});

describe("validateTemplate — graph", () => {
  it("rejects duplicate state ids", () => {
    const result = validateTemplate(variant({ states: [...SIMPLE_REVIEW.states, REVIEW] }));

    expect(result.errors).toContainEqual({
      rule: "duplicate_state_id",
      message: 'Duplicate state ID "review"',
      path: "states.3.id",
    });
  });

  it("rejects duplicate transition ids", () => {
    const result = validateTemplate(
      variant({ transitions: [...SIMPLE_REVIEW.transitions, SIMPLE_REVIEW.transitions[0]] })
    );

    expect(result.errors).toEqual([
      {
        rule: "duplicate_transition_id",
        message: 'Duplicate transition ID "submit_for_review"',
        path: "transitions.3.id",
      },
    ]);
  });

  it("requires exactly one initial state", () => {
    const result = validateTemplate(
      variant({ states: [DRAFT, { ...REVIEW, isInitial: true }, PUBLISHED] })
    );

    expect(result.errors).toEqual([
      { rule: "single_initial_state", message: "Workflow must have exactly one initial state, found 2" },
    ]);
  });

  it("requires a final state", () => {
    const result = validateTemplate(
      variant({ states: [DRAFT, REVIEW, { ...PUBLISHED, isFinal: false }] })
    );

    expect(result.errors.map((e) => e.rule)).toEqual(["final_state_required"]);
  });

  it("rejects transitions to unknown states", () => {
    const result = validateTemplate(
      variant({
        transitions: [
          ...SIMPLE_REVIEW.transitions,
          { id: "escape", title: "Escape", fromState: "review", toState: "nowhere", requiredRole: "editor" },
        ],
      })
    );

    expect(result.errors).toEqual([
      {
        rule: "unknown_state_reference",
        message: 'Transition "escape" references unknown state "nowhere"',
        path: "transitions.3.toState",
      },
    ]);
  });

  it("rejects transitions out of a final state", () => {
    const result = validateTemplate(
      variant({
        transitions: [
          ...SIMPLE_REVIEW.transitions,
          { id: "unpublish", title: "Unpublish", fromState: "published", toState: "draft", requiredRole: "editor" },
        ],
      })
    );

    expect(result.errors).toEqual([
      {
        rule: "final_state_outgoing",
        message: 'Transition "unpublish" leaves final state "published"',
        path: "transitions.3.fromState",
      },
    ]);
  });

  it("rejects states unreachable from the initial state", () => {
    const orphan = { ...REVIEW, id: "orphan", title: "Orphan" };
    const result = validateTemplate(variant({ states: [...SIMPLE_REVIEW.states, orphan] }));

    expect(result.errors).toEqual([
      {
        rule: "unreachable_state",
        message: 'State "orphan" is not reachable from initial state "draft"',
      },
    ]);
  });

  it("rejects reachable states with no path to a final state", () => {
    const limbo = { ...REVIEW, id: "limbo", title: "Limbo" };
    const result = validateTemplate(
      variant({
        states: [...SIMPLE_REVIEW.states, limbo],
        transitions: [
          ...SIMPLE_REVIEW.transitions,
          { id: "park", title: "Park", fromState: "review", toState: "limbo", requiredRole: "editor" },
        ],
      })
    );

    expect(result.errors).toEqual([
      { rule: "dead_end_state", message: 'State "limbo" has no path to a final state' },
    ]);
  });

  it("reports every violation at once", () => {
    const result = validateTemplate(
      variant({
        states: [DRAFT, { ...REVIEW, isInitial: true }, { ...PUBLISHED, isFinal: false }],
      })
    );

    expect(result.errors.map((e) => e.rule)).toEqual(["single_initial_state", "final_state_required"]);
  });
});

describe("validateTemplate — warnings", () => {
  it("flags privileged actions granted to non-administrators", () => {
    const result = validateTemplate(
      variant({
        states: [
          DRAFT,
          {
            ...REVIEW,
            permissions: [
              { role: "editor", actions: ["view", "manage_workflow"] },
              { role: "administrator", actions: ["manage_workflow", "assign_roles"] },
            ],
          },
          PUBLISHED,
        ],
        defaultPermissions: { author: ["view", "assign_roles"] },
      })
    );

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      {
        rule: "privileged_action",
        message: 'Role "editor" is granted manage_workflow in state "review"',
        path: "states.1.permissions",
      },
      {
        rule: "privileged_action",
        message: 'Role "author" is granted assign_roles by default permissions',
        path: "defaultPermissions.author",
      },
    ]);
  });

  it("flags condition keys the engine does not enforce", () => {
    const [submit, approve, reject] = SIMPLE_REVIEW.transitions;
    const result = validateTemplate(
      variant({
        transitions: [submit, { ...approve, conditions: { requireComments: true, needsSignoff: true } }, reject],
      })
    );

    expect(result.warnings).toEqual([
      {
        rule: "unenforced_condition",
        message: 'Condition "needsSignoff" on transition "approve_content" is not enforced by the engine',
        path: "transitions.1.conditions.needsSignoff",
      },
    ]);
  });

  it("flags non-final states that grant nothing", () => {
    const result = validateTemplate(
      variant({ states: [{ ...DRAFT, permissions: [] }, REVIEW, { ...PUBLISHED, permissions: [] }] })
    );

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      {
        rule: "state_without_permissions",
        message: 'State "draft" grants no actions to any role',
        path: "states.0.permissions",
      },
    ]);
  });
});
