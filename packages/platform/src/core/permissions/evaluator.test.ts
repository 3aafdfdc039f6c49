import { describe, it, expect, beforeEach } from "vitest";
import {
  availableActions,
  canExecuteTransition,
  executableTransitions,
  hasAdministrativeOverride,
  templateRoles,
  transitionsFrom,
} from "./evaluator.js";
import { clearTemplateRegistry, registerTemplate, type TemplateGraph } from "../templates/registry.js";
import { GUARDED_REVIEW, SIMPLE_REVIEW } from "../engine/test-fixtures.js";

let simple: TemplateGraph;
let guarded: TemplateGraph;

beforeEach(() => {
  clearTemplateRegistry();
  simple = registerTemplate({
    ...SIMPLE_REVIEW,
    defaultPermissions: { editor: ["view", "edit"], viewer: ["view"] },
  });
  guarded = registerTemplate(GUARDED_REVIEW);
});

describe("availableActions", () => {
  it("uses the state's explicit entry for the role", () => {
    expect([...availableActions(simple, "draft", "author")]).toEqual(["view", "edit", "submit"]);
  });

  it("lets an explicit entry replace the defaults", () => {
    expect([...availableActions(simple, "draft", "editor")]).toEqual(["view"]);
  });

  it("falls back to defaultPermissions", () => {
    expect([...availableActions(simple, "review", "viewer")]).toEqual(["view"]);
  });

  it("is empty for a role with neither, and for unknown states", () => {
    expect(availableActions(simple, "draft", "publisher").size).toBe(0);
    expect(availableActions(simple, "nowhere", "author").size).toBe(0);
  });
});

describe("transitions", () => {
  it("lists transitions out of a state, none out of a final one", () => {
    expect(transitionsFrom(simple, "review").map((t) => t.id)).toEqual([
      "approve_content",
      "reject_to_draft",
    ]);
    expect(transitionsFrom(simple, "published")).toEqual([]);
  });

  it("lets manage_workflow execute any transition out of its state", () => {
    const publish = guarded.transitionsById.get("publish");
    expect(publish).toBeDefined();
    if (!publish) return;

    expect(hasAdministrativeOverride(guarded, "review", "administrator")).toBe(true);
    expect(hasAdministrativeOverride(guarded, "done", "administrator")).toBe(false);
    expect(canExecuteTransition(guarded, publish, "administrator")).toBe(true);
    expect(canExecuteTransition(guarded, publish, "editor")).toBe(true);
    expect(canExecuteTransition(guarded, publish, "author")).toBe(false);
  });

  it("filters executable transitions by role", () => {
    expect(executableTransitions(simple, "review", "editor").map((t) => t.id)).toEqual([
      "approve_content",
      "reject_to_draft",
    ]);
    expect(executableTransitions(simple, "review", "author")).toEqual([]);
    expect(executableTransitions(guarded, "draft", "administrator").map((t) => t.id)).toEqual(["submit"]);
  });
});

describe("templateRoles", () => {
  it("counts state permissions and transition roles, not defaults", () => {
    expect([...templateRoles(simple.template)].sort()).toEqual(["author", "editor"]);
    expect([...templateRoles(guarded.template)].sort()).toEqual(["administrator", "author", "editor"]);
  });
});
