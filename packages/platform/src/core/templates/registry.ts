/**
 * Template Registry
 *
 * Central registry of all workflow templates in the process.
 * Built-in templates from the domain package and any JSON templates from
 * the configured directory register here once, at startup. The engine and
 * the REST adapter read from it.
 *
 * Each template is validated, deep-frozen, and compiled into a
 * TemplateGraph with lookup tables, so reads need no locking.
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type {
  TemplateCategory,
  TemplateSummary,
  WorkflowState,
  WorkflowTemplate,
  WorkflowTransition,
} from "@curriflow/contracts";
import { validateTemplate, type ValidationWarning } from "./validator.js";
import { StructuralValidationError } from "../engine/errors.js";
import { deepFreeze } from "../utils/deep-freeze.js";

/** A validated template with precomputed lookups */
export interface TemplateGraph {
  readonly template: WorkflowTemplate;
  readonly statesById: ReadonlyMap<string, WorkflowState>;
  readonly transitionsById: ReadonlyMap<string, WorkflowTransition>;
  /** Transitions keyed by their `fromState` */
  readonly outgoing: ReadonlyMap<string, readonly WorkflowTransition[]>;
  readonly initialStateId: string;
  readonly warnings: readonly ValidationWarning[];
}

export interface TemplateFilters {
  category?: TemplateCategory;
  /** Matches `metadata.complexity` */
  complexity?: string;
  /** Case-insensitive match on name or description */
  search?: string;
}

/** All registered templates, keyed by template ID */
const templates = new Map<string, TemplateGraph>();

function compile(template: WorkflowTemplate, warnings: ValidationWarning[]): TemplateGraph {
  const frozen = deepFreeze(template);

  const outgoing = new Map<string, WorkflowTransition[]>();
  for (const transition of frozen.transitions) {
    outgoing.set(transition.fromState, [...(outgoing.get(transition.fromState) ?? []), transition]);
  }

  const initial = frozen.states.find((s) => s.isInitial);
  if (!initial) {
    // validateTemplate guarantees exactly one initial state
    throw new StructuralValidationError(frozen.id, [
      { rule: "single_initial_state", message: "Workflow must have exactly one initial state, found 0" },
    ]);
  }

  return Object.freeze({
    template: frozen,
    statesById: new Map(frozen.states.map((s) => [s.id, s])),
    transitionsById: new Map(frozen.transitions.map((t) => [t.id, t])),
    outgoing,
    initialStateId: initial.id,
    warnings: Object.freeze([...warnings]),
  });
}

function idOf(input: unknown): string | undefined {
  if (input !== null && typeof input === "object" && "id" in input && typeof input.id === "string") {
    return input.id;
  }
  return undefined;
}

/**
 * Validates and registers a template.
 * Throws StructuralValidationError listing every violation if the template
 * is invalid, or a plain Error if a template with the same ID exists.
 */
export function registerTemplate(input: unknown): TemplateGraph {
  const result = validateTemplate(input);
  if (!result.isValid || !result.template) {
    throw new StructuralValidationError(idOf(input), result.errors);
  }

  const { id } = result.template;
  if (templates.has(id)) {
    throw new Error(`Template "${id}" is already registered. Template IDs must be unique.`);
  }

  const graph = compile(result.template, result.warnings);
  templates.set(id, graph);
  return graph;
}

/**
 * Registers multiple templates at once.
 */
export function registerTemplates(list: unknown[]): TemplateGraph[] {
  return list.map((template) => registerTemplate(template));
}

/**
 * Retrieves a compiled template by ID.
 */
export function getTemplate(id: string): TemplateGraph | undefined {
  return templates.get(id);
}

/**
 * Returns all registered templates.
 */
export function getAllTemplates(): TemplateGraph[] {
  return Array.from(templates.values());
}

export function complexityOf(template: WorkflowTemplate): string {
  const value = template.metadata.complexity;
  return typeof value === "string" ? value : "unspecified";
}

export function summarizeTemplate(template: WorkflowTemplate): TemplateSummary {
  return {
    id: template.id,
    name: template.name,
    description: template.description,
    category: template.category,
    version: template.version,
    complexity: complexityOf(template),
    statesCount: template.states.length,
    transitionsCount: template.transitions.length,
  };
}

/**
 * Lists template summaries, optionally filtered.
 * Results are ordered by template ID.
 */
export function listTemplates(filters: TemplateFilters = {}): TemplateSummary[] {
  const search = filters.search?.trim().toLowerCase();

  return getAllTemplates()
    .map((graph) => graph.template)
    .filter((t) => !filters.category || t.category === filters.category)
    .filter((t) => !filters.complexity || complexityOf(t) === filters.complexity)
    .filter(
      (t) =>
        !search ||
        t.name.toLowerCase().includes(search) ||
        t.description.toLowerCase().includes(search)
    )
    .sort((a, b) => a.id.localeCompare(b.id))
    .map(summarizeTemplate);
}

/**
 * Reads every `*.json` file in a directory and registers it as a template.
 * Files are loaded in name order. Fails on the first invalid file,
 * naming it in the error.
 */
export async function loadTemplatesFromDirectory(dir: string): Promise<TemplateGraph[]> {
  const files = (await readdir(dir))
    .filter((name) => name.endsWith(".json"))
    .sort();

  const loaded: TemplateGraph[] = [];
  for (const file of files) {
    const path = join(dir, file);
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(path, "utf-8"));
    } catch (err) {
      throw new Error(
        `Failed to read template file "${path}": ${err instanceof Error ? err.message : String(err)}`
      );
    }

    try {
      loaded.push(registerTemplate(parsed));
    } catch (err) {
      throw new Error(
        `Invalid template file "${path}": ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
  return loaded;
}

/**
 * Clears all registered templates. Used for testing.
 */
export function clearTemplateRegistry(): void {
  templates.clear();
}
