/**
 * Workflow Engine Module
 *
 * Holds the process-wide WorkflowEngine. Bootstrap creates it once with
 * the configured collaborators; the REST adapter reads it per request.
 */

import { WorkflowEngine } from "./engine.js";
import type { WorkflowEngineOptions } from "./types.js";

let engine: WorkflowEngine | null = null;

/**
 * Create the engine. Call this once at startup (in bootstrap),
 * after templates are registered.
 */
export function initWorkflowEngine(options: WorkflowEngineOptions): WorkflowEngine {
  engine = new WorkflowEngine(options);
  return engine;
}

/**
 * Get the active engine.
 * Throws if initWorkflowEngine() hasn't been called.
 */
export function getWorkflowEngine(): WorkflowEngine {
  if (!engine) {
    throw new Error("Workflow engine not initialized. Call initWorkflowEngine() in bootstrap.");
  }
  return engine;
}

export function isWorkflowEngineInitialized(): boolean {
  return engine !== null;
}

/** Replace the active engine (for testing) */
export function setWorkflowEngine(instance: WorkflowEngine): void {
  engine = instance;
}

/** Clears the active engine (for testing only) */
export function resetWorkflowEngine(): void {
  engine = null;
}

export { WorkflowEngine } from "./engine.js";
export * from "./errors.js";
export type * from "./types.js";
