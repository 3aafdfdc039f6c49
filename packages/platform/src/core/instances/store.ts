/**
 * In-Memory Instance Store
 *
 * Holds one frozen WorkflowInstance snapshot per content UID.
 * `put` copies and freezes the instance, then replaces the previous
 * snapshot in a single Map write: a concurrent reader sees either the old
 * instance or the new one, never a mix.
 *
 * Writers must hold the content's KeyedMutex section; the store itself
 * does not serialize anything.
 */

import type { InstanceStore, WorkflowInstance } from "@curriflow/contracts";
import { deepFreeze } from "../utils/deep-freeze.js";

export class InMemoryInstanceStore implements InstanceStore {
  private readonly instances = new Map<string, Readonly<WorkflowInstance>>();

  get(contentUid: string): Readonly<WorkflowInstance> | undefined {
    return this.instances.get(contentUid);
  }

  put(instance: WorkflowInstance): Readonly<WorkflowInstance> {
    const snapshot = deepFreeze(structuredClone(instance));
    this.instances.set(instance.contentUid, snapshot);
    return snapshot;
  }

  delete(contentUid: string): boolean {
    return this.instances.delete(contentUid);
  }

  list(): Readonly<WorkflowInstance>[] {
    return Array.from(this.instances.values());
  }

  get size(): number {
    return this.instances.size;
  }
}
