/**
 * In-Memory Content Store
 *
 * Stand-in for the content management system during development and in
 * tests. Holds a body length and a native workflow snapshot per content UID.
 * Unknown content reports a length of 0 and a private native state.
 */

import type { ContentStore, NativeWorkflowSnapshot } from "@curriflow/contracts";

const DEFAULT_NATIVE_STATE: NativeWorkflowSnapshot = { reviewState: "private" };

export class InMemoryContentStore implements ContentStore {
  private readonly lengths = new Map<string, number>();
  private readonly nativeStates = new Map<string, NativeWorkflowSnapshot>();

  /** Stores a content body; only its length is kept */
  setContent(contentUid: string, body: string): void {
    this.lengths.set(contentUid, body.length);
  }

  setNativeState(contentUid: string, snapshot: NativeWorkflowSnapshot): void {
    this.nativeStates.set(contentUid, { ...snapshot });
  }

  async getContentLength(contentUid: string): Promise<number> {
    return this.lengths.get(contentUid) ?? 0;
  }

  async getNativeWorkflowState(contentUid: string): Promise<NativeWorkflowSnapshot> {
    return { ...(this.nativeStates.get(contentUid) ?? DEFAULT_NATIVE_STATE) };
  }

  async setNativeWorkflowState(contentUid: string, snapshot: NativeWorkflowSnapshot): Promise<void> {
    this.nativeStates.set(contentUid, { ...snapshot });
  }
}
