/**
 * Collaborator Contracts
 *
 * The engine depends on these systems but does not implement them.
 * Adapters outside the engine provide the concrete implementations
 * (a CMS client, a mail or chat notifier, an audit database).
 *
 * Every call is a suspension point: the engine wraps each one in a
 * bounded timeout and treats a rejection as a collaborator failure.
 */

/** Opaque snapshot of the content system's own workflow state */
export type NativeWorkflowSnapshot = Record<string, unknown>;

/**
 * The content management system holding the actual content bodies.
 */
export interface ContentStore {
  /** Length of the content body, used by `minContentLength` conditions */
  getContentLength(contentUid: string): Promise<number>;

  /** The CMS's native workflow state, captured before a template replaces it */
  getNativeWorkflowState(contentUid: string): Promise<NativeWorkflowSnapshot>;

  /** Restores a previously captured native workflow state */
  setNativeWorkflowState(
    contentUid: string,
    snapshot: NativeWorkflowSnapshot
  ): Promise<void>;
}

/** What happened, delivered to the users who should hear about it */
export interface WorkflowNotification {
  /** Convention: "workflow.<verb_past_tense>" */
  type: string;
  contentUid: string;
  templateId: string;
  message: string;
  data: Record<string, unknown>;
}

/**
 * Best-effort delivery of workflow notifications.
 * A failure here never reverts the operation that triggered it.
 */
export interface Notifier {
  notify(userIds: string[], event: WorkflowNotification): Promise<void>;
}
