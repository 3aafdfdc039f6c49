/**
 * @curriflow/domain
 *
 * Exports the built-in workflow templates and event subscribers.
 * The API server imports this to register everything with the platform.
 */

import type { WorkflowTemplate } from "@curriflow/contracts";
import { SimpleReviewTemplate } from "./templates/simple-review/simple-review.template.js";
import { ExtendedReviewTemplate } from "./templates/extended-review/extended-review.template.js";
import { CollaborativeReviewTemplate } from "./templates/collaborative-review/collaborative-review.template.js";
export { eventSubscribers } from "./subscribers/index.js";

export { SimpleReviewTemplate, ExtendedReviewTemplate, CollaborativeReviewTemplate };

/**
 * All templates that ship with the platform.
 * Order determines listing order.
 */
export const builtInTemplates: WorkflowTemplate[] = [
  SimpleReviewTemplate,
  ExtendedReviewTemplate,
  CollaborativeReviewTemplate,
];
