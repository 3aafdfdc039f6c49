/**
 * Simple Review Workflow
 *
 * Draft → Review → Published. For course materials, assignments, and
 * other content that needs one round of editorial approval.
 *
 * Only author and editor need assigning. Administrators act through the
 * default permissions, which grant manage_workflow in every state.
 */

import { defineTemplate } from "@curriflow/contracts";

export const SimpleReviewTemplate = defineTemplate({
  id: "simple_review",
  name: "Simple Review Workflow",
  description:
    "A three-state workflow for educational content: the author drafts, an editor approves, and the content is published. Suited to course materials and assignments that need quality control without a multi-stage review.",
  category: "educational",
  version: "1.0.0",

  states: [
    {
      id: "draft",
      title: "Draft",
      description:
        "The author is writing or editing. Submitting moves the content to review.",
      stateType: "draft",
      isInitial: true,
      isFinal: false,
      permissions: [{ role: "author", actions: ["view", "edit", "submit"] }],
      uiMetadata: { color: "#94a3b8", icon: "edit", shortLabel: "Being written" },
    },
    {
      id: "review",
      title: "Under Review",
      description:
        "An editor is reviewing. The author can follow progress but cannot edit.",
      stateType: "review",
      isInitial: false,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "editor", actions: ["view", "review", "approve", "reject"] },
      ],
      uiMetadata: { color: "#fbbf24", icon: "clock", shortLabel: "Under review" },
    },
    {
      id: "published",
      title: "Published",
      description: "Approved and publicly available.",
      stateType: "published",
      isInitial: false,
      isFinal: true,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "editor", actions: ["view"] },
      ],
      uiMetadata: { color: "#10b981", icon: "check-circle", shortLabel: "Live" },
    },
  ],

  transitions: [
    {
      id: "submit_for_review",
      title: "Submit for Review",
      fromState: "draft",
      toState: "review",
      requiredRole: "author",
    },
    {
      id: "approve_content",
      title: "Approve and Publish",
      fromState: "review",
      toState: "published",
      requiredRole: "editor",
      conditions: { requireComments: true },
    },
    {
      id: "reject_to_draft",
      title: "Reject - Return to Draft",
      fromState: "review",
      toState: "draft",
      requiredRole: "editor",
    },
  ],

  defaultPermissions: {
    administrator: [
      "view",
      "edit",
      "delete",
      "review",
      "approve",
      "reject",
      "retract",
      "manage_workflow",
      "assign_roles",
    ],
    viewer: ["view"],
  },

  metadata: {
    complexity: "simple",
    recommendedFor: ["course_materials", "assignments", "educational_resources"],
    typicalDuration: "2-5 days",
    minParticipants: 2,
    maxParticipants: 10,
    tags: ["basic", "educational", "review"],
  },
});
