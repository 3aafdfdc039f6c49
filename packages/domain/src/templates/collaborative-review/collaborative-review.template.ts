/**
 * Collaborative Review Workflow
 *
 * Peer review with revision rounds, then a subject expert's approval.
 * Reviewers send work back to a revision state instead of the draft, so
 * the author keeps the review thread while revising.
 *
 * Administrators are not assigned; they hold manage_workflow through the
 * default permissions.
 */

import { defineTemplate } from "@curriflow/contracts";

export const CollaborativeReviewTemplate = defineTemplate({
  id: "collaborative_review",
  name: "Collaborative Review Workflow",
  description:
    "An iterative research workflow: peers review and request revisions as often as needed, then a subject expert gives the final approval.",
  category: "research",
  version: "1.0.0",

  states: [
    {
      id: "draft",
      title: "Draft",
      description: "The author prepares the first version.",
      stateType: "draft",
      isInitial: true,
      isFinal: false,
      permissions: [{ role: "author", actions: ["view", "edit", "submit"] }],
    },
    {
      id: "peer_review",
      title: "Peer Review",
      description: "Peers review the current version.",
      stateType: "review",
      isInitial: false,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "peer_reviewer", actions: ["view", "review", "approve", "reject"] },
      ],
    },
    {
      id: "revision",
      title: "Revision",
      description: "The author addresses reviewer comments.",
      stateType: "revision",
      isInitial: false,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view", "edit", "submit"] },
        { role: "peer_reviewer", actions: ["view"] },
      ],
    },
    {
      id: "expert_review",
      title: "Expert Review",
      description: "A subject expert makes the final call.",
      stateType: "review",
      isInitial: false,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "subject_expert", actions: ["view", "review", "approve", "reject"] },
      ],
    },
    {
      id: "approved",
      title: "Approved",
      description: "Accepted by the subject expert.",
      stateType: "approved",
      isInitial: false,
      isFinal: true,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "subject_expert", actions: ["view"] },
      ],
    },
  ],

  transitions: [
    {
      id: "submit_for_peer_review",
      title: "Submit for Peer Review",
      fromState: "draft",
      toState: "peer_review",
      requiredRole: "author",
      conditions: { minContentLength: 200 },
    },
    {
      id: "request_revision",
      title: "Request Revision",
      fromState: "peer_review",
      toState: "revision",
      requiredRole: "peer_reviewer",
      conditions: { requireComments: true },
    },
    {
      id: "resubmit",
      title: "Resubmit",
      fromState: "revision",
      toState: "peer_review",
      requiredRole: "author",
      conditions: { requireComments: true },
    },
    {
      id: "forward_to_expert",
      title: "Forward to Expert",
      fromState: "peer_review",
      toState: "expert_review",
      requiredRole: "peer_reviewer",
    },
    {
      id: "expert_request_revision",
      title: "Expert Requests Revision",
      fromState: "expert_review",
      toState: "revision",
      requiredRole: "subject_expert",
      conditions: { requireComments: true },
    },
    {
      id: "expert_approve",
      title: "Approve",
      fromState: "expert_review",
      toState: "approved",
      requiredRole: "subject_expert",
      conditions: { requireComments: true },
    },
  ],

  defaultPermissions: {
    administrator: ["view", "manage_workflow", "assign_roles"],
    viewer: ["view"],
  },

  metadata: {
    complexity: "moderate",
    recommendedFor: ["research_papers", "grant_proposals"],
    typicalDuration: "1-4 weeks",
    tags: ["research", "iterative", "peer-review"],
  },
});
