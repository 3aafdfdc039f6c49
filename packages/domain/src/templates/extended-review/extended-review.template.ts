/**
 * Extended Review Workflow
 *
 * Draft → Peer Review → Editorial Review → Approved → Published → Archived.
 * For research papers and curriculum that need peer and expert sign-off
 * before a publisher releases them.
 *
 * The peer-review count and publication checklist conditions are carried
 * as data for the reviewing tools; the engine reports them as unenforced.
 */

import { defineTemplate } from "@curriflow/contracts";

export const ExtendedReviewTemplate = defineTemplate({
  id: "extended_review",
  name: "Extended Review Workflow",
  description:
    "A multi-stage workflow for complex educational content: peer review, editorial and subject-expert review, then managed publication and archiving. Designed for academic papers, research content, and high-stakes curriculum.",
  category: "educational",
  version: "1.0.0",

  states: [
    {
      id: "draft",
      title: "Draft",
      description: "The author is writing. Submitting sends the content to peer review.",
      stateType: "draft",
      isInitial: true,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view", "edit", "submit"] },
        { role: "administrator", actions: ["view", "edit", "delete", "manage_workflow"] },
      ],
      uiMetadata: { color: "#94a3b8", icon: "edit", shortLabel: "In development" },
    },
    {
      id: "peer_review",
      title: "Peer Review",
      description: "Peers check technical accuracy. Several reviewers may comment at once.",
      stateType: "review",
      isInitial: false,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "peer_reviewer", actions: ["view", "review", "approve", "reject"] },
        {
          role: "administrator",
          actions: ["view", "edit", "review", "approve", "reject", "manage_workflow"],
        },
      ],
      uiMetadata: { color: "#f59e0b", icon: "users", shortLabel: "Peer review" },
    },
    {
      id: "editorial_review",
      title: "Editorial Review",
      description: "Editors and subject experts check quality and editorial standards.",
      stateType: "review",
      isInitial: false,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "subject_expert", actions: ["view", "review", "approve", "reject"] },
        { role: "editor", actions: ["view", "edit", "review", "approve", "reject"] },
        {
          role: "administrator",
          actions: ["view", "edit", "review", "approve", "reject", "manage_workflow"],
        },
      ],
      uiMetadata: { color: "#d97706", icon: "check-circle", shortLabel: "Editorial review" },
    },
    {
      id: "approved",
      title: "Approved",
      description: "Passed every review stage and waiting for the publisher.",
      stateType: "approved",
      isInitial: false,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "publisher", actions: ["view", "publish"] },
        {
          role: "administrator",
          actions: ["view", "edit", "publish", "retract", "manage_workflow"],
        },
      ],
      uiMetadata: { color: "#059669", icon: "check-badge", shortLabel: "Ready to publish" },
    },
    {
      id: "published",
      title: "Published",
      description: "Live and publicly available. Changes need a new version.",
      stateType: "published",
      isInitial: false,
      isFinal: false,
      permissions: [
        { role: "author", actions: ["view"] },
        { role: "publisher", actions: ["view", "retract"] },
        { role: "administrator", actions: ["view", "edit", "retract", "manage_workflow"] },
      ],
      uiMetadata: { color: "#10b981", icon: "globe", shortLabel: "Live" },
    },
    {
      id: "archived",
      title: "Archived",
      description: "No longer active; kept read-only for reference.",
      stateType: "archived",
      isInitial: false,
      isFinal: true,
      permissions: [{ role: "administrator", actions: ["view", "manage_workflow"] }],
      uiMetadata: { color: "#6b7280", icon: "archive", shortLabel: "Archived" },
    },
  ],

  transitions: [
    {
      id: "submit_for_peer_review",
      title: "Submit for Peer Review",
      fromState: "draft",
      toState: "peer_review",
      requiredRole: "author",
      conditions: { minContentLength: 500 },
    },
    {
      id: "peer_review_to_editorial",
      title: "Forward to Editorial Review",
      fromState: "peer_review",
      toState: "editorial_review",
      requiredRole: "peer_reviewer",
      conditions: { requireComments: true, minPeerReviews: 2 },
    },
    {
      id: "peer_review_reject",
      title: "Reject - Return to Draft",
      fromState: "peer_review",
      toState: "draft",
      requiredRole: "peer_reviewer",
      conditions: { requireComments: true },
    },
    {
      id: "editorial_approve",
      title: "Editorial Approval",
      fromState: "editorial_review",
      toState: "approved",
      requiredRole: "editor",
      conditions: { requireComments: true },
    },
    {
      id: "editorial_reject",
      title: "Editorial Rejection",
      fromState: "editorial_review",
      toState: "draft",
      requiredRole: "editor",
      conditions: { requireComments: true },
    },
    {
      id: "publish_content",
      title: "Publish Content",
      fromState: "approved",
      toState: "published",
      requiredRole: "publisher",
      conditions: { requirePublicationChecklist: true },
    },
    {
      id: "archive_content",
      title: "Archive Content",
      fromState: "published",
      toState: "archived",
      requiredRole: "administrator",
      conditions: { requireComments: true },
    },
  ],

  defaultPermissions: {
    administrator: ["view", "edit", "delete", "manage_workflow", "assign_roles"],
    viewer: ["view"],
  },

  metadata: {
    complexity: "advanced",
    recommendedFor: ["research_papers", "academic_content", "complex_curriculum"],
    typicalDuration: "2-8 weeks",
    minParticipants: 4,
    maxParticipants: 50,
    tags: ["advanced", "research", "academic", "multi-stage"],
  },
});
