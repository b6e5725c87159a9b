import { posix } from "node:path";
import type { CareCase } from "../schema/careCase.js";

export const BRANCH_PREFIX = "guardian/";
export const PATCH_EXTENSION = "md";
export const UNCHECKED_ITEM = "- [ ]";

/** Section markers the receiving-side validator looks for, byte for byte. */
export const PATCH_SECTION_MARKERS = {
  header: "# Guardian Patch Proposal",
  rootCause: "## Root cause hypothesis",
  steps: "## Suggested patch steps",
  verification: "## Verification checklist",
} as const;

const REMEDIATION_STEPS = [
  "Audit critical rendering path (hero images, fonts, blocking scripts).",
  "Defer or async non-critical scripts; ensure bundles are split appropriately.",
  "Optimize images (proper sizing, modern formats, preload hero assets).",
  "Reduce server response time (cache headers, CDN, origin optimization).",
];

const PLACEHOLDER_CHECK = `${UNCHECKED_ITEM} Add verification steps`;

export function branchForCase(caseId: string): string {
  return `${BRANCH_PREFIX}${caseId}`;
}

export function patchPathForCase(patchesDir: string, caseId: string): string {
  return posix.join(patchesDir, `${caseId}.${PATCH_EXTENSION}`);
}

function checklist(careCase: CareCase): string {
  const items = careCase.proposed_transition?.verification ?? [];
  return items.length > 0 ? items.map((item) => `${UNCHECKED_ITEM} ${item}`).join("\n") : PLACEHOLDER_CHECK;
}

function signalLines(careCase: CareCase): string {
  return careCase.signals.length > 0
    ? careCase.signals.map((ref) => `- ${ref.signal_id}`).join("\n")
    : "- (none)";
}

export function renderPatchProposal(careCase: CareCase): string {
  const steps = REMEDIATION_STEPS.map((step, index) => `${index + 1}. ${step}`).join("\n");

  return [
    `${PATCH_SECTION_MARKERS.header} (${careCase.id})`,
    "",
    PATCH_SECTION_MARKERS.rootCause,
    careCase.root_cause_hypothesis ?? "TBD",
    "",
    `${PATCH_SECTION_MARKERS.steps} (generic web perf)`,
    steps,
    "",
    "## Signals",
    signalLines(careCase),
    "",
    PATCH_SECTION_MARKERS.verification,
    checklist(careCase),
    "",
  ].join("\n");
}

export function changeRequestTitle(careCase: CareCase): string {
  return `Guardian proposed patch: ${careCase.id}`;
}

export function renderChangeRequestBody(careCase: CareCase): string {
  const transition = careCase.proposed_transition;

  return [
    `## Guardian Proposed Patch (${careCase.policy_gate})`,
    "",
    `**Care-Case:** \`${careCase.id}\``,
    `**Gate:** \`${careCase.policy_gate}\``,
    `**Action:** \`${careCase.recommended_action}\``,
    `**Tension:** \`${careCase.tension}\``,
    "",
    "### Signals",
    signalLines(careCase),
    "",
    "### Proposed transition",
    `- intent: ${transition?.intent ?? "TBD"}`,
    `- scope: ${transition?.scope ?? "TBD"}`,
    `- reversibility: ${transition?.reversibility ?? "TBD"}`,
    "",
    "### Verification checklist",
    checklist(careCase),
    "",
  ].join("\n");
}

export function renderReviewerChecklist(patchesDir: string): string {
  return [
    "Guardian PR checklist for reviewer:",
    `- Confirm patch file path: ${patchesDir}/<case_uuid>.${PATCH_EXTENSION}`,
    "- Confirm sections exist (Root cause / Steps / Verification)",
    `- Confirm verification has checkboxes (${UNCHECKED_ITEM})`,
    "- Confirm proposal stays reversible & scope-limited",
    "",
  ].join("\n");
}

export function commitMessage(caseId: string): string {
  return `Guardian propose patch for ${caseId}`;
}
