import type { CareCase } from "../schema/careCase.js";

export function careCaseIssueTitle(careCase: CareCase): string {
  return `Care-Case (${careCase.policy_gate}): ${careCase.summary}`;
}

export function careCaseIssueBody(careCase: CareCase): string {
  const { system } = careCase;
  const lines: string[] = [
    `**System:** \`${system.name}\`  \n**Env:** \`${system.env ?? "unknown"}\`  \n**Version:** \`${system.version ?? "unknown"}\``,
    "",
    `**Policy gate:** \`${careCase.policy_gate}\``,
    `**Recommended action:** \`${careCase.recommended_action}\``,
    `**Tension:** \`${careCase.tension}\``,
    "",
  ];

  if (careCase.signals.length > 0) {
    lines.push("**Signals:**", ...careCase.signals.map((ref) => `- \`${ref.signal_id}\``), "");
  }

  if (careCase.constraints.length > 0) {
    lines.push("**Constraints:**", ...careCase.constraints.map((constraint) => `- \`${constraint}\``), "");
  }

  if (careCase.root_cause_hypothesis) {
    lines.push("**Root-cause hypothesis (not a fact):**", careCase.root_cause_hypothesis, "");
  }

  const transition = careCase.proposed_transition;
  if (transition) {
    lines.push(
      "**Proposed transition (intent):**",
      `- intent: ${transition.intent}`,
      `- scope: ${transition.scope}`,
      `- reversibility: ${transition.reversibility}`,
    );
    if (transition.verification.length > 0) {
      lines.push("- verification:", ...transition.verification.map((item) => `  - ${item}`));
    }
    lines.push("");
  }

  lines.push("```json", JSON.stringify(careCase, null, 2), "```");
  return lines.join("\n");
}
