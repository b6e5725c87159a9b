import { NIL as NIL_NAMESPACE, v5 as uuidv5 } from "uuid";
import { IdentityError } from "../errors.js";
import {
  CARE_CASE_SCHEMA_VERSION,
  careCaseSchema,
  type CareCase,
  type Constraint,
  type PolicyGate,
  type ProposedTransition,
  type RecommendedAction,
} from "../schema/careCase.js";
import type { Severity, Signal } from "../schema/signal.js";
import { validateDocument } from "../validation/validate.js";

export const YELLOW_THRESHOLD = 0.4;
export const RED_THRESHOLD = 0.75;

const BASE_CONSTRAINTS: readonly Constraint[] = [
  "reversibility-first",
  "minimal-intervention",
  "explainability",
  "human-seniority",
];

const WEB_PERF_HYPOTHESIS = "Potentially heavier assets or blocking scripts introduced recently.";

export const PENDING_TRACE_REF = "pending";

export function gateFromTension(tension: number): PolicyGate {
  if (tension < YELLOW_THRESHOLD) {
    return "green";
  }
  if (tension < RED_THRESHOLD) {
    return "yellow";
  }
  return "red";
}

export function recommendAction(gate: PolicyGate, kind: string, severity: Severity): RecommendedAction {
  if (gate === "green") {
    return "propose_patch";
  }
  if (gate === "red" && kind === "web-perf" && severity === "fail") {
    return "rollback";
  }
  return "human_review";
}

export function deriveConstraints(kind: string, gate: PolicyGate): Constraint[] {
  const constraints = [...BASE_CONSTRAINTS];
  if (gate !== "green") {
    constraints.push("canary-required");
  }
  if (kind === "security") {
    constraints.push("no-secrets");
  }
  return constraints;
}

/**
 * Case identity is a UUIDv5 of `carecase:<signal id>` in the nil namespace.
 * Changing the prefix or the namespace orphans every existing branch and record.
 */
export function deriveCaseId(signalId: string): string {
  return uuidv5(`carecase:${signalId}`, NIL_NAMESPACE);
}

function webPerfTransition(signal: Signal): ProposedTransition {
  return {
    intent: "Reduce LCP/TTFB by optimizing critical assets and deferring non-critical scripts",
    scope: "critical rendering path (hero assets, script loading)",
    reversibility: "reversible",
    verification: ["Lighthouse LCP within budget", "No functional regressions (smoke)"],
    trace_ref: signal.trace_ref ?? PENDING_TRACE_REF,
  };
}

export interface SynthesizeOptions {
  now?: () => Date;
}

export function synthesizeCareCase(signal: Signal, options: SynthesizeOptions = {}): CareCase {
  const now = options.now ?? (() => new Date());
  const gate = gateFromTension(signal.tension);
  const action = recommendAction(gate, signal.kind, signal.severity);

  const careCase: CareCase = {
    schema_version: CARE_CASE_SCHEMA_VERSION,
    id: deriveCaseId(signal.id),
    created_at: now().toISOString(),
    system: { ...signal.system },
    policy_gate: gate,
    recommended_action: action,
    tension: signal.tension,
    summary: signal.summary,
    constraints: deriveConstraints(signal.kind, gate),
    signals: [{ signal_id: signal.id }],
    status: "open",
  };

  // A conservative starting point for reviewers, not a diagnosis.
  if (signal.kind === "web-perf" && (action === "propose_patch" || action === "human_review")) {
    careCase.root_cause_hypothesis = WEB_PERF_HYPOTHESIS;
    careCase.proposed_transition = webPerfTransition(signal);
  }

  const outcome = validateDocument(careCase, careCaseSchema);
  if (!outcome.ok) {
    throw new IdentityError(careCase.id, outcome.violations);
  }

  return outcome.value;
}
