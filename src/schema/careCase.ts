import { z } from "zod";
import { systemIdentitySchema } from "./signal.js";

export const CARE_CASE_SCHEMA_VERSION = "0.1";

export const policyGateValues = ["green", "yellow", "red"] as const;
export const recommendedActionValues = ["propose_patch", "human_review", "rollback"] as const;
export const constraintValues = [
  "reversibility-first",
  "minimal-intervention",
  "explainability",
  "human-seniority",
  "canary-required",
  "no-secrets",
] as const;
export const reversibilityValues = ["reversible", "irreversible"] as const;
export const careCaseStatusValues = ["open"] as const;

export const policyGateSchema = z.enum(policyGateValues);
export const recommendedActionSchema = z.enum(recommendedActionValues);

export const proposedTransitionSchema = z.object({
  intent: z.string().min(1),
  scope: z.string().min(1),
  reversibility: z.enum(reversibilityValues),
  verification: z.array(z.string().min(1)),
  trace_ref: z.string().min(1),
});

export const signalRefSchema = z.object({
  signal_id: z.string().min(1),
});

export const careCaseSchema = z.object({
  schema_version: z.literal(CARE_CASE_SCHEMA_VERSION),
  id: z.string().uuid(),
  created_at: z.string().datetime(),
  system: systemIdentitySchema,
  policy_gate: policyGateSchema,
  recommended_action: recommendedActionSchema,
  tension: z.number().min(0).max(1),
  summary: z.string().min(1),
  constraints: z.array(z.enum(constraintValues)),
  signals: z.array(signalRefSchema).min(1),
  status: z.enum(careCaseStatusValues),
  root_cause_hypothesis: z.string().min(1).optional(),
  proposed_transition: proposedTransitionSchema.optional(),
});

export type PolicyGate = (typeof policyGateValues)[number];
export type RecommendedAction = (typeof recommendedActionValues)[number];
export type Constraint = (typeof constraintValues)[number];
export type ProposedTransition = z.infer<typeof proposedTransitionSchema>;
export type SignalRef = z.infer<typeof signalRefSchema>;
export type CareCase = z.infer<typeof careCaseSchema>;
