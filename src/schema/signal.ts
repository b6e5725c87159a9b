import { z } from "zod";

export const severityValues = ["info", "warn", "fail"] as const;

export const systemIdentitySchema = z.object({
  name: z.string().min(1, "System name is required"),
  env: z.string().optional(),
  version: z.string().optional(),
});

export const signalSchema = z.object({
  id: z.string().min(1, "Signal id is required"),
  system: systemIdentitySchema,
  kind: z.string().min(1, "Signal kind is required"),
  severity: z.enum(severityValues),
  tension: z.number().min(0).max(1),
  summary: z.string().min(1, "Summary is required"),
  trace_ref: z.string().min(1).optional(),
});

export type Severity = (typeof severityValues)[number];
export type SystemIdentity = z.infer<typeof systemIdentitySchema>;
export type Signal = z.infer<typeof signalSchema>;
