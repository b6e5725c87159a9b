import { z } from "zod";
import { createProposalController } from "../services.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const proposalStatusValues = [
  "ineligible",
  "existing_change_request",
  "existing_branch",
  "no_changes",
  "created",
  "failed",
] as const;

const annotationSchema = z.object({
  status: z.enum(["applied", "failed", "skipped"]),
  errors: z.array(z.string()).optional(),
  reason: z.string().optional(),
});

const outcomeSchema = z.object({
  caseId: z.string(),
  location: z.string(),
  status: z.enum(proposalStatusValues),
  branch: z.string().optional(),
  patchPath: z.string().optional(),
  url: z.string().optional(),
  reason: z.string().optional(),
  error: z.string().optional(),
  annotation: annotationSchema.optional(),
});

const proposalRunInputShape = {};

const proposalRunOutputShape = {
  baseBranch: z.string().optional(),
  outcomes: z.array(outcomeSchema),
  createdAny: z.boolean(),
  failures: z.number().int().nonnegative(),
  aborted: z.string().optional(),
};

export type ProposalRunInput = z.infer<z.ZodObject<typeof proposalRunInputShape>>;
export type ProposalRunOutput = z.infer<z.ZodObject<typeof proposalRunOutputShape>>;

export const proposalRunTool: ToolDefinition<typeof proposalRunInputShape, ProposalRunOutput> = {
  name: "proposal_run",
  description:
    "Open at most one guardian change request per eligible (green, reversible) care-case; existing branches or requests are left untouched.",
  inputShape: proposalRunInputShape,
  outputShape: proposalRunOutputShape,
  handler: async (_input: ProposalRunInput, context: ToolContext) => {
    const report = await createProposalController(context.services).run();

    context.logger.info("Proposal run finished", {
      createdAny: report.createdAny,
      failures: report.failures,
      aborted: report.aborted,
      cases: report.outcomes.length,
    });

    return report;
  },
};
