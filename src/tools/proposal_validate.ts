import { z } from "zod";
import { runProposalValidation } from "../proposal/validator.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const proposalValidateInputShape = {
  base: z.string().trim().min(1, "Base revision is required"),
  head: z.string().trim().min(1, "Head revision is required"),
  branch: z.string().trim().min(1, "Head branch is required"),
};

const proposalValidateOutputShape = {
  status: z.enum(["skipped", "passed", "failed"]),
  branch: z.string(),
  patchFiles: z.array(z.string()).optional(),
  violations: z.array(z.string()).optional(),
};

export type ProposalValidateInput = z.infer<z.ZodObject<typeof proposalValidateInputShape>>;
export type ProposalValidateOutput = z.infer<z.ZodObject<typeof proposalValidateOutputShape>>;

export const proposalValidateTool: ToolDefinition<typeof proposalValidateInputShape, ProposalValidateOutput> = {
  name: "proposal_validate",
  description:
    "Check an incoming guardian change request: branch naming, files limited to the patches directory, and proposal content.",
  inputShape: proposalValidateInputShape,
  outputShape: proposalValidateOutputShape,
  handler: async (input: ProposalValidateInput, context: ToolContext) => {
    const { backend, config } = context.services;
    return runProposalValidation(input, { backend, root: config.root, patchesDir: config.patchesDir });
  },
};
