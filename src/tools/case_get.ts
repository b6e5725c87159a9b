import { z } from "zod";
import { careCaseSchema } from "../schema/careCase.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const caseGetInputShape = {
  caseId: z.string().min(1, "Case identifier is required"),
};

const caseGetOutputShape = {
  location: z.string(),
  case: careCaseSchema,
};

export type CaseGetInput = z.infer<z.ZodObject<typeof caseGetInputShape>>;
export type CaseGetOutput = z.infer<z.ZodObject<typeof caseGetOutputShape>>;

export const caseGetTool: ToolDefinition<typeof caseGetInputShape, CaseGetOutput> = {
  name: "case_get",
  description: "Fetch a single persisted care-case by its identifier.",
  inputShape: caseGetInputShape,
  outputShape: caseGetOutputShape,
  handler: async (input: CaseGetInput, context: ToolContext) => {
    const record = await context.services.store.get(input.caseId);
    if (!record) {
      throw new Error(`Care-case ${input.caseId} not found`);
    }

    context.logger.info("Fetched care-case", { caseId: input.caseId });

    return { location: record.location, case: record.careCase };
  },
};
