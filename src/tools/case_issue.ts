import { z } from "zod";
import { careCaseIssueBody, careCaseIssueTitle } from "../issue/render.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const caseIssueInputShape = {
  caseId: z.string().min(1, "Case identifier is required"),
};

const caseIssueOutputShape = {
  title: z.string(),
  body: z.string(),
};

export type CaseIssueInput = z.infer<z.ZodObject<typeof caseIssueInputShape>>;
export type CaseIssueOutput = z.infer<z.ZodObject<typeof caseIssueOutputShape>>;

export const caseIssueTool: ToolDefinition<typeof caseIssueInputShape, CaseIssueOutput> = {
  name: "case_issue",
  description: "Render the title and markdown body of a human-review issue for a care-case.",
  inputShape: caseIssueInputShape,
  outputShape: caseIssueOutputShape,
  handler: async (input: CaseIssueInput, context: ToolContext) => {
    const record = await context.services.store.get(input.caseId);
    if (!record) {
      throw new Error(`Care-case ${input.caseId} not found`);
    }

    return { title: careCaseIssueTitle(record.careCase), body: careCaseIssueBody(record.careCase) };
  },
};
