import { z } from "zod";
import type { StoredCareCase } from "../data/caseStore.js";
import { isEligibleForProposal } from "../proposal/controller.js";
import { policyGateSchema, recommendedActionSchema, type PolicyGate } from "../schema/careCase.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const caseSummarySchema = z.object({
  id: z.string(),
  location: z.string(),
  policyGate: policyGateSchema,
  recommendedAction: recommendedActionSchema,
  tension: z.number(),
  summary: z.string(),
  createdAt: z.string(),
  eligibleForProposal: z.boolean(),
});

const caseListInputShape = {
  gate: policyGateSchema.optional(),
  pageSize: z.number().int().min(1).max(50).optional(),
  cursor: z.string().optional(),
};

const caseListOutputShape = {
  cases: z.array(caseSummarySchema),
  nextCursor: z.string().optional(),
  total: z.number().int().nonnegative(),
};

export type CaseListInput = z.infer<z.ZodObject<typeof caseListInputShape>>;
export type CaseListOutput = z.infer<z.ZodObject<typeof caseListOutputShape>>;
export type CaseSummary = z.infer<typeof caseSummarySchema>;

const DEFAULT_PAGE_SIZE = 20;

interface CursorPayload {
  offset: number;
  signature: string;
}

function encodeCursor(payload: CursorPayload): string {
  return Buffer.from(JSON.stringify(payload), "utf8").toString("base64url");
}

const cursorPayloadSchema = z.object({
  offset: z.number().int().nonnegative(),
  signature: z.string(),
});

function decodeCursor(cursor: string): CursorPayload | null {
  try {
    const json = Buffer.from(cursor, "base64url").toString("utf8");
    const parsed = cursorPayloadSchema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : null;
  } catch {
    // malformed cursor restarts from the first page
    return null;
  }
}

function filterSignature(gate: PolicyGate | undefined): string {
  return JSON.stringify({ gate: gate ?? null });
}

export function summarizeCase(record: StoredCareCase): CaseSummary {
  const { careCase } = record;
  return {
    id: careCase.id,
    location: record.location,
    policyGate: careCase.policy_gate,
    recommendedAction: careCase.recommended_action,
    tension: careCase.tension,
    summary: careCase.summary,
    createdAt: careCase.created_at,
    eligibleForProposal: isEligibleForProposal(careCase),
  };
}

export const caseListTool: ToolDefinition<typeof caseListInputShape, CaseListOutput> = {
  name: "case_list",
  description: "List persisted care-cases in storage order, optionally filtered by policy gate, with cursor pagination.",
  inputShape: caseListInputShape,
  outputShape: caseListOutputShape,
  handler: async (input: CaseListInput, context: ToolContext) => {
    const records = await context.services.store.list();
    const filtered = input.gate ? records.filter((record) => record.careCase.policy_gate === input.gate) : records;

    const pageSize = input.pageSize ?? DEFAULT_PAGE_SIZE;
    const signature = filterSignature(input.gate);
    let offset = 0;
    if (input.cursor) {
      const payload = decodeCursor(input.cursor);
      if (payload && payload.signature === signature) {
        offset = payload.offset;
      }
    }

    const page = filtered.slice(offset, offset + pageSize).map(summarizeCase);
    const nextOffset = offset + pageSize;
    const nextCursor = nextOffset < filtered.length ? encodeCursor({ offset: nextOffset, signature }) : undefined;

    context.logger.info("Listed care-cases", { count: page.length, total: filtered.length });

    return { cases: page, nextCursor, total: filtered.length };
  },
};
