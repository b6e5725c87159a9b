import { z } from "zod";
import { intakeSignals } from "../intake/intake.js";
import { policyGateSchema, recommendedActionSchema } from "../schema/careCase.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const signalIntakeInputShape = {
  signals: z.array(z.record(z.unknown())).min(1, "At least one signal is required"),
};

const generatedCaseSchema = z.object({
  signalId: z.string(),
  caseId: z.string(),
  location: z.string(),
  policyGate: policyGateSchema,
  recommendedAction: recommendedActionSchema,
});

const signalIntakeOutputShape = {
  cases: z.array(generatedCaseSchema),
};

export type SignalIntakeInput = z.infer<z.ZodObject<typeof signalIntakeInputShape>>;
export type SignalIntakeOutput = z.infer<z.ZodObject<typeof signalIntakeOutputShape>>;

export const signalIntakeTool: ToolDefinition<typeof signalIntakeInputShape, SignalIntakeOutput> = {
  name: "signal_intake",
  description:
    "Validate signal documents and synthesize one care-case per signal. Nothing is written unless every signal is valid.",
  inputShape: signalIntakeInputShape,
  outputShape: signalIntakeOutputShape,
  handler: async (input: SignalIntakeInput, context: ToolContext) => {
    const result = await intakeSignals(
      input.signals.map((document, index) => ({ label: `signals.${index}`, document })),
      { store: context.services.store, now: context.now, logger: context.logger },
    );

    context.logger.info("Ingested signals", { count: result.cases.length });

    return { cases: result.cases };
  },
};
