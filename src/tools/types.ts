import type { z } from "zod";
import type { ComponentLogger } from "../logger.js";
import type { GuardianServices } from "../services.js";

export interface ToolContext {
  requestId: string;
  now: () => Date;
  logger: ComponentLogger;
  services: GuardianServices;
}

export interface ToolDefinition<InputShape extends z.ZodRawShape, Output extends Record<string, unknown>> {
  name: string;
  description: string;
  inputShape: InputShape;
  outputShape: z.ZodRawShape;
  handler: (input: z.infer<z.ZodObject<InputShape>>, context: ToolContext) => Promise<Output>;
}
