import { randomUUID } from "node:crypto";
import { createRequire } from "node:module";
import { loadConfig } from "./config.js";
import {
  connectToTransport,
  createMcpServer,
  createTransport,
  registerTool,
  type ServerRequestExtra,
  type TransportStreams,
} from "./framework/mcpServerKit.js";
import { componentLogger, log } from "./logger.js";
import { createServices, type GuardianServices } from "./services.js";
import { caseGetTool } from "./tools/case_get.js";
import { caseIssueTool } from "./tools/case_issue.js";
import { caseListTool } from "./tools/case_list.js";
import { proposalRunTool } from "./tools/proposal_run.js";
import { proposalValidateTool } from "./tools/proposal_validate.js";
import { signalIntakeTool } from "./tools/signal_intake.js";
import type { ToolContext } from "./tools/types.js";

// Keep server version in sync with package.json
const require = createRequire(import.meta.url);
const { version: pkgVersion } = require("../package.json") as { version: string };
export const SERVER_VERSION = pkgVersion;

const INSTRUCTIONS =
  "Submit observations with signal_intake to open care-cases. Only green, reversible cases are ever " +
  "proposed as change requests (proposal_run); everything else waits for human review.";

export interface BuildServerOptions {
  streams?: TransportStreams;
  services?: GuardianServices;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const services = options.services ?? createServices(loadConfig());

  log({
    level: "info",
    component: "server",
    message: "Building guardian MCP server",
    meta: {
      version: SERVER_VERSION,
      root: services.config.root,
      generatedDir: services.config.generatedDir,
      patchesDir: services.config.patchesDir,
    },
  });

  const server = createMcpServer({
    name: "guardian-mcp",
    version: SERVER_VERSION,
    instructions: INSTRUCTIONS,
  });

  const createContext = (toolName: string, extra: ServerRequestExtra) => createToolContext(toolName, services, extra);

  registerTool(server, signalIntakeTool, createContext);
  registerTool(server, caseListTool, createContext);
  registerTool(server, caseGetTool, createContext);
  registerTool(server, caseIssueTool, createContext);
  registerTool(server, proposalRunTool, createContext);
  registerTool(server, proposalValidateTool, createContext);

  const transport = createTransport(options.streams);
  return { server, transport, services };
}

export async function start(options: BuildServerOptions = {}) {
  const { server, transport } = await buildServer(options);

  await connectToTransport(server, transport);
}

function createToolContext(toolName: string, services: GuardianServices, extra?: ServerRequestExtra): ToolContext {
  const requestId = extra?.requestId !== undefined ? String(extra.requestId) : randomUUID();

  return {
    requestId,
    now: () => new Date(),
    logger: componentLogger(`tool:${toolName}`, requestId),
    services,
  };
}
