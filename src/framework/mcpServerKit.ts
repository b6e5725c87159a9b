import { Readable, Writable } from "node:stream";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { RequestHandlerExtra } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { ServerNotification, ServerRequest } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { formatErrorReport } from "../errors.js";
import { log } from "../logger.js";
import type { ToolContext, ToolDefinition } from "../tools/types.js";

export type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
export { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface McpServerOptions {
  name: string;
  version: string;
  title?: string;
  instructions?: string;
}

export type ServerRequestExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface TransportStreams {
  input?: Readable;
  output?: Writable;
}

export function createMcpServer(options: McpServerOptions): McpServer {
  return new McpServer(
    {
      name: options.name,
      version: options.version,
      title: options.title ?? options.name,
    },
    {
      capabilities: {
        tools: { listChanged: true },
        logging: {},
      },
      instructions: options.instructions,
    },
  );
}

export async function connectToTransport(
  server: McpServer,
  transport: StdioServerTransport,
): Promise<void> {
  await server.connect(transport);
}

export function createTransport(streams?: TransportStreams): StdioServerTransport {
  return new StdioServerTransport(streams?.input, streams?.output);
}

export type ToolContextFactory = (toolName: string, extra: ServerRequestExtra) => ToolContext;

/**
 * Registers a tool whose arguments are re-parsed with its own schema before
 * the handler runs. Handler failures come back to the client as an
 * `isError` result carrying the itemized report.
 */
export function registerTool<InputShape extends z.ZodRawShape, Output extends Record<string, unknown>>(
  server: McpServer,
  tool: ToolDefinition<InputShape, Output>,
  createContext: ToolContextFactory,
): void {
  const inputSchema = z.object(tool.inputShape);

  server.registerTool<z.ZodRawShape, z.ZodRawShape>(
    tool.name,
    {
      description: tool.description,
      inputSchema: tool.inputShape,
      outputSchema: tool.outputShape,
    },
    async (args, extra) => {
      const context = createContext(tool.name, extra);
      try {
        const structuredContent = await tool.handler(inputSchema.parse(args), context);
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(structuredContent, null, 2),
            },
          ],
          structuredContent,
        };
      } catch (error) {
        const report = formatErrorReport(error);
        log({ level: "error", component: `tool:${tool.name}`, requestId: context.requestId, message: report });
        return {
          content: [{ type: "text" as const, text: report }],
          isError: true,
        };
      }
    },
  );
}
