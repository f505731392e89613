import { type IncomingMessage, type ServerResponse, createServer } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { z } from "zod";
import {
  MCP_ENDPOINT_PATH,
  SERVER_NAME,
  SERVER_VERSION,
  type ServerConfig,
  loadServerConfig,
} from "../config";
import { MarkdownSectionSplitter, toSectionRecord } from "../splitter";
import { SplitTextTool } from "../tools";
import { LogLevel, logLevelFromName, logger, setLogLevel, setStderrOnly } from "../utils/logger";
import { createError, createJsonResponse, resolveHttpRoute, sendJsonRpcError } from "./utils";

/**
 * Tools exposed by the server
 */
export interface McpTools {
  splitText: SplitTextTool;
}

/**
 * Creates the tools backed by a single splitter shared across all requests.
 */
export function createTools(): McpTools {
  return {
    splitText: new SplitTextTool(new MarkdownSectionSplitter()),
  };
}

/**
 * Creates an MCP server with the split_text tool registered.
 */
export function createMcpServer(tools: McpTools): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.tool(
    "split_text",
    "Split Markdown text into hierarchical sections. Returns a JSON array of sections, each with " +
      "section_header (header without '#' markers), section_text (content up to the next header), " +
      "header_level (number of '#') and metadata.parents / metadata.siblings. " +
      "Lines inside fenced code blocks are never treated as headers.\n" +
      'Example: "# Main\\nContent here\\n## Sub\\nSub content" -> 2 sections, the second with parents {"h1": "Main"}',
    {
      text: z
        .string()
        .describe("The Markdown text to process, with headers marked by '#' (e.g. '## Header 2')"),
    },
    async ({ text }) => {
      try {
        const result = await tools.splitText.execute({ text });
        return createJsonResponse(result.sections.map(toSectionRecord));
      } catch (error) {
        return createError(
          `Failed to split text: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    },
  );

  return server;
}

/**
 * Serves one HTTP request in stateless mode: a fresh server and transport per
 * request, both closed once the response is done.
 */
async function handleHttpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  tools: McpTools,
): Promise<void> {
  const route = resolveHttpRoute(req.method, req.url);
  if (route.kind === "reject") {
    logger.debug(`Rejected ${req.method} ${req.url} with ${route.status}`);
    sendJsonRpcError(res, route.status, route.message);
    return;
  }

  const server = createMcpServer(tools);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

  res.on("close", () => {
    Promise.all([transport.close(), server.close()]).catch((error) => {
      logger.warn(`⚠️ Failed to close MCP request transport: ${error}`);
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

async function startHttpServer(config: ServerConfig, tools: McpTools): Promise<void> {
  const httpServer = createServer((req, res) => {
    handleHttpRequest(req, res, tools).catch((error) => {
      logger.error(`❌ Error handling MCP request: ${error}`);
      if (!res.headersSent) {
        sendJsonRpcError(res, 500, "Internal server error");
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(config.port, config.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  logger.info(`🚀 Markdown sections MCP server listening on http://${config.host}:${config.port}`);
  logger.info(`MCP endpoint available at ${MCP_ENDPOINT_PATH}`);

  process.on("SIGINT", () => {
    httpServer.close(() => process.exit(0));
  });
}

async function startStdioServer(tools: McpTools): Promise<void> {
  const server = createMcpServer(tools);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Markdown sections MCP server running on stdio");

  process.on("SIGINT", async () => {
    await server.close();
    process.exit(0);
  });
}

export async function startServer(config: ServerConfig = loadServerConfig()): Promise<void> {
  if (config.protocol === "stdio") {
    // stdout carries the protocol; keep the server quiet unless asked otherwise
    setStderrOnly(true);
    setLogLevel(LogLevel.ERROR);
  }
  if (config.logLevel) {
    setLogLevel(logLevelFromName(config.logLevel));
  }

  const tools = createTools();

  if (config.protocol === "http") {
    await startHttpServer(config, tools);
  } else {
    await startStdioServer(tools);
  }
}
