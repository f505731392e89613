import type { ServerResponse } from "node:http";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { MCP_ENDPOINT_PATH } from "../config";

/**
 * Creates a success response whose single text item is the JSON encoding of `data`.
 * @param data The value to serialize.
 * @returns The response object.
 */
export function createJsonResponse(data: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(data, null, 2),
      },
    ],
    isError: false,
  };
}

/**
 * Creates an error response object in the format expected by the MCP server.
 * @param text The error message.
 * @returns The response object.
 */
export function createError(text: string): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text,
      },
    ],
    isError: true,
  };
}

export type HttpRoute = { kind: "mcp" } | { kind: "reject"; status: 404 | 405; message: string };

/**
 * Decides how the HTTP transport answers a request. Only POSTs to the MCP
 * endpoint (with or without a trailing slash) reach the protocol handler; the
 * server runs stateless, so there is no SSE stream to GET and no session to DELETE.
 */
export function resolveHttpRoute(method: string | undefined, url: string | undefined): HttpRoute {
  const { pathname } = new URL(url ?? "/", "http://localhost");
  if (pathname !== MCP_ENDPOINT_PATH && pathname !== `${MCP_ENDPOINT_PATH}/`) {
    return { kind: "reject", status: 404, message: `Not found: ${pathname}` };
  }
  if (method !== "POST") {
    return { kind: "reject", status: 405, message: "Method not allowed." };
  }
  return { kind: "mcp" };
}

/**
 * Writes a JSON-RPC error envelope with the given HTTP status.
 */
export function sendJsonRpcError(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(
    JSON.stringify({
      jsonrpc: "2.0",
      error: { code: -32000, message },
      id: null,
    }),
  );
}
