import { z } from "zod";

/**
 * Default configuration values for the MCP server
 */

/** Name the server reports to MCP clients */
export const SERVER_NAME = "markdown-sections-mcp";

/** Version the server reports to MCP clients */
export const SERVER_VERSION = "0.1.0";

/** Transport used when neither MCP_PROTOCOL nor --protocol is given */
export const DEFAULT_PROTOCOL = "stdio";

/** Interface the HTTP transport binds to */
export const DEFAULT_HTTP_HOST = "0.0.0.0";

/** Port the HTTP transport listens on */
export const DEFAULT_HTTP_PORT = 8080;

/** Path of the streamable HTTP endpoint */
export const MCP_ENDPOINT_PATH = "/server/mcp";

export const SERVER_PROTOCOLS = ["stdio", "http"] as const;

export type ServerProtocol = (typeof SERVER_PROTOCOLS)[number];

const ServerConfigSchema = z.object({
  protocol: z.enum(SERVER_PROTOCOLS).default(DEFAULT_PROTOCOL),
  host: z.string().min(1).default(DEFAULT_HTTP_HOST),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_HTTP_PORT),
  logLevel: z.enum(["error", "warn", "info", "debug"]).optional(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Values given on the command line; they take precedence over the environment.
 */
export interface ServerConfigOverrides {
  protocol?: string;
  host?: string;
  port?: string;
}

/**
 * Builds the server configuration from environment variables
 * (MCP_PROTOCOL, HOST, PORT, LOG_LEVEL) and optional overrides.
 * Empty variables count as unset.
 * @throws {z.ZodError} If a value is invalid (e.g. a non-numeric port)
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ServerConfigOverrides = {},
): ServerConfig {
  return ServerConfigSchema.parse({
    protocol: overrides.protocol || env.MCP_PROTOCOL || undefined,
    host: overrides.host || env.HOST || undefined,
    port: overrides.port || env.PORT || undefined,
    logLevel: env.LOG_LEVEL?.toLowerCase() || undefined,
  });
}
