#!/usr/bin/env node
import "dotenv/config";
import { startServer } from "./mcp";
import { logger } from "./utils/logger";

// Configuration comes from MCP_PROTOCOL, HOST, PORT and LOG_LEVEL
startServer().catch((error) => {
  logger.error(`❌ Fatal Error: ${error}`);
  process.exit(1);
});
