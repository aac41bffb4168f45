#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger } from "@stockdesk/agents";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./server.js";

const logger = createLogger("McpServer");

const { server } = createServer();

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info(`${SERVER_NAME} ${SERVER_VERSION} listening on stdio`);
