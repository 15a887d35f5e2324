#!/usr/bin/env node

import { Logger } from "../logger.js";
import { ProvJsonLdMcpServer } from "./server.js";

const logger = new Logger("mcp");

async function main() {
    const server = new ProvJsonLdMcpServer(logger);
    await server.run();
}

main().catch((error: unknown) => {
    logger.error("MCP server failed to start", error);
    process.exitCode = 1;
});
