import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { Logger } from "../logger.js";
import { TOOLS, callTool } from "./tools.js";

export const SERVER_NAME = "prov-jsonld";
export const SERVER_VERSION = "0.1.0";

export class ProvJsonLdMcpServer {
    private server: Server;
    private logger: Logger;

    constructor(logger = new Logger("mcp")) {
        this.logger = logger;
        this.server = new Server(
            {
                name: SERVER_NAME,
                version: SERVER_VERSION,
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupHandlers();

        this.server.onerror = (error) => this.logger.error("MCP error", error);
    }

    private setupHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: TOOLS,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            this.logger.debug(`Calling tool ${name}`);

            const result = callTool(name, args);
            if (result.isError) {
                this.logger.warn(`Tool ${name} failed`, result.content);
            }
            return result;
        });
    }

    async run() {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        this.logger.info("PROV-JSONLD MCP server running on stdio");
    }
}
