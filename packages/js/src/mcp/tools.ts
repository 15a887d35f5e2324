import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ProvJsonLdConverter } from "../converter.js";
import { ProvJsonLdDocumentSchema, validate } from "../schemas.js";
import { toDot } from "../viz/dot.js";

// ── Tool Definitions ──────────────────────────────────────────────

export const TOOLS: Tool[] = [
    {
        name: "prov_to_jsonld",
        description: "Convert a PROV-JSON document to PROV-JSONLD. Returns the document and any conversion warnings.",
        inputSchema: {
            type: "object",
            properties: {
                document: {
                    type: ["object", "string"],
                    description: "PROV-JSON document, parsed or as JSON text"
                },
                typedBundles: {
                    type: "boolean",
                    description: "Emit @type prov:Bundle on bundle graphs (default: false)"
                },
                strictPrefixes: {
                    type: "boolean",
                    description: "Fail on undeclared prefixes instead of warning (default: true)"
                }
            },
            required: ["document"]
        },
    },
    {
        name: "jsonld_to_dot",
        description: "Render a PROV-JSONLD document as Graphviz DOT text.",
        inputSchema: {
            type: "object",
            properties: {
                document: { type: "object", description: "PROV-JSONLD document" },
                showAttributes: {
                    type: "boolean",
                    description: "List node attributes under each label (default: false)"
                },
                direction: {
                    type: "string",
                    enum: ["LR", "TB"],
                    description: "Graph layout direction (default: LR)"
                }
            },
            required: ["document"]
        },
    },
];

// ── Argument Schemas ──────────────────────────────────────────────

const ProvToJsonLdArgsSchema = z.object({
    document: z.union([z.string(), z.record(z.unknown())]),
    typedBundles: z.boolean().optional(),
    strictPrefixes: z.boolean().optional(),
});

const JsonLdToDotArgsSchema = z.object({
    document: z.unknown(),
    showAttributes: z.boolean().optional(),
    direction: z.enum(["LR", "TB"]).optional(),
});

// ── Dispatch ──────────────────────────────────────────────────────

/**
 * Run a tool by name. Failures are reported in the result with
 * `isError` set rather than thrown.
 */
export function callTool(name: string, args: unknown): CallToolResult {
    try {
        switch (name) {
            case "prov_to_jsonld": {
                const { document, typedBundles, strictPrefixes } = validate(ProvToJsonLdArgsSchema, args);
                const converter = new ProvJsonLdConverter({ typedBundles, strictPrefixes });
                return textResult(JSON.stringify(converter.convert(document), null, 2));
            }

            case "jsonld_to_dot": {
                const { document, showAttributes, direction } = validate(JsonLdToDotArgsSchema, args);
                const provJsonLd = validate(ProvJsonLdDocumentSchema, document);
                return textResult(toDot(provJsonLd, { showAttributes, direction }));
            }

            default:
                throw new Error(`Unknown tool: ${name}`);
        }
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return {
            content: [{ type: "text", text: `Error: ${message}` }],
            isError: true,
        };
    }
}

function textResult(text: string): CallToolResult {
    return { content: [{ type: "text", text }] };
}
