import { describe, it, expect } from '@jest/globals';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { TOOLS, callTool } from '../mcp/tools.js';
import { convertProvJson } from '../converter.js';

const provJson = {
    prefix: { ex: 'http://example.org/' },
    entity: { 'ex:e1': {} },
    activity: { 'ex:a1': {} },
    wasGeneratedBy: { '_:gen1': { 'prov:entity': 'ex:e1', 'prov:activity': 'ex:a1' } },
};

function textOf(result: CallToolResult): string {
    const [item] = result.content;
    if (item === undefined || item.type !== 'text') {
        throw new Error('Expected a text result');
    }
    return item.text;
}

describe('MCP tools', () => {
    it('should list the conversion and export tools', () => {
        expect(TOOLS.map((tool) => tool.name)).toEqual(['prov_to_jsonld', 'jsonld_to_dot']);
    });

    describe('prov_to_jsonld', () => {
        it('should return the document and its warnings', () => {
            const result = callTool('prov_to_jsonld', { document: provJson });

            expect(result.isError).toBeUndefined();
            expect(JSON.parse(textOf(result))).toEqual(convertProvJson(provJson));
        });

        it('should accept JSON text', () => {
            const result = callTool('prov_to_jsonld', { document: JSON.stringify(provJson) });
            expect(JSON.parse(textOf(result))).toEqual(convertProvJson(provJson));
        });

        it('should pass converter options through', () => {
            const result = callTool('prov_to_jsonld', {
                document: { entity: { 'ex:e1': {} } },
                strictPrefixes: false,
            });

            expect(JSON.parse(textOf(result)).warnings).toEqual([{
                code: 'UnresolvedPrefix',
                path: 'entity[ex:e1]',
                message: "Unresolved prefix 'ex' in qualified name 'ex:e1'",
            }]);
        });

        it('should report conversion errors in the result', () => {
            const result = callTool('prov_to_jsonld', { document: { entity: { 'ex:e1': {} } } });

            expect(result.isError).toBe(true);
            expect(textOf(result)).toBe(
                "Error: Unresolved prefix 'ex' in qualified name 'ex:e1' at entity[ex:e1]"
            );
        });

        it('should reject missing arguments', () => {
            const result = callTool('prov_to_jsonld', {});
            expect(result.isError).toBe(true);
            expect(textOf(result).startsWith('Error: ')).toBe(true);
        });
    });

    describe('jsonld_to_dot', () => {
        it('should render a converted document', () => {
            const { document } = convertProvJson(provJson);
            const result = callTool('jsonld_to_dot', { document, direction: 'TB' });

            expect(textOf(result).split('\n').slice(0, 2)).toEqual(['digraph PROV {', '  rankdir=TB;']);
        });

        it('should reject documents that are not PROV-JSONLD', () => {
            const result = callTool('jsonld_to_dot', { document: { '@graph': 'nope' } });
            expect(result.isError).toBe(true);
        });
    });

    it('should report unknown tools', () => {
        const result = callTool('jsonld_merge', {});
        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe('Error: Unknown tool: jsonld_merge');
    });
});
