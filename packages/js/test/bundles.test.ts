import { convertProvJson } from '../src/converter';
import { PrefixResolutionError, ResourceLimitError } from '../src/errors';
import { synthesizeBlankId } from '../src/identifiers';
import { PROV_JSONLD_CONTEXT } from '../src/vocabulary';

const prefix = { ex: 'http://example.org/' };

describe('Bundle Recursor', () => {
    it('emits a bundle as a named graph after the parent records', () => {
        const { document } = convertProvJson({
            prefix,
            bundle: { 'ex:b1': { entity: { 'ex:e2': {} } } },
            entity: { 'ex:e1': {} },
        });

        expect(document['@graph']).toEqual([
            { '@type': 'prov:Entity', '@id': 'ex:e1' },
            { '@id': 'ex:b1', '@graph': [{ '@type': 'prov:Entity', '@id': 'ex:e2' }] },
        ]);
    });

    it('gives a bundle that declares prefixes its own context', () => {
        const { document } = convertProvJson({
            prefix,
            bundle: {
                'ex:b1': {
                    prefix: { bx: 'http://bundle.example.org/' },
                    entity: { 'bx:e1': {} },
                },
            },
        });

        expect(document['@graph']).toEqual([{
            '@id': 'ex:b1',
            '@context': [{ bx: 'http://bundle.example.org/' }, PROV_JSONLD_CONTEXT],
            '@graph': [{ '@type': 'prov:Entity', '@id': 'bx:e1' }],
        }]);
    });

    it('does not merge a bundle prefix table with its parent', () => {
        const convert = () => convertProvJson({
            prefix,
            bundle: {
                'ex:b1': {
                    prefix: { bx: 'http://bundle.example.org/' },
                    entity: { 'ex:e1': {} },
                },
            },
        });

        expect(convert).toThrow(PrefixResolutionError);
        expect(convert).toThrow(
            "Unresolved prefix 'ex' in qualified name 'ex:e1' at bundle[ex:b1]/entity[ex:e1]"
        );
    });

    it('types bundles when configured', () => {
        const { document } = convertProvJson(
            { prefix, bundle: { 'ex:b1': {} } },
            { typedBundles: true }
        );

        expect(document['@graph']).toEqual([{ '@id': 'ex:b1', '@type': 'prov:Bundle', '@graph': [] }]);
    });

    it('keeps bundle nodes out of the parent graph', () => {
        const { document } = convertProvJson({
            prefix,
            bundle: { 'ex:b1': { entity: { 'ex:inner': {} } } },
        });

        expect(document['@graph'].map((item) => item['@id'])).toEqual(['ex:b1']);
    });

    it('gives each bundle its own identifier scope', () => {
        const record = { 'prov:entity': 'ex:e1', 'prov:activity': 'ex:a1' };
        const { document, warnings } = convertProvJson({
            prefix,
            used: { '_:u1': record },
            bundle: { 'ex:b1': { used: { '_:u1': record, '': record } } },
        });

        expect(warnings).toEqual([]);
        expect(document['@graph']).toEqual([
            { '@type': 'prov:Usage', '@id': '_:u1', entity: 'ex:e1', activity: 'ex:a1' },
            {
                '@id': 'ex:b1',
                '@graph': [
                    { '@type': 'prov:Usage', '@id': '_:u1', entity: 'ex:e1', activity: 'ex:a1' },
                    {
                        '@type': 'prov:Usage',
                        '@id': synthesizeBlankId(['ex:b1'], 'used', 1),
                        entity: 'ex:e1',
                        activity: 'ex:a1',
                    },
                ],
            },
        ]);
    });

    it('folds an element describing a bundle into its named graph', () => {
        const { document, warnings } = convertProvJson(
            {
                prefix,
                entity: { 'ex:b1': { 'ex:version': 2 }, 'ex:e1': {} },
                bundle: { 'ex:b1': { entity: { 'ex:e2': {} } } },
            },
            { typedBundles: true }
        );

        expect(warnings).toEqual([]);
        expect(document['@graph']).toEqual([
            { '@type': 'prov:Entity', '@id': 'ex:e1' },
            {
                '@id': 'ex:b1',
                '@type': ['prov:Entity', 'prov:Bundle'],
                'ex:version': 2,
                '@graph': [{ '@type': 'prov:Entity', '@id': 'ex:e2' }],
            },
        ]);
    });

    it('renames a relation that reuses a bundle identifier', () => {
        const { document, warnings } = convertProvJson({
            prefix,
            entity: { 'ex:b1': {} },
            wasAttributedTo: { 'ex:b2': { 'prov:entity': 'ex:b1', 'prov:agent': 'ex:ag1' } },
            bundle: { 'ex:b1': {}, 'ex:b2': {} },
        });
        const renamed = synthesizeBlankId([], 'wasAttributedTo', 1);

        expect(document['@graph']).toEqual([
            { '@type': 'prov:Attribution', '@id': renamed, entity: 'ex:b1', agent: 'ex:ag1' },
            { '@id': 'ex:b1', '@type': 'prov:Entity', '@graph': [] },
            { '@id': 'ex:b2', '@graph': [] },
        ]);
        expect(document['@graph'].map((item) => item['@id'])).toEqual([renamed, 'ex:b1', 'ex:b2']);
        expect(warnings).toEqual([{
            code: 'DuplicateIdentifier',
            path: 'wasAttributedTo[ex:b2]',
            message: `Identifier 'ex:b2' is already used in this graph; emitted as '${renamed}'`,
        }]);
    });

    it('reports warnings with the bundle path', () => {
        const { warnings } = convertProvJson({
            prefix,
            bundle: { 'ex:b1': { bundle: { 'ex:b2': { entity: { 'ex:e1': { size: 1 } } } } } },
        });

        expect(warnings).toEqual([{
            code: 'UnqualifiedAttribute',
            path: 'bundle[ex:b1]/bundle[ex:b2]/entity[ex:e1].size',
            message: "Attribute key 'size' is not a qualified name",
        }]);
    });

    it('rejects bundle identifiers with an undeclared prefix', () => {
        expect(() => convertProvJson({ prefix, bundle: { 'foo:b1': {} } })).toThrow(
            "Unresolved prefix 'foo' in qualified name 'foo:b1' at bundle[foo:b1]"
        );
    });

    it('enforces the bundle nesting limit', () => {
        const convert = () => convertProvJson(
            { prefix, bundle: { 'ex:b1': { bundle: { 'ex:b2': {} } } } },
            { resourceLimits: { maxBundleDepth: 1 } }
        );

        expect(convert).toThrow(ResourceLimitError);
        expect(convert).toThrow('Bundle nesting exceeds limit of 1 at bundle[ex:b1]/bundle[ex:b2]');
    });
});
