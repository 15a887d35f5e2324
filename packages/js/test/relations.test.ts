import { convertProvJson } from '../src/converter';
import { ParseError } from '../src/errors';
import { synthesizeBlankId } from '../src/identifiers';
import { RELATION_KINDS } from '../src/vocabulary';

const prefix = { ex: 'http://example.org/' };

describe('Relation Mapper', () => {
    it('renames roles and the time qualifier of a generation', () => {
        const { document, warnings } = convertProvJson({
            prefix,
            wasGeneratedBy: {
                '_:gen1': {
                    'prov:entity': 'ex:e1',
                    'prov:activity': 'ex:a1',
                    'prov:time': '2024-03-01T10:30:00Z',
                },
            },
        });

        expect(document['@graph']).toEqual([{
            '@type': 'prov:Generation',
            '@id': '_:gen1',
            entity: 'ex:e1',
            activity: 'ex:a1',
            time: '2024-03-01T10:30:00Z',
        }]);
        expect(warnings).toEqual([]);
    });

    it.each([
        ['wasGeneratedBy', 'prov:Generation', 'prov:activity', 'activity'],
        ['used', 'prov:Usage', 'prov:entity', 'entity'],
        ['wasInformedBy', 'prov:Communication', 'prov:informant', 'informant'],
        ['wasStartedBy', 'prov:Start', 'prov:trigger', 'trigger'],
        ['wasEndedBy', 'prov:End', 'prov:ender', 'ender'],
        ['wasInvalidatedBy', 'prov:Invalidation', 'prov:entity', 'entity'],
        ['wasDerivedFrom', 'prov:Derivation', 'prov:usedEntity', 'usedEntity'],
        ['wasAttributedTo', 'prov:Attribution', 'prov:agent', 'agent'],
        ['wasAssociatedWith', 'prov:Association', 'prov:plan', 'plan'],
        ['actedOnBehalfOf', 'prov:Delegation', 'prov:responsible', 'responsible'],
        ['wasInfluencedBy', 'prov:Influence', 'prov:influencer', 'influencer'],
        ['specializationOf', 'provext:Specialization', 'prov:generalEntity', 'generalEntity'],
        ['alternateOf', 'provext:Alternate', 'prov:alternate2', 'alternate2'],
        ['hadMember', 'provext:Membership', 'prov:collection', 'collection'],
    ])('maps %s to %s', (kind, type, role, short) => {
        const { document } = convertProvJson({ prefix, [kind]: { 'ex:r1': { [role]: 'ex:x' } } });
        expect(document['@graph']).toEqual([{ '@type': type, '@id': 'ex:r1', [short]: 'ex:x' }]);
    });

    it('covers every relation kind', () => {
        expect(RELATION_KINDS).toHaveLength(14);
    });

    it('emits relations in canonical kind order', () => {
        const { document } = convertProvJson({
            prefix,
            used: { '_:u1': { 'prov:activity': 'ex:a1', 'prov:entity': 'ex:e0' } },
            wasGeneratedBy: { '_:g1': { 'prov:entity': 'ex:e1', 'prov:activity': 'ex:a1' } },
            entity: { 'ex:e1': {} },
        });

        expect(document['@graph'].map((item) => item['@id'])).toEqual(['ex:e1', '_:g1', '_:u1']);
    });

    it('keeps the time key of kinds without a time qualifier', () => {
        const { document } = convertProvJson({
            prefix,
            wasDerivedFrom: {
                '_:d1': { 'prov:generatedEntity': 'ex:e2', 'prov:usedEntity': 'ex:e1', 'prov:time': '2024-03-01' },
            },
        });

        expect(document['@graph']).toEqual([{
            '@type': 'prov:Derivation',
            '@id': '_:d1',
            generatedEntity: 'ex:e2',
            usedEntity: 'ex:e1',
            'prov:time': '2024-03-01',
        }]);
    });

    it('carries other attributes after normalization', () => {
        const { document } = convertProvJson({
            prefix,
            wasAssociatedWith: {
                '_:as1': {
                    'prov:activity': 'ex:a1',
                    'prov:agent': 'ex:ag1',
                    'prov:role': { $: 'operator', type: 'xsd:string' },
                },
            },
        });

        expect(document['@graph']).toEqual([{
            '@type': 'prov:Association',
            '@id': '_:as1',
            activity: 'ex:a1',
            agent: 'ex:ag1',
            'prov:role': { '@value': 'operator', '@type': 'xsd:string' },
        }]);
    });

    it('accepts role values in typed qualified-name form', () => {
        const { document } = convertProvJson({
            prefix,
            used: {
                '_:u1': {
                    'prov:activity': 'ex:a1',
                    'prov:entity': { $: 'ex:e1', type: 'prov:QUALIFIED_NAME' },
                },
            },
        });

        expect(document['@graph']).toEqual([
            { '@type': 'prov:Usage', '@id': '_:u1', entity: 'ex:e1', activity: 'ex:a1' },
        ]);
    });

    it('rejects a role value that is not a qualified name', () => {
        const convert = () => convertProvJson({
            prefix,
            used: { '_:u1': { 'prov:activity': 'ex:a1', 'prov:entity': 42 } },
        });

        expect(convert).toThrow(ParseError);
        expect(convert).toThrow("Role 'prov:entity' must be a qualified name at used[_:u1].prov:entity");
    });

    it('rejects a role value with an undeclared prefix', () => {
        expect(() => convertProvJson({
            prefix,
            used: { '_:u1': { 'prov:entity': 'foo:e1' } },
        })).toThrow("Unresolved prefix 'foo' in qualified name 'foo:e1' at used[_:u1].prov:entity");
    });

    describe('identifiers', () => {
        it('synthesizes a blank identifier for an empty key', () => {
            const { document, warnings } = convertProvJson({
                prefix,
                wasGeneratedBy: { '': { 'prov:entity': 'ex:e1' } },
            });

            expect(document['@graph']).toEqual([{
                '@type': 'prov:Generation',
                '@id': synthesizeBlankId([], 'wasGeneratedBy', 1),
                entity: 'ex:e1',
            }]);
            expect(warnings).toEqual([]);
        });

        it('synthesizes identifiers for records sharing one key', () => {
            const { document, warnings } = convertProvJson({
                prefix,
                used: {
                    '_:u1': [
                        { 'prov:activity': 'ex:a1', 'prov:entity': 'ex:e1' },
                        { 'prov:activity': 'ex:a1', 'prov:entity': 'ex:e2' },
                    ],
                },
            });
            const synthesized = synthesizeBlankId([], 'used', 1);

            expect(document['@graph'].map((item) => item['@id'])).toEqual(['_:u1', synthesized]);
            expect(warnings).toEqual([{
                code: 'DuplicateIdentifier',
                path: 'used[_:u1]',
                message: `Identifier '_:u1' is already used in this graph; emitted as '${synthesized}'`,
            }]);
        });

        it('does not reuse an element identifier for a relation', () => {
            const { document, warnings } = convertProvJson({
                prefix,
                entity: { 'ex:e1': {} },
                wasAttributedTo: { 'ex:e1': { 'prov:entity': 'ex:e1', 'prov:agent': 'ex:ag1' } },
            });

            expect(document['@graph'][1]['@id']).toBe(synthesizeBlankId([], 'wasAttributedTo', 1));
            expect(warnings.map((w) => w.code)).toEqual(['DuplicateIdentifier']);
        });

        it('does not collide with a user-chosen blank identifier', () => {
            const taken = synthesizeBlankId([], 'used', 1);
            const { document } = convertProvJson({
                prefix,
                used: {
                    [taken]: { 'prov:entity': 'ex:e1' },
                    '': { 'prov:entity': 'ex:e2' },
                },
            });

            expect(document['@graph'].map((item) => item['@id'])).toEqual([
                taken,
                synthesizeBlankId([], 'used', 2),
            ]);
        });
    });

    describe('role and attribute collisions', () => {
        it('keeps the role and drops a bare key with the role name', () => {
            const { document, warnings } = convertProvJson({
                prefix,
                used: { '_:u1': { entity: 'ex:other', 'prov:entity': 'ex:e1' } },
            });

            expect(document['@graph']).toEqual([{ '@type': 'prov:Usage', '@id': '_:u1', entity: 'ex:e1' }]);
            expect(warnings).toEqual([{
                code: 'UnqualifiedAttribute',
                path: 'used[_:u1].entity',
                message: "Attribute key 'entity' collides with role 'entity' and is ignored",
            }]);
        });
    });
});
