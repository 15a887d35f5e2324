import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runLd2Dot, runProv2JsonLd } from '../src/cli/commands';
import { convertProvJson } from '../src/converter';
import { fromCbor } from '../src/cbor';
import { Logger } from '../src/logger';

const input = {
    prefix: { ex: 'http://example.org/' },
    entity: { 'ex:e1': {} },
    activity: { 'ex:a1': {} },
    wasGeneratedBy: { '_:gen1': { 'prov:entity': 'ex:e1', 'prov:activity': 'ex:a1' } },
};

describe('command-line tools', () => {
    let dir: string;
    let errorSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;
    const logger = new Logger('test');

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'prov-jsonld-'));
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        errorSpy.mockRestore();
        warnSpy.mockRestore();
        await rm(dir, { recursive: true, force: true });
    });

    async function writeInput(name: string, value: unknown): Promise<string> {
        const path = join(dir, name);
        await writeFile(path, JSON.stringify(value));
        return path;
    }

    describe('prov2jsonld', () => {
        it('writes the converted document', async () => {
            const source = await writeInput('in.json', input);
            const target = join(dir, 'out.jsonld');

            expect(await runProv2JsonLd([source, target], logger)).toBe(EXIT_OK);
            expect(JSON.parse(await readFile(target, 'utf8'))).toEqual(convertProvJson(input).document);
            expect(errorSpy).toHaveBeenCalledWith(
                expect.stringContaining(`Converted PROV-JSON to PROV-JSONLD: ${target}`)
            );
        });

        it('writes CBOR on request', async () => {
            const source = await writeInput('in.json', input);
            const target = join(dir, 'out.cbor');

            expect(await runProv2JsonLd([source, target, '--format', 'cbor'], logger)).toBe(EXIT_OK);
            expect(fromCbor(await readFile(target))).toEqual(convertProvJson(input).document);
        });

        it('types bundles on request', async () => {
            const source = await writeInput('in.json', { prefix: input.prefix, bundle: { 'ex:b1': {} } });
            const target = join(dir, 'out.jsonld');

            expect(await runProv2JsonLd([source, target, '--typed-bundles'], logger)).toBe(EXIT_OK);
            expect(JSON.parse(await readFile(target, 'utf8'))['@graph']).toEqual([
                { '@id': 'ex:b1', '@type': 'prov:Bundle', '@graph': [] },
            ]);
        });

        it('fails on an undeclared prefix', async () => {
            const source = await writeInput('in.json', { entity: { 'ex:e1': {} } });

            expect(await runProv2JsonLd([source, join(dir, 'out.jsonld')], logger)).toBe(EXIT_FAILURE);
            expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining(
                "Conversion failed: Unresolved prefix 'ex' in qualified name 'ex:e1' at entity[ex:e1]"
            ));
        });

        it('logs warnings and succeeds with lenient prefixes', async () => {
            const source = await writeInput('in.json', { entity: { 'ex:e1': {} } });

            expect(await runProv2JsonLd([source, join(dir, 'out.jsonld'), '--lenient-prefixes'], logger))
                .toBe(EXIT_OK);
            expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining(
                "UnresolvedPrefix at entity[ex:e1]: Unresolved prefix 'ex' in qualified name 'ex:e1'"
            ));
        });

        it('fails when the input cannot be read', async () => {
            expect(await runProv2JsonLd([join(dir, 'missing.json'), join(dir, 'out.jsonld')], logger))
                .toBe(EXIT_FAILURE);
        });

        it('reports usage errors', async () => {
            expect(await runProv2JsonLd(['only-one.json'], logger)).toBe(EXIT_USAGE);
            expect(await runProv2JsonLd(['in.json', 'out.jsonld', '--format', 'xml'], logger)).toBe(EXIT_USAGE);
            expect(await runProv2JsonLd(['in.json', 'out.jsonld', '--verbose'], logger)).toBe(EXIT_USAGE);
        });
    });

    describe('ld2dot', () => {
        it('writes a DOT graph', async () => {
            const source = await writeInput('in.jsonld', convertProvJson(input).document);
            const target = join(dir, 'out.dot');

            expect(await runLd2Dot([source, target, '--direction', 'TB'], logger)).toBe(EXIT_OK);
            const dot = await readFile(target, 'utf8');
            expect(dot.split('\n').slice(0, 2)).toEqual(['digraph PROV {', '  rankdir=TB;']);
            expect(dot).toContain('  "ex:a1" -> "ex:e1" [label="wasGeneratedBy"');
        });

        it('fails on input that is not PROV-JSONLD', async () => {
            const source = await writeInput('in.jsonld', { name: 'not a graph' });
            expect(await runLd2Dot([source, join(dir, 'out.dot')], logger)).toBe(EXIT_FAILURE);
        });

        it('reports usage errors', async () => {
            expect(await runLd2Dot([], logger)).toBe(EXIT_USAGE);
            expect(await runLd2Dot(['in.jsonld', 'out.dot', '--direction', 'RL'], logger)).toBe(EXIT_USAGE);
        });
    });
});
