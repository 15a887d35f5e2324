import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

const ManifestSchema = z.object({
    main: z.string(),
    types: z.string(),
    bin: z.record(z.string()),
    files: z.array(z.string()),
});

const manifest = ManifestSchema.parse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8')));

describe('package manifest', () => {
    it('points the library entry at the build output', () => {
        expect(manifest.main).toBe('dist/index.js');
        expect(manifest.types).toBe('dist/index.d.ts');
    });

    it('publishes every entry point', () => {
        const entries = [manifest.main, manifest.types, ...Object.values(manifest.bin)];
        const published = (entry: string) => manifest.files.some((dir) => entry.startsWith(`${dir}/`));

        expect(entries.filter((entry) => !published(entry))).toEqual([]);
    });
});
