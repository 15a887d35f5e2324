/**
 * CBOR serialization for PROV-JSONLD documents.
 *
 * Binary-efficient serialization using CBOR, with context compression:
 * well-known context URLs in `@context` arrays (the document's and each
 * bundle's) are replaced by small integers.
 */

import { encode, decode } from 'cbor-x';
import { ContextEntry, GraphItem, ProvJsonLdDocument, isNamedGraph } from './types.js';
import { ProvJsonLdDocumentSchema, validate } from './schemas.js';
import { PROV_JSONLD_CONTEXT } from './vocabulary.js';

// ── Default Context Registry ──────────────────────────────────────

export const DEFAULT_CONTEXT_REGISTRY: Readonly<Record<string, number>> = {
    [PROV_JSONLD_CONTEXT]: 1,
};

// ── Types ─────────────────────────────────────────────────────────

export interface PayloadStats {
    jsonBytes: number;
    cborBytes: number;
    cborRatio: number;
}

type CompressedContext = Array<ContextEntry | number>;

// ── Serialization ─────────────────────────────────────────────────

/**
 * Serialize a PROV-JSONLD document to CBOR with context compression.
 *
 * @param contextRegistry - Registry mapping context URLs to integers.
 */
export function toCbor(
    doc: ProvJsonLdDocument,
    contextRegistry: Readonly<Record<string, number>> = DEFAULT_CONTEXT_REGISTRY
): Buffer {
    const compressed = {
        '@context': compressContext(doc['@context'], contextRegistry),
        '@graph': doc['@graph'].map((item) => compressItem(item, contextRegistry)),
    };
    return Buffer.from(encode(compressed));
}

/**
 * Deserialize CBOR bytes back to a PROV-JSONLD document.
 *
 * @param contextRegistry - Same registry used during serialization.
 * @throws ZodError if the decoded value is not a PROV-JSONLD document
 */
export function fromCbor(
    data: Buffer | Uint8Array,
    contextRegistry: Readonly<Record<string, number>> = DEFAULT_CONTEXT_REGISTRY
): ProvJsonLdDocument {
    const reverseRegistry = new Map<number, string>();
    for (const [url, code] of Object.entries(contextRegistry)) {
        reverseRegistry.set(code, url);
    }

    const decoded: unknown = decode(data);
    return validate(ProvJsonLdDocumentSchema, decompress(decoded, reverseRegistry));
}

// ── Statistics ────────────────────────────────────────────────────

/**
 * Compare serialization sizes for a document.
 */
export function payloadStats(
    doc: ProvJsonLdDocument,
    contextRegistry?: Readonly<Record<string, number>>
): PayloadStats {
    const jsonBytes = Buffer.byteLength(JSON.stringify(doc));
    const cborBytes = toCbor(doc, contextRegistry).length;

    return {
        jsonBytes,
        cborBytes,
        cborRatio: jsonBytes === 0 ? 0 : cborBytes / jsonBytes,
    };
}

// ── Internal Helpers ──────────────────────────────────────────────

function compressContext(
    context: ContextEntry[],
    registry: Readonly<Record<string, number>>
): CompressedContext {
    return context.map((entry) =>
        typeof entry === 'string' && Object.hasOwn(registry, entry) ? registry[entry] : entry
    );
}

function compressItem(item: GraphItem, registry: Readonly<Record<string, number>>): object {
    if (!isNamedGraph(item)) return item;

    const { '@context': context, '@graph': graph, ...rest } = item;
    return {
        ...rest,
        ...(context !== undefined ? { '@context': compressContext(context, registry) } : {}),
        '@graph': graph.map((nested) => compressItem(nested, registry)),
    };
}

/** Restore context URLs anywhere a `@context` array appears */
function decompress(value: unknown, reverseRegistry: ReadonlyMap<number, string>): unknown {
    if (Array.isArray(value)) {
        return value.map((item: unknown) => decompress(item, reverseRegistry));
    }

    if (value !== null && typeof value === 'object') {
        const result: Record<string, unknown> = {};
        const entries: Array<[string, unknown]> = Object.entries(value);
        for (const [key, entry] of entries) {
            result[key] = key === '@context' && Array.isArray(entry)
                ? entry.map((ctx: unknown) => typeof ctx === 'number' ? reverseRegistry.get(ctx) ?? ctx : ctx)
                : decompress(entry, reverseRegistry);
        }
        return result;
    }

    return value;
}
