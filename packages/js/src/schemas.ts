/**
 * Runtime validation schemas using Zod.
 */

import { z } from 'zod';
import {
    AttributeSet, ContextEntry, ConverterOptions, GraphItem, JsonLdValue,
    NamedGraph, ProvJsonLdDocument, ProvNode, RawAttribute,
} from './types.js';

// ── PROV-JSON Records ─────────────────────────────────────────────

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

/** Scalar, or a composite `{ $, type }` / `{ $, lang }` object checked later */
const RawValueSchema = z.union([ScalarSchema, z.record(z.unknown())]);

export const RawAttributeSchema: z.ZodType<RawAttribute> = z.union([
    RawValueSchema,
    z.array(RawValueSchema),
]);

export const AttributeSetSchema: z.ZodType<AttributeSet> = z.record(RawAttributeSchema);

/** An identifier maps to one attribute set, or several sharing the identifier */
export const RecordEntrySchema = z.union([
    AttributeSetSchema,
    z.array(AttributeSetSchema),
]);

export const RecordCollectionSchema = z.record(RecordEntrySchema);

export const PrefixTableSchema = z.record(z.string().min(1));

export const BundleTableSchema = z.record(z.record(z.unknown()));

// ── PROV-JSONLD Documents ─────────────────────────────────────────

const JsonLdValueSchema: z.ZodType<JsonLdValue> = z.union([
    ScalarSchema,
    z.null(),
    z.object({ '@value': ScalarSchema, '@type': z.string() }).strict(),
    z.object({ '@value': z.string(), '@language': z.string() }).strict(),
]);

const JsonLdAttributeSchema = z.union([JsonLdValueSchema, z.array(JsonLdValueSchema)]);

const TypeSchema = z.union([z.string(), z.array(z.string())]);

export const ProvNodeSchema: z.ZodType<ProvNode> = z.object({
    '@type': TypeSchema,
    '@id': z.string(),
}).catchall(JsonLdAttributeSchema);

const ContextEntrySchema: z.ZodType<ContextEntry> = z.union([z.string(), z.record(z.string())]);

export const NamedGraphSchema: z.ZodType<NamedGraph> = z.lazy(() => z.object({
    '@id': z.string(),
    '@type': TypeSchema.optional(),
    '@context': z.array(ContextEntrySchema).optional(),
    '@graph': z.array(GraphItemSchema),
}).catchall(JsonLdAttributeSchema));

export const GraphItemSchema: z.ZodType<GraphItem> = z.lazy(() => z.union([
    NamedGraphSchema,
    ProvNodeSchema,
]));

export const ProvJsonLdDocumentSchema: z.ZodType<ProvJsonLdDocument> = z.object({
    '@context': z.array(ContextEntrySchema),
    '@graph': z.array(GraphItemSchema),
});

// ── Converter Options ─────────────────────────────────────────────

export const ResourceLimitsSchema = z.object({
    maxDocumentSize: z.number().int().positive().optional(),
    maxBundleDepth: z.number().int().nonnegative().optional(),
    maxExpansionTime: z.number().int().positive().optional(),
}).strict();

export const ConverterOptionsSchema: z.ZodType<ConverterOptions> = z.object({
    contextUrl: z.string().url().optional(),
    predeclaredPrefixes: z.array(z.string().min(1)).optional(),
    strictPrefixes: z.boolean().optional(),
    typedBundles: z.boolean().optional(),
    resourceLimits: ResourceLimitsSchema.optional(),
}).strict();

// ── Validation Helper ─────────────────────────────────────────────

/**
 * Validates data against a Zod schema.
 * Throws a ZodError if validation fails.
 */
export function validate<T>(schema: z.ZodType<T>, data: unknown): T {
    return schema.parse(data);
}

/**
 * Safely validates data against a Zod schema.
 * Returns a SafeParseReturnType.
 */
export function safeValidate<T>(schema: z.ZodType<T>, data: unknown) {
    return schema.safeParse(data);
}
