/**
 * PROV-JSON reader.
 *
 * Validates the record shape of a parsed PROV-JSON document and
 * builds the {@link ProvDocument} tree the engine works on.
 */

import { z } from 'zod';
import { AttributeSet, ProvDocument, RecordCollection, RecordPath } from './types.js';
import { ParseError } from './errors.js';
import {
  BundleTableSchema, PrefixTableSchema, RecordCollectionSchema, safeValidate,
} from './schemas.js';
import {
  ElementKind, KEY_BUNDLE, KEY_PREFIX, RelationKind, isElementKind, isRelationKind,
} from './vocabulary.js';

/**
 * Parse PROV-JSON text.
 *
 * @throws ParseError when the text is not JSON or not PROV-JSON shaped
 */
export function parseProvJson(text: string): ProvDocument {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Input is not well-formed JSON: ${reason}`);
  }
  return readProvDocument(value);
}

/**
 * Build a document from an already-parsed PROV-JSON value.
 *
 * @param bundles - Enclosing bundle identifiers, for error paths
 */
export function readProvDocument(value: unknown, bundles: string[] = []): ProvDocument {
  if (!isPlainObject(value)) {
    throw new ParseError('PROV-JSON document must be a JSON object', { bundles });
  }

  let prefixes: Record<string, string> | undefined;
  const elements = new Map<ElementKind, RecordCollection>();
  const relations = new Map<RelationKind, RecordCollection>();
  const unknown = new Map<string, RecordCollection>();
  const nested = new Map<string, ProvDocument>();

  for (const [key, raw] of Object.entries(value)) {
    if (key === KEY_PREFIX) {
      const parsed = safeValidate(PrefixTableSchema, raw);
      if (!parsed.success) throw shapeError(key, parsed.error, bundles);
      prefixes = parsed.data;
      continue;
    }

    if (key === KEY_BUNDLE) {
      const parsed = safeValidate(BundleTableSchema, raw);
      if (!parsed.success) throw shapeError(key, parsed.error, bundles);
      for (const [id, bundle] of Object.entries(parsed.data)) {
        nested.set(id, readProvDocument(bundle, [...bundles, id]));
      }
      continue;
    }

    if (isElementKind(key) || isRelationKind(key)) {
      const parsed = safeValidate(RecordCollectionSchema, raw);
      if (!parsed.success) throw shapeError(key, parsed.error, bundles);
      const collection = toCollection(parsed.data);
      if (isElementKind(key)) {
        elements.set(key, collection);
      } else {
        relations.set(key, collection);
      }
      continue;
    }

    // Unknown kinds are reported later; a shape we cannot read is kept empty
    const parsed = safeValidate(RecordCollectionSchema, raw);
    unknown.set(key, parsed.success ? toCollection(parsed.data) : new Map());
  }

  return { prefixes, elements, relations, unknown, bundles: nested };
}

// ── Internal Helpers ──────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCollection(
  data: Record<string, AttributeSet | AttributeSet[]>
): RecordCollection {
  const collection = new Map<string, AttributeSet[]>();
  for (const [id, entry] of Object.entries(data)) {
    collection.set(id, Array.isArray(entry) ? entry : [entry]);
  }
  return collection;
}

/** Turn the first Zod issue into a ParseError at the offending record */
function shapeError(kind: string, error: z.ZodError, bundles: string[]): ParseError {
  const issue = error.issues[0];
  const segments = issue?.path ?? [];
  const path: RecordPath = { bundles, kind };

  const [identifier, ...rest] = segments;
  if (identifier !== undefined) path.identifier = String(identifier);
  const field = rest.find((segment): segment is string => typeof segment === 'string');
  if (field !== undefined) path.field = field;

  return new ParseError(`Malformed '${kind}' collection: ${issue?.message ?? 'invalid shape'}`, path);
}
