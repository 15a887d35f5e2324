/**
 * Attribute Normalizer
 *
 * Converts PROV-JSON attribute values into JSON-LD values:
 *
 * | PROV-JSON                     | JSON-LD                                 |
 * |-------------------------------|-----------------------------------------|
 * | `"text"`, `42`, `true`        | unchanged                               |
 * | `{ "$": "12.5", "type": T }`  | `{ "@value": "12.5", "@type": T }`      |
 * | `{ "$": "hi", "lang": "en" }` | `{ "@value": "hi", "@language": "en" }` |
 * | `[v1, v2]`                    | `[norm(v1), norm(v2)]`                  |
 *
 * Malformed composite values are recovered as plain scalars and
 * reported as `MalformedAttribute` warnings.
 */

import {
  JsonLdAttribute, JsonLdValue, ProvNode, RawAttribute, RawValue,
  RecordPath, Scalar,
} from './types.js';
import { MalformedAttributeError } from './errors.js';
import { isQualifiedKey } from './prefixes.js';
import { MappingContext } from './scope.js';
import {
  DATATYPE_MARKER, LANGUAGE_MARKER, QUALIFIED_NAME_DATATYPES, VALUE_MARKER,
} from './vocabulary.js';

export function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Normalize a single attribute value, or each value of an array.
 */
export function normalizeAttribute(
  value: RawAttribute,
  ctx: MappingContext,
  path: RecordPath
): JsonLdAttribute {
  if (Array.isArray(value)) {
    return value.map((item) => normalizeValue(item, ctx, path));
  }
  return normalizeValue(value, ctx, path);
}

export function normalizeValue(
  value: RawValue,
  ctx: MappingContext,
  path: RecordPath
): JsonLdValue {
  if (isScalar(value)) return value;

  try {
    return readComposite(value, ctx, path);
  } catch (error) {
    if (error instanceof MalformedAttributeError) {
      ctx.sink.recover('MalformedAttribute', error);
      return bestEffortScalar(value);
    }
    throw error;
  }
}

/**
 * Resolve an attribute key in the active scope.
 *
 * Returns `undefined` for unqualified keys, which are dropped with an
 * `UnqualifiedAttribute` warning.
 */
export function normalizeKey(
  key: string,
  ctx: MappingContext,
  path: RecordPath
): string | undefined {
  if (!isQualifiedKey(key)) {
    ctx.sink.add('UnqualifiedAttribute', `Attribute key '${key}' is not a qualified name`, path);
    return undefined;
  }
  return ctx.prefixes.resolve(key, path);
}

/**
 * Set an attribute on a node; a key that is already present accumulates
 * its values into an array.
 */
export function addAttribute(node: ProvNode, key: string, value: JsonLdAttribute): void {
  const existing = node[key];
  if (existing === undefined) {
    node[key] = value;
    return;
  }
  node[key] = [...toArray(existing), ...toArray(value)];
}

// ── Internal Helpers ──────────────────────────────────────────────

function readComposite(
  value: Record<string, unknown>,
  ctx: MappingContext,
  path: RecordPath
): JsonLdValue {
  const hasValue = Object.hasOwn(value, VALUE_MARKER);
  const hasType = Object.hasOwn(value, DATATYPE_MARKER);
  const hasLang = Object.hasOwn(value, LANGUAGE_MARKER);

  if (!hasValue && !hasType && !hasLang) {
    throw new MalformedAttributeError(
      `Composite value carries none of '${VALUE_MARKER}', '${DATATYPE_MARKER}', '${LANGUAGE_MARKER}'`,
      path
    );
  }
  if (!hasValue) {
    throw new MalformedAttributeError(`Typed value is missing its literal form '${VALUE_MARKER}'`, path);
  }

  const lexical = value[VALUE_MARKER];
  if (!isScalar(lexical)) {
    throw new MalformedAttributeError(
      `Literal form '${VALUE_MARKER}' must be a string, number or boolean`,
      path
    );
  }
  if (hasType && hasLang) {
    throw new MalformedAttributeError('Value carries both a datatype and a language tag', path);
  }

  if (hasLang) {
    const language = value[LANGUAGE_MARKER];
    if (typeof language !== 'string' || language.length === 0) {
      throw new MalformedAttributeError('Language tag must be a non-empty string', path);
    }
    if (typeof lexical !== 'string') {
      throw new MalformedAttributeError('Language-tagged value must be a string', path);
    }
    return { '@value': lexical, '@language': language };
  }

  if (hasType) {
    const datatype = value[DATATYPE_MARKER];
    if (typeof datatype !== 'string' || datatype.length === 0) {
      throw new MalformedAttributeError('Datatype must be a non-empty string', path);
    }
    const resolved = ctx.prefixes.resolve(datatype, path);
    if (QUALIFIED_NAME_DATATYPES.has(resolved) && typeof lexical === 'string') {
      ctx.prefixes.resolve(lexical, path);
    }
    return { '@value': lexical, '@type': resolved };
  }

  // `{ "$": v }` with no marker is a plain literal
  return lexical;
}

function bestEffortScalar(value: Record<string, unknown>): Scalar | null {
  const lexical = value[VALUE_MARKER];
  return isScalar(lexical) ? lexical : null;
}

function toArray(value: JsonLdAttribute): JsonLdValue[] {
  return Array.isArray(value) ? value : [value];
}
