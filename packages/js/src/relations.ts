/**
 * Relation Mapper
 *
 * Converts the 14 PROV relation kinds into typed link objects. Role
 * keys are renamed through {@link RELATION_TABLE}; every other key is
 * normalized like an element attribute.
 */

import { AttributeSet, ProvNode, RawAttribute, RecordCollection, RecordPath } from './types.js';
import { ParseError } from './errors.js';
import { addAttribute, normalizeAttribute, normalizeKey } from './attributes.js';
import { MappingContext, recordPath } from './scope.js';
import {
  QUALIFIED_NAME_DATATYPES, RELATION_KINDS, RELATION_TABLE, RelationKind,
  RelationSpec, VALUE_MARKER, DATATYPE_MARKER,
} from './vocabulary.js';

/** Map every relation record of a graph, in canonical kind order */
export function mapRelations(
  relations: ReadonlyMap<RelationKind, RecordCollection>,
  ctx: MappingContext
): ProvNode[] {
  const links: ProvNode[] = [];

  for (const kind of RELATION_KINDS) {
    const collection = relations.get(kind);
    if (collection === undefined) continue;

    for (const [id, records] of collection) {
      for (const attributes of records) {
        links.push(mapRelationRecord(kind, claimIdentifier(kind, id, ctx), attributes, ctx));
      }
    }
  }

  return links;
}

/** Map one relation record to a link object with the given `@id` */
export function mapRelationRecord(
  kind: RelationKind,
  id: string,
  attributes: AttributeSet,
  ctx: MappingContext
): ProvNode {
  const spec: RelationSpec = RELATION_TABLE[kind];
  const link: ProvNode = { '@type': spec.type, '@id': id };
  const roleKeys = new Set(Object.values(spec.roles));

  // Roles first, in table order
  for (const [qualified, short] of Object.entries(spec.roles)) {
    if (!Object.hasOwn(attributes, qualified)) continue;
    link[short] = readRole(attributes[qualified], ctx, recordPath(ctx, kind, id, qualified));
  }

  for (const [key, value] of Object.entries(attributes)) {
    if (Object.hasOwn(spec.roles, key)) continue;

    const path = recordPath(ctx, kind, id, key);
    if (roleKeys.has(key)) {
      // A bare role name is not an attribute; the role interpretation wins
      ctx.sink.add(
        'UnqualifiedAttribute',
        `Attribute key '${key}' collides with role '${key}' and is ignored`,
        path
      );
      continue;
    }

    const outKey = Object.hasOwn(spec.qualifiers, key)
      ? spec.qualifiers[key]
      : normalizeKey(key, ctx, path);
    if (outKey === undefined) continue;

    addAttribute(link, outKey, normalizeAttribute(value, ctx, path));
  }

  return link;
}

/**
 * Pick the `@id` of a relation record: the record's own identifier,
 * or a synthesized blank identifier when it is empty or already used
 * in this graph.
 */
function claimIdentifier(kind: RelationKind, id: string, ctx: MappingContext): string {
  if (id.length === 0) {
    return ctx.ids.synthesize(kind);
  }

  const resolved = ctx.prefixes.resolve(id, recordPath(ctx, kind, id));
  if (!ctx.ids.has(resolved)) {
    ctx.ids.claim(resolved);
    return resolved;
  }

  const synthesized = ctx.ids.synthesize(kind);
  ctx.sink.add(
    'DuplicateIdentifier',
    `Identifier '${resolved}' is already used in this graph; emitted as '${synthesized}'`,
    recordPath(ctx, kind, id)
  );
  return synthesized;
}

/** A role value is a qualified name, optionally in typed-value form */
function readRole(value: RawAttribute, ctx: MappingContext, path: RecordPath): string {
  if (typeof value === 'string') {
    return ctx.prefixes.resolve(value, path);
  }

  if (typeof value === 'object' && !Array.isArray(value)) {
    const lexical = value[VALUE_MARKER];
    const datatype = value[DATATYPE_MARKER];
    if (
      typeof lexical === 'string' &&
      typeof datatype === 'string' &&
      QUALIFIED_NAME_DATATYPES.has(datatype)
    ) {
      return ctx.prefixes.resolve(lexical, path);
    }
  }

  throw new ParseError(`Role '${path.field}' must be a qualified name`, path);
}
