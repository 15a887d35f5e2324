/**
 * Element Mapper
 *
 * Converts `entity`, `activity` and `agent` records into JSON-LD node
 * objects, in kind order and then declaration order.
 */

import { AttributeSet, ProvNode, RecordCollection } from './types.js';
import { ParseError } from './errors.js';
import { addAttribute, normalizeAttribute, normalizeKey } from './attributes.js';
import { MappingContext, recordPath } from './scope.js';
import { ELEMENT_KINDS, ELEMENT_TABLE, ElementKind, ElementSpec } from './vocabulary.js';

/**
 * Map every element record of a graph.
 *
 * An identifier declared more than once (several records, or under
 * several element kinds) yields a single node whose `@type` lists each
 * kind and whose attributes accumulate.
 */
export function mapElements(
  elements: ReadonlyMap<ElementKind, RecordCollection>,
  ctx: MappingContext
): ProvNode[] {
  const nodes = new Map<string, ProvNode>();

  for (const kind of ELEMENT_KINDS) {
    const collection = elements.get(kind);
    if (collection === undefined) continue;

    for (const [id, records] of collection) {
      if (id.length === 0) {
        throw new ParseError('Element identifier must not be empty', recordPath(ctx, kind, id));
      }
      const resolved = ctx.prefixes.resolve(id, recordPath(ctx, kind, id));

      for (const attributes of records) {
        const existing = nodes.get(resolved);
        if (existing === undefined) {
          nodes.set(resolved, mapElementRecord(kind, resolved, attributes, ctx));
          ctx.ids.claim(resolved);
        } else {
          mergeElementRecord(existing, kind, attributes, ctx);
        }
      }
    }
  }

  return [...nodes.values()];
}

/** Map one element record to a node object */
export function mapElementRecord(
  kind: ElementKind,
  id: string,
  attributes: AttributeSet,
  ctx: MappingContext
): ProvNode {
  const spec: ElementSpec = ELEMENT_TABLE[kind];
  const node: ProvNode = { '@type': spec.type, '@id': id };
  copyAttributes(node, kind, id, attributes, ctx);
  return node;
}

function mergeElementRecord(
  node: ProvNode,
  kind: ElementKind,
  attributes: AttributeSet,
  ctx: MappingContext
): void {
  const type = ELEMENT_TABLE[kind].type;
  const types = Array.isArray(node['@type']) ? node['@type'] : [node['@type']];
  if (!types.includes(type)) {
    node['@type'] = [...types, type];
  }
  copyAttributes(node, kind, node['@id'], attributes, ctx);
}

function copyAttributes(
  node: ProvNode,
  kind: ElementKind,
  id: string,
  attributes: AttributeSet,
  ctx: MappingContext
): void {
  const spec: ElementSpec = ELEMENT_TABLE[kind];

  for (const [key, value] of Object.entries(attributes)) {
    const path = recordPath(ctx, kind, id, key);
    const outKey = Object.hasOwn(spec.renames, key)
      ? spec.renames[key]
      : normalizeKey(key, ctx, path);
    if (outKey === undefined) continue;

    addAttribute(node, outKey, normalizeAttribute(value, ctx, path));
  }
}
