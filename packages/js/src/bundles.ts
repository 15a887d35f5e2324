/**
 * Bundle Recursor
 *
 * Each bundle is converted by the full pipeline in its own identifier
 * scope and emitted as a nested named graph; its nodes never leak into
 * the parent graph.
 *
 * A bundle's identifier belongs to the enclosing graph. An element
 * record with the same identifier describes the bundle and is folded
 * into the named graph object.
 */

import { GraphItem, JsonLdAttribute, NamedGraph, ProvDocument, ProvNode } from './types.js';
import { ResourceLimitError } from './errors.js';
import { buildContext } from './prefixes.js';
import { MappingContext, bundleContext, recordPath } from './scope.js';
import { BUNDLE_TYPE, KEY_BUNDLE } from './vocabulary.js';

/** Converts one document (root or bundle) into its graph items */
export type GraphBuilder = (document: ProvDocument, ctx: MappingContext) => GraphItem[];

/** A bundle whose identifier has been resolved and claimed */
export interface ClaimedBundle {
  id: string;
  document: ProvDocument;
}

/**
 * Resolve each bundle identifier and claim it in the enclosing graph,
 * so that later relation records cannot reuse it.
 */
export function claimBundles(
  bundles: ReadonlyMap<string, ProvDocument>,
  ctx: MappingContext
): ClaimedBundle[] {
  const claimed: ClaimedBundle[] = [];

  for (const [id, document] of bundles) {
    const path = recordPath(ctx, KEY_BUNDLE, id);
    const maxDepth = ctx.config.resourceLimits.maxBundleDepth;
    if (ctx.bundles.length + 1 > maxDepth) {
      throw new ResourceLimitError(`Bundle nesting exceeds limit of ${maxDepth}`, path);
    }

    const resolved = ctx.prefixes.resolve(id, path);
    ctx.ids.claim(resolved);
    claimed.push({ id: resolved, document });
  }

  return claimed;
}

/**
 * Build the named graph of each claimed bundle. `descriptions` are the
 * element nodes of the enclosing graph; one whose `@id` matches a bundle
 * is merged into it.
 */
export function mapBundles(
  bundles: readonly ClaimedBundle[],
  descriptions: readonly ProvNode[],
  ctx: MappingContext,
  buildGraph: GraphBuilder
): NamedGraph[] {
  const described = new Map(descriptions.map((node) => [node['@id'], node]));

  return bundles.map(({ id, document }) => {
    const description = described.get(id);
    const types = typesOf(description, ctx.config.typedBundles);

    return {
      '@id': id,
      ...(types.length === 1 ? { '@type': types[0] } : {}),
      ...(types.length > 1 ? { '@type': types } : {}),
      ...(document.prefixes !== undefined ? { '@context': buildContext(document.prefixes, ctx.config) } : {}),
      ...attributesOf(description),
      '@graph': buildGraph(document, bundleContext(ctx, id, document)),
    };
  });
}

function typesOf(description: ProvNode | undefined, typed: boolean): string[] {
  const types: string[] = [];
  if (description !== undefined) {
    const type = description['@type'];
    types.push(...(Array.isArray(type) ? type : [type]));
  }
  if (typed && !types.includes(BUNDLE_TYPE)) {
    types.push(BUNDLE_TYPE);
  }
  return types;
}

function attributesOf(description: ProvNode | undefined): Record<string, JsonLdAttribute> {
  const attributes: Record<string, JsonLdAttribute> = {};
  if (description === undefined) return attributes;

  for (const [key, value] of Object.entries(description)) {
    if (!key.startsWith('@')) attributes[key] = value;
  }
  return attributes;
}
