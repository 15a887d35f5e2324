/**
 * Graph Assembler
 *
 * Top-level orchestration: one `@context` for the document, then the
 * graph in a fixed order (elements, relations in canonical kind order,
 * bundles in declaration order).
 */

import { ConversionResult, ConverterConfig, GraphItem, ProvDocument, RecordCollection } from './types.js';
import { WarningSink } from './errors.js';
import { buildContext } from './prefixes.js';
import { mapElements } from './elements.js';
import { mapRelations } from './relations.js';
import { claimBundles, mapBundles } from './bundles.js';
import { DEFAULT_CONVERTER_CONFIG } from './config.js';
import { MappingContext, recordPath, rootContext } from './scope.js';
import { ROLE_VOCABULARY } from './vocabulary.js';

export function assembleGraph(
  document: ProvDocument,
  config: ConverterConfig = DEFAULT_CONVERTER_CONFIG
): ConversionResult {
  const sink = new WarningSink();
  const ctx = rootContext(document, config, sink);
  const graph = buildGraph(document, ctx);

  return {
    document: {
      '@context': buildContext(document.prefixes, config),
      '@graph': graph,
    },
    warnings: sink.warnings,
  };
}

/** Convert one document or bundle into its graph items */
export function buildGraph(document: ProvDocument, ctx: MappingContext): GraphItem[] {
  skipUnknownKinds(document.unknown, ctx);

  const nodes = mapElements(document.elements, ctx);
  // Bundle identifiers are claimed before relations claim theirs
  const bundles = claimBundles(document.bundles, ctx);
  const links = mapRelations(document.relations, ctx);
  const bundleIds = new Set(bundles.map((bundle) => bundle.id));

  return [
    ...nodes.filter((node) => !bundleIds.has(node['@id'])),
    ...links,
    ...mapBundles(bundles, nodes, ctx, buildGraph),
  ];
}

/**
 * Unrecognised kinds are skipped. A kind whose records use PROV role
 * keys is reported as an unknown relation, anything else as an
 * unknown element.
 */
function skipUnknownKinds(
  unknown: ReadonlyMap<string, RecordCollection>,
  ctx: MappingContext
): void {
  for (const [kind, collection] of unknown) {
    const relationLike = [...collection.values()].some((records) =>
      records.some((attributes) => Object.keys(attributes).some((key) => ROLE_VOCABULARY.has(key)))
    );

    if (relationLike) {
      ctx.sink.add('UnknownRelationKind', `Unknown relation kind '${kind}' skipped`, recordPath(ctx, kind));
    } else {
      ctx.sink.add('UnknownElementKind', `Unknown element kind '${kind}' skipped`, recordPath(ctx, kind));
    }
  }
}
