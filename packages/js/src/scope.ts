/**
 * Per-graph mapping context shared by the mappers.
 */

import { ConverterConfig, ProvDocument, RecordPath } from './types.js';
import { WarningSink } from './errors.js';
import { PrefixScope } from './prefixes.js';
import { IdentifierScope } from './identifiers.js';

export interface MappingContext {
  readonly config: ConverterConfig;
  readonly prefixes: PrefixScope;
  readonly ids: IdentifierScope;
  readonly sink: WarningSink;
  /** Enclosing bundle identifiers, outermost first */
  readonly bundles: readonly string[];
}

export function rootContext(
  document: ProvDocument,
  config: ConverterConfig,
  sink: WarningSink
): MappingContext {
  return {
    config,
    prefixes: new PrefixScope(document.prefixes, config, sink),
    ids: new IdentifierScope([]),
    sink,
    bundles: [],
  };
}

/** Context for the graph of a nested bundle */
export function bundleContext(
  parent: MappingContext,
  bundleId: string,
  document: ProvDocument
): MappingContext {
  const bundles = [...parent.bundles, bundleId];
  return {
    config: parent.config,
    prefixes: parent.prefixes.child(document.prefixes),
    ids: new IdentifierScope(bundles),
    sink: parent.sink,
    bundles,
  };
}

export function recordPath(
  ctx: MappingContext,
  kind?: string,
  identifier?: string,
  field?: string
): RecordPath {
  return { bundles: [...ctx.bundles], kind, identifier, field };
}
