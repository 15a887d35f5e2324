/**
 * Prefix Resolver
 *
 * Builds the output `@context` of a scope and checks qualified names
 * against the scope's prefix table.
 */

import { ContextEntry, ConverterConfig, RecordPath } from './types.js';
import { PrefixResolutionError, WarningSink } from './errors.js';
import { BLANK_PREFIX, DEFAULT_PREFIX } from './vocabulary.js';

// ── Qualified Names ───────────────────────────────────────────────

export type QualifiedName =
  | { form: 'blank'; local: string }
  | { form: 'iri' }
  | { form: 'prefixed'; prefix: string; local: string }
  | { form: 'default'; local: string };

/**
 * Classify a PROV qualified name.
 *
 * `scheme://…` strings are absolute IRIs and need no prefix; names
 * without a colon fall back to the `default` namespace.
 */
export function parseQualifiedName(name: string): QualifiedName {
  const colon = name.indexOf(':');
  if (colon < 0) {
    return { form: 'default', local: name };
  }

  const prefix = name.slice(0, colon);
  const local = name.slice(colon + 1);

  if (prefix === BLANK_PREFIX) return { form: 'blank', local };
  if (local.startsWith('//')) return { form: 'iri' };
  return { form: 'prefixed', prefix, local };
}

/** True when a key is a qualified name (has a prefix or is an IRI) */
export function isQualifiedKey(key: string): boolean {
  return parseQualifiedName(key).form !== 'default';
}

// ── Context ───────────────────────────────────────────────────────

/**
 * Build the `@context` array: the local prefix object (when any prefix
 * is declared), followed by the canonical context URL.
 *
 * The `default` namespace becomes `@base`, against which JSON-LD
 * resolves the unprefixed identifiers left in the output.
 */
export function buildContext(
  prefixes: Readonly<Record<string, string>> | undefined,
  config: ConverterConfig
): ContextEntry[] {
  const context: ContextEntry[] = [];
  if (prefixes !== undefined && Object.keys(prefixes).length > 0) {
    const local: Record<string, string> = {};
    for (const [prefix, namespace] of Object.entries(prefixes)) {
      local[prefix === DEFAULT_PREFIX ? '@base' : prefix] = namespace;
    }
    context.push(local);
  }
  context.push(config.contextUrl);
  return context;
}

// ── Scope ─────────────────────────────────────────────────────────

export class PrefixScope {
  private readonly table: ReadonlyMap<string, string>;

  constructor(
    prefixes: Readonly<Record<string, string>> | undefined,
    private readonly config: ConverterConfig,
    private readonly sink: WarningSink
  ) {
    this.table = new Map(Object.entries(prefixes ?? {}));
  }

  /**
   * Scope for a nested bundle. A bundle declaring its own prefixes gets
   * a fresh table; one that declares none shares this one.
   */
  child(prefixes: Readonly<Record<string, string>> | undefined): PrefixScope {
    if (prefixes === undefined) return this;
    return new PrefixScope(prefixes, this.config, this.sink);
  }

  has(prefix: string): boolean {
    return this.table.has(prefix) || this.config.predeclaredPrefixes.includes(prefix);
  }

  /**
   * Check that a qualified name resolves in this scope and return it
   * unchanged.
   *
   * @throws PrefixResolutionError when the prefix is unknown and the
   * configuration is strict; otherwise an `UnresolvedPrefix` warning
   * is recorded
   */
  resolve(name: string, path: RecordPath): string {
    const parsed = parseQualifiedName(name);
    if (parsed.form === 'blank' || parsed.form === 'iri') return name;

    const prefix = parsed.form === 'prefixed' ? parsed.prefix : DEFAULT_PREFIX;
    if (this.has(prefix)) return name;

    const error = new PrefixResolutionError(prefix, name, path);
    if (this.config.strictPrefixes) throw error;
    this.sink.recover('UnresolvedPrefix', error);
    return name;
  }
}
