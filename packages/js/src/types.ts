/**
 * Core type definitions for the PROV-JSON → PROV-JSONLD converter
 */

import { ElementKind, RelationKind } from './vocabulary.js';

// ── PROV-JSON Input ───────────────────────────────────────────────

export type Scalar = string | number | boolean;

/** An attribute value as it appears in PROV-JSON, before normalization */
export type RawValue = Scalar | Record<string, unknown>;
export type RawAttribute = RawValue | RawValue[];

/** The attribute set of a single record, keyed by qualified name */
export type AttributeSet = Record<string, RawAttribute>;

/**
 * Records of one kind, keyed by identifier. Several records sharing an
 * identifier are kept in declaration order.
 */
export type RecordCollection = ReadonlyMap<string, readonly AttributeSet[]>;

/** A PROV-JSON document or bundle, after shape validation */
export interface ProvDocument {
  /** Declared prefixes; `undefined` when the scope inherits its parent's */
  prefixes: Readonly<Record<string, string>> | undefined;
  elements: ReadonlyMap<ElementKind, RecordCollection>;
  relations: ReadonlyMap<RelationKind, RecordCollection>;
  /** Top-level kinds outside the PROV vocabulary */
  unknown: ReadonlyMap<string, RecordCollection>;
  bundles: ReadonlyMap<string, ProvDocument>;
}

// ── PROV-JSONLD Output ────────────────────────────────────────────

export interface TypedLiteral {
  '@value': Scalar;
  '@type': string;
}

export interface LanguageString {
  '@value': string;
  '@language': string;
}

export type JsonLdValue = Scalar | null | TypedLiteral | LanguageString;
export type JsonLdAttribute = JsonLdValue | JsonLdValue[];

/** Node object (element) or link object (relation) */
export interface ProvNode {
  '@type': string | string[];
  '@id': string;
  [key: string]: JsonLdAttribute;
}

export type ContextEntry = Record<string, string> | string;

/**
 * A bundle, emitted as a nested named graph. An element sharing the
 * bundle's identifier contributes its `@type` and attributes.
 */
export interface NamedGraph {
  '@id': string;
  '@type'?: string | string[];
  '@context'?: ContextEntry[];
  '@graph': GraphItem[];
  [key: string]: JsonLdAttribute | ContextEntry[] | GraphItem[] | undefined;
}

export type GraphItem = ProvNode | NamedGraph;

export interface ProvJsonLdDocument {
  '@context': ContextEntry[];
  '@graph': GraphItem[];
}

export function isNamedGraph(item: GraphItem): item is NamedGraph {
  return Array.isArray(item['@graph']);
}

// ── Errors & Warnings ─────────────────────────────────────────────

/** Location of a record inside a (possibly nested) document */
export interface RecordPath {
  /** Enclosing bundle identifiers, outermost first */
  bundles: string[];
  kind?: string;
  identifier?: string;
  field?: string;
}

export type WarningCode =
  | 'MalformedAttribute'
  | 'UnknownRelationKind'
  | 'UnknownElementKind'
  | 'UnqualifiedAttribute'
  | 'DuplicateIdentifier'
  | 'UnresolvedPrefix';

export interface ConversionWarning {
  code: WarningCode;
  path: string;
  message: string;
}

export interface ConversionResult {
  document: ProvJsonLdDocument;
  warnings: ConversionWarning[];
}

// ── Configuration ─────────────────────────────────────────────────

export interface ResourceLimits {
  /** Maximum input size in bytes (default: 10MB) */
  maxDocumentSize?: number;
  /** Maximum bundle nesting depth (default: 8) */
  maxBundleDepth?: number;
  /** Expansion timeout in milliseconds (default: 30000) */
  maxExpansionTime?: number;
}

/** User-facing converter options, all optional */
export interface ConverterOptions {
  contextUrl?: string;
  predeclaredPrefixes?: string[];
  /** Unresolved prefixes abort the conversion (default: true) */
  strictPrefixes?: boolean;
  /** Emit `@type: prov:Bundle` on bundle graphs (default: false) */
  typedBundles?: boolean;
  resourceLimits?: ResourceLimits;
}

/** Immutable, fully-resolved configuration passed through the engine */
export interface ConverterConfig {
  readonly contextUrl: string;
  readonly predeclaredPrefixes: readonly string[];
  readonly strictPrefixes: boolean;
  readonly typedBundles: boolean;
  readonly resourceLimits: Readonly<Required<ResourceLimits>>;
}
