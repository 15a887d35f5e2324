/**
 * ProvJsonLdConverter: PROV-JSON to PROV-JSONLD
 *
 * Runs the conversion engine under a resolved configuration, and wraps
 * jsonld.js to expand the produced documents with an offline set of
 * context documents.
 */

import * as jsonld from 'jsonld';
import {
  ConversionResult, ConverterConfig, ConverterOptions, ProvDocument, ProvJsonLdDocument,
} from './types.js';
import { resolveConfig } from './config.js';
import { enforceDocumentSize, withTimeout } from './limits.js';
import { parseProvJson, readProvDocument } from './reader.js';
import { assembleGraph } from './assembler.js';
import { toCbor } from './cbor.js';

type JsonLdInput = Parameters<typeof jsonld.expand>[0];
type ExpandOptions = NonNullable<Parameters<typeof jsonld.expand>[1]>;
type DocumentLoader = NonNullable<ExpandOptions['documentLoader']>;
type RemoteDocument = Awaited<ReturnType<DocumentLoader>>;

export type ExpandedDocument = Awaited<ReturnType<typeof jsonld.expand>>;

/** Context documents by URL, served to jsonld.js without network access */
export type ContextDocuments = Readonly<Record<string, object>>;

export type SerializationFormat = 'json' | 'cbor';

export class ProvJsonLdConverter {
  readonly config: ConverterConfig;

  constructor(options: ConverterOptions = {}) {
    this.config = resolveConfig(options);
  }

  /**
   * Convert a PROV-JSON document, given as JSON text or as a parsed value.
   *
   * @throws ParseError, PrefixResolutionError or ResourceLimitError
   */
  convert(input: unknown): ConversionResult {
    const document = this.read(input);
    return assembleGraph(document, this.config);
  }

  /**
   * Expand a converted document with jsonld.js.
   *
   * Remote contexts are only served from `contexts`; any other URL is
   * rejected. Enforces the configured expansion timeout.
   */
  async expand(
    document: ProvJsonLdDocument,
    contexts: ContextDocuments
  ): Promise<ExpandedDocument> {
    enforceDocumentSize(document, this.config.resourceLimits);

    const documentLoader = async (url: string): Promise<RemoteDocument> => {
      if (!Object.hasOwn(contexts, url)) {
        throw new Error(`Context not available offline: ${url}`);
      }
      const context: RemoteDocument['document'] = JSON.parse(JSON.stringify(contexts[url]));
      return { documentUrl: url, document: context };
    };

    // jsonld.js receives a plain copy, detached from the caller's document
    const input: JsonLdInput = JSON.parse(JSON.stringify(document));
    return withTimeout(
      jsonld.expand(input, { documentLoader }),
      this.config.resourceLimits.maxExpansionTime,
      'expansion'
    );
  }

  /** Serialize a converted document as JSON text or CBOR bytes */
  serialize(document: ProvJsonLdDocument, format: 'json'): string;
  serialize(document: ProvJsonLdDocument, format: 'cbor'): Buffer;
  serialize(document: ProvJsonLdDocument, format: SerializationFormat): string | Buffer;
  serialize(document: ProvJsonLdDocument, format: SerializationFormat): string | Buffer {
    return format === 'cbor' ? toCbor(document) : JSON.stringify(document);
  }

  // ── Internal ──────────────────────────────────────────────────

  private read(input: unknown): ProvDocument {
    if (typeof input === 'string') {
      enforceDocumentSize(input, this.config.resourceLimits);
      return parseProvJson(input);
    }
    if (input !== null && typeof input === 'object') {
      enforceDocumentSize(input, this.config.resourceLimits);
    }
    return readProvDocument(input);
  }
}

/**
 * Convert a PROV-JSON document with the given options.
 *
 * @example
 * ```ts
 * const { document, warnings } = convertProvJson({
 *   prefix: { ex: 'http://example.org/' },
 *   entity: { 'ex:e1': {} },
 * });
 * // document['@graph'] → [{ '@type': 'prov:Entity', '@id': 'ex:e1' }]
 * ```
 */
export function convertProvJson(input: unknown, options: ConverterOptions = {}): ConversionResult {
  return new ProvJsonLdConverter(options).convert(input);
}
