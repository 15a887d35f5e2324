/**
 * @prov-jsonld/core: PROV-JSON to PROV-JSONLD
 *
 * Converts provenance graphs serialized in PROV-JSON into PROV-JSONLD
 * documents, with CBOR serialization and DOT export of the result.
 */

// Converter facade
export { ProvJsonLdConverter, convertProvJson } from './converter.js';
export type { ContextDocuments, ExpandedDocument, SerializationFormat } from './converter.js';

// Types, errors and configuration
export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './vocabulary.js';

// Engine
export { parseProvJson, readProvDocument } from './reader.js';
export { assembleGraph } from './assembler.js';
export { buildContext, parseQualifiedName, PrefixScope } from './prefixes.js';
export { synthesizeBlankId, BLANK_ID_NAMESPACE } from './identifiers.js';
export { enforceDocumentSize, withTimeout } from './limits.js';

// Serialization and export
export * from './cbor.js';
export * from './schemas.js';
export * from './viz/dot.js';
export { Logger } from './logger.js';
