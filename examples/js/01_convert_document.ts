/**
 * Example 01: Converting a Document
 * ==================================
 *
 * Converts a small PROV-JSON document (a report generated by an
 * activity that a person was associated with) into PROV-JSONLD, then
 * compares the JSON and CBOR encodings of the result.
 *
 * Run: npx tsx examples/js/01_convert_document.ts
 */

import { ProvJsonLdConverter, payloadStats } from '../../packages/js/src';

const provJson = {
  prefix: { ex: 'http://example.org/', foaf: 'http://xmlns.com/foaf/0.1/' },
  entity: {
    'ex:report': {
      'prov:label': 'Quarterly report',
      'ex:pages': 12,
      'ex:checksum': { $: 'c0ffee', type: 'xsd:hexBinary' },
    },
  },
  activity: {
    'ex:compile': { 'prov:startTime': '2024-03-01T09:00:00Z', 'prov:endTime': '2024-03-01T09:45:00Z' },
  },
  agent: {
    'ex:alice': { 'foaf:name': { $: 'Alice', lang: 'en' } },
  },
  wasGeneratedBy: {
    '_:gen1': { 'prov:entity': 'ex:report', 'prov:activity': 'ex:compile', 'prov:time': '2024-03-01T09:45:00Z' },
  },
  wasAssociatedWith: {
    '_:assoc1': { 'prov:activity': 'ex:compile', 'prov:agent': 'ex:alice', 'prov:role': 'ex:author' },
  },
};

// ── 1. Convert ───────────────────────────────────────────────────

console.log('=== 1. PROV-JSONLD ===\n');

const converter = new ProvJsonLdConverter();
const { document, warnings } = converter.convert(provJson);

console.log(JSON.stringify(document, null, 2));
console.log(`\n  Warnings: ${warnings.length}`);

// ── 2. Serialization sizes ───────────────────────────────────────

console.log('\n=== 2. JSON vs CBOR ===\n');

const stats = payloadStats(document);
console.log(`  JSON: ${stats.jsonBytes} bytes`);
console.log(`  CBOR: ${stats.cborBytes} bytes (${(stats.cborRatio * 100).toFixed(1)}%)`);
