/**
 * Example 02: Bundles and Warnings
 * ================================
 *
 * Bundles become nested named graphs with their own identifier scope.
 * Recoverable problems (malformed values, unqualified keys, unknown
 * kinds) are reported as warnings; undeclared prefixes abort the
 * conversion unless prefixes are lenient.
 *
 * Run: npx tsx examples/js/02_bundles_and_warnings.ts
 */

import { ConversionError, convertProvJson } from '../../packages/js/src';

const provJson = {
  prefix: { ex: 'http://example.org/' },
  entity: { 'ex:dataset': { size: 42, 'ex:rows': { type: 'xsd:int' } } },
  wasSomethingElse: { '_:x1': { 'prov:entity': 'ex:dataset' } },
  bundle: {
    'ex:run1': {
      prefix: { run: 'http://example.org/runs/1/' },
      entity: { 'run:output': {} },
      wasGeneratedBy: { '': { 'prov:entity': 'run:output' } },
    },
  },
};

// ── 1. Named graphs ──────────────────────────────────────────────

console.log('=== 1. Bundles ===\n');

const { document, warnings } = convertProvJson(provJson, { typedBundles: true });
console.log(JSON.stringify(document['@graph'], null, 2));

// ── 2. Warnings ──────────────────────────────────────────────────

console.log('\n=== 2. Warnings ===\n');

for (const warning of warnings) {
  console.log(`  ${warning.code} at ${warning.path}: ${warning.message}`);
}

// ── 3. Strict and lenient prefixes ───────────────────────────────

console.log('\n=== 3. Undeclared Prefixes ===\n');

const undeclared = { entity: { 'foaf:alice': {} } };

try {
  convertProvJson(undeclared);
} catch (e) {
  if (!(e instanceof ConversionError)) throw e;
  console.log(`  Strict: ${e.name}: ${e.message}`);
}

const lenient = convertProvJson(undeclared, { strictPrefixes: false });
console.log(`  Lenient: ${lenient.warnings.map((w) => w.code).join(', ')}`);
