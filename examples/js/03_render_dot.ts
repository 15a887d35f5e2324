/**
 * Example 03: Rendering a Graph
 * =============================
 *
 * Renders a converted document as Graphviz DOT. Pipe the output into
 * `dot -Tpng` to get an image.
 *
 * Run: npx tsx examples/js/03_render_dot.ts > provenance.dot
 */

import { convertProvJson, toDot } from '../../packages/js/src';

const { document } = convertProvJson({
  prefix: { ex: 'http://example.org/' },
  entity: {
    'ex:raw': { 'prov:label': 'Raw measurements' },
    'ex:clean': { 'prov:label': 'Cleaned measurements', 'ex:rows': 980 },
  },
  activity: { 'ex:cleaning': {} },
  agent: { 'ex:pipeline': { 'prov:label': 'Nightly pipeline' } },
  used: { '_:u1': { 'prov:activity': 'ex:cleaning', 'prov:entity': 'ex:raw' } },
  wasGeneratedBy: {
    '_:g1': { 'prov:activity': 'ex:cleaning', 'prov:entity': 'ex:clean', 'prov:time': '2024-03-02T02:15:00Z' },
  },
  wasDerivedFrom: { '_:d1': { 'prov:generatedEntity': 'ex:clean', 'prov:usedEntity': 'ex:raw' } },
  wasAssociatedWith: { '_:a1': { 'prov:activity': 'ex:cleaning', 'prov:agent': 'ex:pipeline' } },
});

console.log(toDot(document, { showAttributes: true, direction: 'LR' }));
