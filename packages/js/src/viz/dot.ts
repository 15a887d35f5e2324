/**
 * DOT Export
 *
 * Renders a PROV-JSONLD graph as Graphviz DOT text. Elements become
 * nodes, each relation becomes one edge between its two endpoint roles,
 * and bundles become clusters.
 *
 * @example
 * ```ts
 * const { document } = convertProvJson(provJson);
 * fs.writeFileSync('graph.dot', toDot(document, { showAttributes: true }));
 * ```
 */

import {
  ContextEntry, GraphItem, JsonLdAttribute, JsonLdValue, NamedGraph, ProvJsonLdDocument,
  ProvNode, isNamedGraph,
} from '../types.js';
import { ElementType, RelationType, SHORT_ROLE_KEYS } from '../vocabulary.js';

// ── Types ─────────────────────────────────────────────────────────

export type RankDirection = 'LR' | 'TB';

export interface DotOptions {
  /** List node attributes under the label (default: false) */
  showAttributes?: boolean;
  /** Graphviz `rankdir` (default: LR) */
  direction?: RankDirection;
}

interface NodeStyle {
  shape: string;
  fillcolor: string;
}

interface EdgeStyle {
  label: string;
  style: 'solid' | 'dashed' | 'dotted';
  dir: 'forward' | 'back' | 'none';
  color?: string;
  arrowhead?: string;
  /** Short role keys of the edge's source and target */
  endpoints: readonly [string, string];
}

// ── Styles ────────────────────────────────────────────────────────

export const NODE_STYLES: Readonly<Record<ElementType, NodeStyle>> = {
  'prov:Entity': { shape: 'ellipse', fillcolor: '#FFFC87' },
  'prov:Activity': { shape: 'box', fillcolor: '#9FB1FC' },
  'prov:Agent': { shape: 'house', fillcolor: '#FDB266' },
};

export const EDGE_STYLES: Readonly<Record<RelationType, EdgeStyle>> = {
  'prov:Generation': {
    label: 'wasGeneratedBy', style: 'solid', dir: 'back', color: '#006400',
    endpoints: ['activity', 'entity'],
  },
  'prov:Usage': {
    label: 'used', style: 'solid', dir: 'forward', color: '#8b0101',
    endpoints: ['activity', 'entity'],
  },
  'prov:Derivation': {
    label: 'wasDerivedFrom', style: 'solid', dir: 'back',
    endpoints: ['usedEntity', 'generatedEntity'],
  },
  'prov:Association': {
    label: 'wasAssociatedWith', style: 'solid', dir: 'forward', color: '#fed37f',
    endpoints: ['activity', 'agent'],
  },
  'prov:Attribution': {
    label: 'wasAttributedTo', style: 'dashed', dir: 'back',
    endpoints: ['entity', 'agent'],
  },
  'prov:Communication': {
    label: 'wasInformedBy', style: 'solid', dir: 'back',
    endpoints: ['informant', 'informed'],
  },
  'prov:Delegation': {
    label: 'actedOnBehalfOf', style: 'dashed', dir: 'back',
    endpoints: ['responsible', 'delegate'],
  },
  'prov:Start': {
    label: 'wasStartedBy', style: 'solid', dir: 'back',
    endpoints: ['trigger', 'activity'],
  },
  'prov:End': {
    label: 'wasEndedBy', style: 'solid', dir: 'back',
    endpoints: ['trigger', 'activity'],
  },
  'prov:Invalidation': {
    label: 'wasInvalidatedBy', style: 'solid', dir: 'back',
    endpoints: ['activity', 'entity'],
  },
  'prov:Influence': {
    label: 'wasInfluencedBy', style: 'dotted', dir: 'back',
    endpoints: ['influencer', 'influencee'],
  },
  'provext:Specialization': {
    label: 'specializationOf', style: 'solid', dir: 'back', arrowhead: 'onormal',
    endpoints: ['generalEntity', 'specificEntity'],
  },
  'provext:Alternate': {
    label: 'alternateOf', style: 'dashed', dir: 'none',
    endpoints: ['alternate1', 'alternate2'],
  },
  'provext:Membership': {
    label: 'hadMember', style: 'dotted', dir: 'forward',
    endpoints: ['collection', 'entity'],
  },
};

const LABEL_KEYS = ['prov:label', 'rdfs:label', 'foaf:name', 'dcterms:title', 'name', 'title'];
const MAX_ATTRIBUTES = 5;
const MAX_VALUES_PER_KEY = 3;
const MAX_VALUE_LENGTH = 30;

// ── Rendering ─────────────────────────────────────────────────────

/**
 * Render a PROV-JSONLD document as a DOT digraph.
 */
export function toDot(document: ProvJsonLdDocument, options: DotOptions = {}): string {
  const renderer = new DotRenderer(
    options.showAttributes ?? false,
    namespacesOf(document['@context'])
  );

  const lines = [
    'digraph PROV {',
    `  rankdir=${options.direction ?? 'LR'};`,
    '  node [fontname="Helvetica"];',
    '  edge [fontname="Helvetica"];',
    '',
    ...renderer.graph(document['@graph'], '  '),
    '}',
  ];
  return lines.join('\n');
}

class DotRenderer {
  private clusters = 0;

  constructor(
    private readonly showAttributes: boolean,
    private readonly namespaces: ReadonlyMap<string, string>
  ) {}

  /** Nodes, a blank line, edges, then one cluster per bundle */
  graph(items: GraphItem[], indent: string): string[] {
    const nodes: string[] = [];
    const edges: string[] = [];
    const bundles: NamedGraph[] = [];

    for (const item of items) {
      if (isNamedGraph(item)) {
        bundles.push(item);
        continue;
      }
      const style = nodeStyleOf(item);
      if (style !== undefined) {
        nodes.push(indent + this.node(item, style));
        continue;
      }
      const edge = this.edge(item);
      if (edge !== undefined) edges.push(indent + edge);
    }

    const lines = [...nodes, '', ...edges];
    for (const bundle of bundles) {
      lines.push(...this.cluster(bundle, indent));
    }
    return lines;
  }

  private cluster(bundle: NamedGraph, indent: string): string[] {
    const inner = indent + '  ';
    return [
      `${indent}subgraph cluster_${this.clusters++} {`,
      `${inner}label="${escapeLabel(bundle['@id'])}";`,
      `${inner}style=dashed;`,
      ...this.graph(bundle['@graph'], inner).filter((line) => line !== ''),
      `${indent}}`,
    ];
  }

  private node(node: ProvNode, style: NodeStyle): string {
    const label = [labelOf(node)];
    if (this.showAttributes) {
      label.push(...this.attributeLines(node).slice(0, MAX_ATTRIBUTES));
    }

    const props = [
      `label="${joinLabel(label)}"`,
      `shape="${style.shape}"`,
      `fillcolor="${style.fillcolor}"`,
      'style="filled"',
    ];
    return `${safeId(node['@id'])} [${props.join(', ')}];`;
  }

  private edge(link: ProvNode): string | undefined {
    const type = link['@type'];
    if (typeof type !== 'string' || !isRelationType(type)) return undefined;

    const style = EDGE_STYLES[type];
    const source = referenceOf(link[style.endpoints[0]]);
    const target = referenceOf(link[style.endpoints[1]]);
    if (source === undefined || target === undefined) return undefined;

    const extra: string[] = [];
    const role = firstText(link['prov:role']);
    if (role !== undefined) extra.push(`role:${role}`);
    const time = firstText(link['time']);
    if (time !== undefined && time.includes('T')) {
      extra.push(`@${time.split('T')[1].split('.')[0]}`);
    }
    const label = extra.length > 0 ? [style.label, `(${extra.join(', ')})`] : [style.label];

    const props = [`label="${joinLabel(label)}"`, `style=${style.style}`, `dir=${style.dir}`];
    if (style.color !== undefined) props.push(`color="${style.color}"`);
    props.push(`arrowhead=${style.arrowhead ?? 'normal'}`);

    return `${safeId(source)} -> ${safeId(target)} [${props.join(', ')}];`;
  }

  private attributeLines(node: ProvNode): string[] {
    const lines: string[] = [];

    for (const [key, value] of Object.entries(node)) {
      if (key.startsWith('@') || LABEL_KEYS.includes(key) || SHORT_ROLE_KEYS.has(key)) continue;

      const shortKey = this.shorten(key);
      for (const item of toList(value).slice(0, MAX_VALUES_PER_KEY)) {
        const text = textOf(item);
        if (text !== undefined) lines.push(`${shortKey}=${truncate(text)}`);
      }
    }

    return lines;
  }

  /** Compact an absolute IRI key against the document's prefixes */
  private shorten(key: string): string {
    if (!key.startsWith('http://') && !key.startsWith('https://')) return key;
    for (const [prefix, namespace] of this.namespaces) {
      if (key.startsWith(namespace)) return `${prefix}:${key.slice(namespace.length)}`;
    }
    return key;
  }
}

// ── Internal Helpers ──────────────────────────────────────────────

function namespacesOf(context: ContextEntry[]): Map<string, string> {
  const namespaces = new Map<string, string>();
  for (const entry of context) {
    if (typeof entry === 'string') continue;
    for (const [prefix, namespace] of Object.entries(entry)) {
      if (!prefix.startsWith('@')) namespaces.set(prefix, namespace);
    }
  }
  return namespaces;
}

function nodeStyleOf(node: ProvNode): NodeStyle | undefined {
  const types = Array.isArray(node['@type']) ? node['@type'] : [node['@type']];
  const type = types.find(isElementType);
  return type === undefined ? undefined : NODE_STYLES[type];
}

function isElementType(type: string): type is ElementType {
  return Object.hasOwn(NODE_STYLES, type);
}

function isRelationType(type: string): type is RelationType {
  return Object.hasOwn(EDGE_STYLES, type);
}

function labelOf(node: ProvNode): string {
  for (const key of LABEL_KEYS) {
    const label = firstText(node[key]);
    if (label !== undefined) return label;
  }

  const id = node['@id'];
  if (id.length === 0) return 'anonymous';
  const colon = id.indexOf(':');
  return colon === -1 ? id : id.slice(colon + 1);
}

function toList(value: JsonLdAttribute | undefined): JsonLdValue[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(value: JsonLdValue): string | undefined {
  if (value === null) return undefined;
  if (typeof value === 'object') return String(value['@value']);
  return String(value);
}

function firstText(value: JsonLdAttribute | undefined): string | undefined {
  const [first] = toList(value);
  return first === undefined ? undefined : textOf(first);
}

/** Role values are emitted as plain identifier strings */
function referenceOf(value: JsonLdAttribute | undefined): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function truncate(text: string): string {
  return text.length > MAX_VALUE_LENGTH ? `${text.slice(0, MAX_VALUE_LENGTH - 3)}...` : text;
}

function escapeLabel(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/** Escape each line, then join them with DOT `\n` line breaks */
function joinLabel(lines: string[]): string {
  return lines.map(escapeLabel).join('\\n');
}

const DOT_KEYWORDS: ReadonlySet<string> = new Set(['node', 'edge', 'graph', 'digraph', 'subgraph', 'strict']);

/** The id itself when it is a valid bare DOT identifier, else a quoted string */
export function safeId(id: string): string {
  const bare = /^[A-Za-z_][A-Za-z0-9_]*$/.test(id) && !DOT_KEYWORDS.has(id.toLowerCase());
  return bare ? id : `"${escapeLabel(id)}"`;
}
