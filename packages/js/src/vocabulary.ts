/**
 * PROV Vocabulary and Dispatch Tables
 *
 * Fixed mapping from PROV-JSON record kinds to their PROV-JSONLD
 * types, and from qualified role keys to the JSON-LD short keys
 * defined by the canonical PROV-JSONLD context.
 */

// ── Canonical Context ─────────────────────────────────────────────
/** Remote PROV-JSONLD context, always the last `@context` entry */
export const PROV_JSONLD_CONTEXT = 'https://openprovenance.org/prov-jsonld/context.json';
/** PROV namespace IRI */
export const PROV_NAMESPACE = 'http://www.w3.org/ns/prov#';
/** XML Schema datatypes namespace IRI */
export const XSD_NAMESPACE = 'http://www.w3.org/2001/XMLSchema#';

/** Prefixes every PROV-JSON document may use without declaring them */
export const PREDECLARED_PREFIXES = ['prov', 'xsd'] as const;

// ── PROV-JSON Document Keys ───────────────────────────────────────
export const KEY_PREFIX = 'prefix';
export const KEY_BUNDLE = 'bundle';
/** PROV-JSON prefix key naming the default namespace */
export const DEFAULT_PREFIX = 'default';
/** Prefix of blank identifiers */
export const BLANK_PREFIX = '_';
/** `@type` of a bundle graph when bundles are typed */
export const BUNDLE_TYPE = 'prov:Bundle';

// Typed-value markers
export const VALUE_MARKER = '$';
export const DATATYPE_MARKER = 'type';
export const LANGUAGE_MARKER = 'lang';

/** Datatypes whose lexical form is itself a qualified name */
export const QUALIFIED_NAME_DATATYPES: ReadonlySet<string> = new Set([
  'prov:QUALIFIED_NAME',
  'xsd:QName',
]);

// ── Element Kinds ─────────────────────────────────────────────────

export const ELEMENT_KINDS = ['entity', 'activity', 'agent'] as const;
export type ElementKind = typeof ELEMENT_KINDS[number];

export type ElementType = 'prov:Entity' | 'prov:Activity' | 'prov:Agent';

export interface ElementSpec {
  type: ElementType;
  /** Qualified attribute keys rewritten to context short keys */
  renames: Readonly<Record<string, string>>;
}

export const ELEMENT_TABLE = {
  entity: { type: 'prov:Entity', renames: {} },
  activity: {
    type: 'prov:Activity',
    renames: { 'prov:startTime': 'startTime', 'prov:endTime': 'endTime' },
  },
  agent: { type: 'prov:Agent', renames: {} },
} as const satisfies Record<ElementKind, ElementSpec>;

// ── Relation Kinds ────────────────────────────────────────────────

/** The 14 relation kinds, in canonical emission order */
export const RELATION_KINDS = [
  'wasGeneratedBy',
  'used',
  'wasInformedBy',
  'wasStartedBy',
  'wasEndedBy',
  'wasInvalidatedBy',
  'wasDerivedFrom',
  'wasAttributedTo',
  'wasAssociatedWith',
  'actedOnBehalfOf',
  'wasInfluencedBy',
  'specializationOf',
  'alternateOf',
  'hadMember',
] as const;
export type RelationKind = typeof RELATION_KINDS[number];

export type RelationType =
  | 'prov:Generation' | 'prov:Usage' | 'prov:Communication'
  | 'prov:Start' | 'prov:End' | 'prov:Invalidation'
  | 'prov:Derivation' | 'prov:Attribution' | 'prov:Association'
  | 'prov:Delegation' | 'prov:Influence'
  | 'provext:Specialization' | 'provext:Alternate' | 'provext:Membership';

export interface RelationSpec {
  type: RelationType;
  /** Qualified role key → short key; role values reference other nodes */
  roles: Readonly<Record<string, string>>;
  /** Qualified qualifier key → short key; values are literals */
  qualifiers: Readonly<Record<string, string>>;
}

const TIME = { 'prov:time': 'time' } as const;
const NONE = {} as const;

export const RELATION_TABLE = {
  wasGeneratedBy: {
    type: 'prov:Generation',
    roles: { 'prov:entity': 'entity', 'prov:activity': 'activity' },
    qualifiers: TIME,
  },
  used: {
    type: 'prov:Usage',
    roles: { 'prov:entity': 'entity', 'prov:activity': 'activity' },
    qualifiers: TIME,
  },
  wasInformedBy: {
    type: 'prov:Communication',
    roles: { 'prov:informed': 'informed', 'prov:informant': 'informant' },
    qualifiers: NONE,
  },
  wasStartedBy: {
    type: 'prov:Start',
    roles: { 'prov:activity': 'activity', 'prov:trigger': 'trigger', 'prov:starter': 'starter' },
    qualifiers: TIME,
  },
  wasEndedBy: {
    type: 'prov:End',
    roles: { 'prov:activity': 'activity', 'prov:trigger': 'trigger', 'prov:ender': 'ender' },
    qualifiers: TIME,
  },
  wasInvalidatedBy: {
    type: 'prov:Invalidation',
    roles: { 'prov:entity': 'entity', 'prov:activity': 'activity' },
    qualifiers: TIME,
  },
  wasDerivedFrom: {
    type: 'prov:Derivation',
    roles: {
      'prov:generatedEntity': 'generatedEntity',
      'prov:usedEntity': 'usedEntity',
      'prov:activity': 'activity',
      'prov:generation': 'generation',
      'prov:usage': 'usage',
    },
    qualifiers: NONE,
  },
  wasAttributedTo: {
    type: 'prov:Attribution',
    roles: { 'prov:entity': 'entity', 'prov:agent': 'agent' },
    qualifiers: NONE,
  },
  wasAssociatedWith: {
    type: 'prov:Association',
    roles: { 'prov:activity': 'activity', 'prov:agent': 'agent', 'prov:plan': 'plan' },
    qualifiers: NONE,
  },
  actedOnBehalfOf: {
    type: 'prov:Delegation',
    roles: { 'prov:delegate': 'delegate', 'prov:responsible': 'responsible', 'prov:activity': 'activity' },
    qualifiers: NONE,
  },
  wasInfluencedBy: {
    type: 'prov:Influence',
    roles: { 'prov:influencee': 'influencee', 'prov:influencer': 'influencer' },
    qualifiers: NONE,
  },
  specializationOf: {
    type: 'provext:Specialization',
    roles: { 'prov:specificEntity': 'specificEntity', 'prov:generalEntity': 'generalEntity' },
    qualifiers: NONE,
  },
  alternateOf: {
    type: 'provext:Alternate',
    roles: { 'prov:alternate1': 'alternate1', 'prov:alternate2': 'alternate2' },
    qualifiers: NONE,
  },
  hadMember: {
    type: 'provext:Membership',
    roles: { 'prov:collection': 'collection', 'prov:entity': 'entity' },
    qualifiers: NONE,
  },
} as const satisfies Record<RelationKind, RelationSpec>;

/** Every qualified role key used by any relation kind */
export const ROLE_VOCABULARY: ReadonlySet<string> = new Set(
  RELATION_KINDS.flatMap((kind) => Object.keys(RELATION_TABLE[kind].roles))
);

/** Every short role key emitted on link objects */
export const SHORT_ROLE_KEYS: ReadonlySet<string> = new Set(
  RELATION_KINDS.flatMap((kind) => Object.values(RELATION_TABLE[kind].roles))
);

export function isElementKind(kind: string): kind is ElementKind {
  return ELEMENT_KINDS.some((known) => known === kind);
}

export function isRelationKind(kind: string): kind is RelationKind {
  return RELATION_KINDS.some((known) => known === kind);
}
