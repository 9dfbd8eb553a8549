/**
 * Attribute schemas for the typed block variants
 *
 * The builder reads defaults and aliases from here; the validator checks
 * required keys, value kinds and enum domains against the same table.
 *
 * @since 2026-10-18
 */

import type { CalloutType, DataFormat, DecisionStatus, Trend, TypedBlockKind } from '../model/types.js';

export type AttributeType = 'string' | 'number' | 'boolean' | 'enum' | 'list';

/**
 * How a block's body is interpreted
 */
export type ContentPolicy =
  | 'none'
  | 'leaf'
  | 'verbatim'
  | 'tasks'
  | 'table'
  | 'properties'
  | 'questions'
  | 'panels'
  | 'columns'
  | 'nested';

export interface AttributeSpec {
  type: AttributeType;
  required?: boolean;
  /** Accepted values for `enum` */
  values?: readonly string[];
  /** Alternative spellings, checked after the canonical key */
  aliases?: readonly string[];
}

export interface BlockSchema {
  attributes: Readonly<Record<string, AttributeSpec>>;
  content: ContentPolicy;
}

export const CALLOUT_TYPES: readonly CalloutType[] = ['info', 'warning', 'danger', 'tip', 'note', 'success'];
export const DATA_FORMATS: readonly DataFormat[] = ['table', 'csv', 'json'];
export const DECISION_STATUSES: readonly DecisionStatus[] = ['proposed', 'accepted', 'rejected', 'superseded'];
export const TRENDS: readonly Trend[] = ['up', 'down', 'flat'];

/** Accepted by every block; checked for uniqueness across the document */
export const UNIVERSAL_ATTRIBUTES: Readonly<Record<string, AttributeSpec>> = {
  id: { type: 'string' },
};

export const BLOCK_SCHEMAS: Readonly<Record<TypedBlockKind, BlockSchema>> = {
  callout: {
    attributes: {
      type: { type: 'enum', required: true, values: CALLOUT_TYPES },
      title: { type: 'string' },
    },
    content: 'leaf',
  },
  data: {
    attributes: {
      format: { type: 'enum', values: DATA_FORMATS },
      sortable: { type: 'boolean' },
    },
    content: 'table',
  },
  code: {
    attributes: {
      lang: { type: 'string' },
      file: { type: 'string' },
      highlight: { type: 'list' },
    },
    content: 'verbatim',
  },
  tasks: { attributes: {}, content: 'tasks' },
  decision: {
    attributes: {
      status: { type: 'enum', values: DECISION_STATUSES },
      date: { type: 'string' },
      deciders: { type: 'list' },
      options: { type: 'list' },
      outcome: { type: 'string' },
    },
    content: 'leaf',
  },
  metric: {
    attributes: {
      label: { type: 'string', required: true },
      value: { type: 'number', required: true },
      unit: { type: 'string' },
      trend: { type: 'enum', values: TRENDS },
    },
    content: 'none',
  },
  summary: { attributes: {}, content: 'leaf' },
  figure: {
    attributes: {
      src: { type: 'string', required: true },
      alt: { type: 'string' },
      caption: { type: 'string' },
      width: { type: 'string' },
    },
    content: 'none',
  },
  tabs: { attributes: {}, content: 'panels' },
  columns: { attributes: {}, content: 'columns' },
  quote: {
    attributes: {
      attribution: { type: 'string', aliases: ['by', 'author'] },
      cite: { type: 'string', aliases: ['source'] },
    },
    content: 'leaf',
  },
  cta: {
    attributes: {
      label: { type: 'string', required: true },
      href: { type: 'string', required: true },
      primary: { type: 'boolean' },
      icon: { type: 'string' },
    },
    content: 'none',
  },
  'hero-image': {
    attributes: {
      src: { type: 'string', required: true },
      alt: { type: 'string' },
    },
    content: 'none',
  },
  testimonial: {
    attributes: {
      author: { type: 'string', aliases: ['name'] },
      role: { type: 'string', aliases: ['title'] },
      company: { type: 'string', aliases: ['org'] },
    },
    content: 'leaf',
  },
  style: { attributes: {}, content: 'properties' },
  faq: { attributes: {}, content: 'questions' },
  'pricing-table': { attributes: {}, content: 'table' },
  site: {
    attributes: {
      domain: { type: 'string' },
      name: { type: 'string' },
    },
    content: 'nested',
  },
  page: {
    attributes: {
      route: { type: 'string' },
      title: { type: 'string' },
      layout: { type: 'string' },
      sidebar: { type: 'boolean' },
      order: { type: 'number' },
    },
    content: 'nested',
  },
};

const TYPED_KINDS = new Set<string>(Object.keys(BLOCK_SCHEMAS));

export function isTypedKind(name: string): name is TypedBlockKind {
  return TYPED_KINDS.has(name);
}

/**
 * Canonical key followed by its aliases
 */
export function keysFor(kind: TypedBlockKind, key: string): string[] {
  const spec = BLOCK_SCHEMAS[kind].attributes[key];
  return spec?.aliases ? [key, ...spec.aliases] : [key];
}
