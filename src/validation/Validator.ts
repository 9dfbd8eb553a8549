/**
 * Validator
 *
 * Walks a built tree and reports semantic diagnostics: schema checks
 * (required keys, value kinds, enum domains) and whole-tree rules
 * (orphan pages, duplicate ids, nesting depth, page order and routes).
 *
 * Validation is pure: the tree is read, never modified, and the same tree
 * always yields the same sorted list.
 *
 * @since 2026-10-18
 */

import { createDiagnostic, sortDiagnostics } from '../base/Diagnostics.js';
import type { Diagnostic } from '../base/Diagnostics.js';
import { walkBlocks } from '../model/traverse.js';
import type { WalkContext } from '../model/traverse.js';
import { attrText, lookup } from '../model/attributes.js';
import type { AttributeValue, Block, DocumentNode, PageBlock, SiteBlock } from '../model/types.js';
import { BLOCK_SCHEMAS, UNIVERSAL_ATTRIBUTES } from '../blocks/schemas.js';
import type { AttributeSpec } from '../blocks/schemas.js';
import { orderPages, routeConflicts } from '../site/plan.js';
import { METRIC_UNITS } from './units.js';

export const MAX_NESTING_DEPTH = 6;

export interface ValidatorOptions {
  /** Deepest allowed block level; top-level blocks are level 1 */
  maxDepth?: number;
  /** Replaces the built-in metric unit vocabulary */
  units?: readonly string[];
}

function describeKind(value: AttributeValue): string {
  return value.kind === 'symbol' ? 'identifier' : value.kind;
}

function acceptsKind(spec: AttributeSpec, value: AttributeValue): boolean {
  switch (spec.type) {
    case 'string':
      return value.kind === 'string' || value.kind === 'number' || value.kind === 'symbol';
    case 'number':
      return value.kind === 'number';
    case 'boolean':
      return value.kind === 'boolean';
    case 'enum':
      return value.kind === 'string' || value.kind === 'symbol';
    case 'list':
      return value.kind === 'list' || value.kind === 'string' || value.kind === 'symbol';
  }
}

export class Validator {
  private readonly maxDepth: number;
  private readonly units: ReadonlySet<string>;

  constructor(options: ValidatorOptions = {}) {
    this.maxDepth = options.maxDepth ?? MAX_NESTING_DEPTH;
    this.units = new Set((options.units ?? METRIC_UNITS).map(unit => unit.toLowerCase()));
  }

  /**
   * Semantic diagnostics for a node list, sorted
   */
  validate(nodes: readonly DocumentNode[]): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    const ids = new Map<string, Block>();

    walkBlocks(nodes, (block, context) => {
      this.checkSchema(block, diagnostics);
      this.checkBlock(block, context, diagnostics);

      if (context.depth === this.maxDepth + 1) {
        diagnostics.push(
          createDiagnostic(
            'nesting-too-deep',
            `'${block.tag}' is nested ${context.depth} levels deep; the limit is ${this.maxDepth}`,
            block.span,
            context.parent?.span
          )
        );
      }

      const id = attrText(block.attributes, 'id');
      if (id !== undefined) {
        const first = ids.get(id);
        if (first) {
          diagnostics.push(
            createDiagnostic('duplicate-id', `Id '${id}' is already used by '${first.tag}'`, block.span, first.span)
          );
        } else {
          ids.set(id, block);
        }
      }
    });

    return sortDiagnostics(diagnostics);
  }

  private checkSchema(block: Block, diagnostics: Diagnostic[]): void {
    if (block.kind === 'unknown') return;
    const specs: Record<string, AttributeSpec> = { ...UNIVERSAL_ATTRIBUTES, ...BLOCK_SCHEMAS[block.kind].attributes };

    for (const [key, spec] of Object.entries(specs)) {
      const value = lookup(block.attributes, spec.aliases ? [key, ...spec.aliases] : [key]);
      if (value === undefined) {
        if (spec.required) {
          diagnostics.push(
            createDiagnostic(
              'required-attribute-missing',
              `'${block.tag}' is missing required attribute '${key}'`,
              block.span
            )
          );
        }
        continue;
      }

      if (!acceptsKind(spec, value)) {
        diagnostics.push(
          createDiagnostic(
            'attribute-type-mismatch',
            `Attribute '${key}' of '${block.tag}' must be ${spec.type === 'enum' ? 'one of the listed choices' : `a ${spec.type}`}, got ${describeKind(value)}`,
            block.span
          )
        );
        continue;
      }

      if (spec.type === 'enum' && spec.values && (value.kind === 'string' || value.kind === 'symbol')) {
        if (!spec.values.includes(value.value.toLowerCase())) {
          diagnostics.push(
            createDiagnostic(
              'enum-value-invalid',
              `'${value.value}' is not a valid '${key}' for '${block.tag}'; expected one of ${spec.values.join(', ')}`,
              block.span
            )
          );
        }
      }
    }
  }

  private checkBlock(block: Block, context: WalkContext, diagnostics: Diagnostic[]): void {
    switch (block.kind) {
      case 'page':
        if (context.parent?.kind !== 'site') {
          diagnostics.push(
            createDiagnostic(
              'orphan-page',
              `Page${block.route ? ` '${block.route}'` : ''} is not a direct child of a site`,
              block.span,
              context.parent?.span
            )
          );
        }
        break;
      case 'site':
        this.checkSite(block, diagnostics);
        break;
      case 'tabs':
        if (block.panels.length === 0) {
          diagnostics.push(createDiagnostic('empty-container', `'${block.tag}' has no panels`, block.span));
        }
        break;
      case 'columns':
        if (block.columns.length === 0) {
          diagnostics.push(createDiagnostic('empty-container', `'${block.tag}' has no columns`, block.span));
        }
        break;
      case 'faq':
        if (block.items.length === 0) {
          diagnostics.push(createDiagnostic('empty-container', `'${block.tag}' has no questions`, block.span));
        }
        for (const item of block.items) {
          if (item.question.trim() === '' || item.answer.trim() === '') {
            const missing = item.question.trim() === '' ? 'question' : 'answer';
            diagnostics.push(
              createDiagnostic('faq-entry-incomplete', `FAQ entry has an empty ${missing}`, item.span, block.span)
            );
          }
        }
        break;
      case 'pricing-table':
        block.rows.forEach((row, index) => {
          if (row.length !== block.headers.length) {
            diagnostics.push(
              createDiagnostic(
                'pricing-tier-mismatch',
                `Row ${index + 1} ('${row[0] ?? ''}') has ${row.length} cells; expected ${block.headers.length} (feature plus ${block.tiers.length} tiers)`,
                block.span
              )
            );
          }
        });
        break;
      case 'metric':
        if (block.unit !== undefined && !this.units.has(block.unit.toLowerCase())) {
          diagnostics.push(
            createDiagnostic('metric-unit-unknown', `Unknown metric unit '${block.unit}'`, block.span)
          );
        }
        break;
      case 'decision':
        if (
          block.status !== 'proposed' &&
          (block.outcome === undefined || (block.options.length > 0 && !block.options.includes(block.outcome)))
        ) {
          diagnostics.push(
            createDiagnostic(
              'decision-outcome-missing',
              block.outcome === undefined
                ? `Decision is ${block.status} but states no outcome`
                : `Outcome '${block.outcome}' is not one of the options: ${block.options.join(', ')}`,
              block.span
            )
          );
        }
        break;
      case 'code':
        if (block.lang === undefined || block.lang.trim() === '') {
          diagnostics.push(createDiagnostic('code-language-missing', 'Code block does not declare a language', block.span));
        }
        break;
      case 'figure':
      case 'hero-image':
        if (block.alt === undefined) {
          diagnostics.push(createDiagnostic('alt-text-missing', `'${block.tag}' has no alt text`, block.span));
        }
        break;
      case 'testimonial':
        if (block.author === undefined || block.author.trim() === '') {
          diagnostics.push(
            createDiagnostic('testimonial-author-missing', 'Testimonial has no author', block.span)
          );
        }
        break;
      default:
        break;
    }
  }

  private checkSite(site: SiteBlock, diagnostics: Diagnostic[]): void {
    const pages = site.children.filter((node): node is PageBlock => node.kind === 'page');
    if (pages.length === 0) {
      diagnostics.push(createDiagnostic('site-without-pages', 'Site contains no pages', site.span));
      return;
    }
    this.checkPageOrder(pages, diagnostics);
    for (const { page, owner, route } of routeConflicts(orderPages(pages))) {
      diagnostics.push(
        createDiagnostic(
          'page-route-conflict',
          `Route ${route} is already declared by another page; this page is left out of the site`,
          page.span,
          owner.span
        )
      );
    }
  }

  /**
   * Ties, gaps between consecutive distinct values, and values that are
   * negative or fractional
   */
  private checkPageOrder(pages: readonly PageBlock[], diagnostics: Diagnostic[]): void {
    const seen = new Map<number, PageBlock>();
    const valid: number[] = [];

    for (const page of pages) {
      if (page.order === undefined) continue;
      const order = page.order;
      if (!Number.isInteger(order) || order < 0) {
        diagnostics.push(
          createDiagnostic(
            'page-order-conflict',
            `Page order ${order} must be a non-negative whole number`,
            page.span
          )
        );
        continue;
      }
      const first = seen.get(order);
      if (first) {
        diagnostics.push(
          createDiagnostic(
            'page-order-conflict',
            `Page order ${order} is already used; document order decides`,
            page.span,
            first.span
          )
        );
        continue;
      }
      seen.set(order, page);
      valid.push(order);
    }

    valid.sort((a, b) => a - b);
    for (let i = 1; i < valid.length; i++) {
      if (valid[i] - valid[i - 1] > 1) {
        const page = seen.get(valid[i]);
        if (page) {
          diagnostics.push(
            createDiagnostic(
              'page-order-conflict',
              `Page order jumps from ${valid[i - 1]} to ${valid[i]}`,
              page.span
            )
          );
        }
      }
    }
  }
}

/**
 * Semantic diagnostics for a document tree
 */
export function validateNodes(nodes: readonly DocumentNode[], options?: ValidatorOptions): Diagnostic[] {
  return new Validator(options).validate(nodes);
}
