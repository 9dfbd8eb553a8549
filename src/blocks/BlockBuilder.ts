/**
 * Block Builder
 *
 * Turns scanned directives into typed blocks. Routing is on the
 * lower-cased tag; unrecognised tags become `unknown` blocks that keep
 * the header and body verbatim.
 *
 * The builder never rejects a directive. Missing or ill-typed attributes
 * fall back to defaults and are reported later by the validator.
 * Containers scan their body again from the body's start position, so
 * nested nodes carry document-absolute spans.
 *
 * @since 2026-10-18
 */

import { ORIGIN, splitLines } from '../base/SourceTypes.js';
import type { SourceLine, SourcePosition, SourceSpan } from '../base/SourceTypes.js';
import type { Diagnostic } from '../base/Diagnostics.js';
import { DirectiveScanner } from '../scanner/DirectiveScanner.js';
import type { ScanSegment, ScannedDirective } from '../scanner/types.js';
import { attrChoice, attrFlag, attrList, attrNumber, attrText } from '../model/attributes.js';
import type {
  AttributeMap,
  Block,
  Column,
  ColumnsBlock,
  DataBlock,
  DocumentNode,
  FaqBlock,
  FaqItem,
  PageBlock,
  PricingTableBlock,
  ProseNode,
  SiteBlock,
  StyleProperty,
  TabPanel,
  TabsBlock,
  TypedBlockKind,
} from '../model/types.js';
import { CALLOUT_TYPES, DATA_FORMATS, DECISION_STATUSES, TRENDS, isTypedKind, keysFor } from './schemas.js';
import { parseCsv, parseJsonTable, parsePipeTable, parsePropertyLine, parseProperties, parseTaskItems } from './content.js';
import { headingMarker, ruleMarker, sectionSpan, sectionText, splitSections } from './sections.js';

export interface BuildResult {
  nodes: DocumentNode[];
  diagnostics: Diagnostic[];
}

interface BlockFields {
  tag: string;
  attributes: AttributeMap;
  rawBody: string;
  span: SourceSpan;
}

function coverSpan(segments: readonly ScanSegment[]): SourceSpan {
  return { start: segments[0].span.start, end: segments[segments.length - 1].span.end };
}

export class BlockBuilder {
  constructor(private readonly scanner: DirectiveScanner = new DirectiveScanner()) {}

  /**
   * Scan and build a fragment of SurfDoc text
   *
   * @param base - Position of the first character of `text` in the document
   */
  build(text: string, base: SourcePosition = ORIGIN): BuildResult {
    const diagnostics: Diagnostic[] = [];
    const nodes = this.buildText(text, base, diagnostics);
    return { nodes, diagnostics };
  }

  buildSegments(segments: readonly ScanSegment[], diagnostics: Diagnostic[]): DocumentNode[] {
    return segments.map(segment =>
      segment.kind === 'prose'
        ? this.proseNode(segment.text, segment.span)
        : this.buildBlock(segment, diagnostics)
    );
  }

  buildBlock(directive: ScannedDirective, diagnostics: Diagnostic[]): Block {
    const fields: BlockFields = {
      tag: directive.tag,
      attributes: directive.attributes,
      rawBody: directive.body,
      span: directive.span,
    };
    const name = directive.name;
    if (!isTypedKind(name)) {
      return {
        kind: 'unknown',
        ...fields,
        fence: directive.fence,
        rawAttributes: directive.rawAttributes,
        rawText: directive.rawText,
      };
    }
    return this.buildTyped(name, directive, fields, diagnostics);
  }

  private buildTyped(
    kind: TypedBlockKind,
    directive: ScannedDirective,
    fields: BlockFields,
    diagnostics: Diagnostic[]
  ): Block {
    const attrs = directive.attributes;
    const body = directive.body;

    switch (kind) {
      case 'callout':
        return {
          kind,
          ...fields,
          calloutType: attrChoice(attrs, 'type', CALLOUT_TYPES) ?? 'info',
          title: attrText(attrs, 'title'),
          body,
        };
      case 'data':
        return this.buildData(fields, body);
      case 'code':
        return {
          kind,
          ...fields,
          lang: attrText(attrs, 'lang'),
          file: attrText(attrs, 'file'),
          highlight: attrList(attrs, 'highlight'),
          body,
        };
      case 'tasks':
        return { kind, ...fields, items: parseTaskItems(body) };
      case 'decision':
        return {
          kind,
          ...fields,
          status: attrChoice(attrs, 'status', DECISION_STATUSES) ?? 'proposed',
          date: attrText(attrs, 'date'),
          deciders: attrList(attrs, 'deciders'),
          options: attrList(attrs, 'options'),
          outcome: attrText(attrs, 'outcome'),
          body,
        };
      case 'metric':
        return {
          kind,
          ...fields,
          label: attrText(attrs, 'label') ?? '',
          value: attrNumber(attrs, 'value'),
          displayValue: attrText(attrs, 'value') ?? '',
          unit: attrText(attrs, 'unit'),
          trend: attrChoice(attrs, 'trend', TRENDS),
        };
      case 'summary':
        return { kind, ...fields, body };
      case 'figure':
        return {
          kind,
          ...fields,
          src: attrText(attrs, 'src') ?? '',
          alt: attrText(attrs, 'alt'),
          caption: attrText(attrs, 'caption'),
          width: attrText(attrs, 'width'),
        };
      case 'tabs':
        return this.buildTabs(directive, fields, diagnostics);
      case 'columns':
        return this.buildColumns(directive, fields, diagnostics);
      case 'quote':
        return {
          kind,
          ...fields,
          body,
          attribution: attrText(attrs, ...keysFor(kind, 'attribution')),
          cite: attrText(attrs, ...keysFor(kind, 'cite')),
        };
      case 'cta':
        return {
          kind,
          ...fields,
          label: attrText(attrs, 'label') ?? '',
          href: attrText(attrs, 'href') ?? '',
          primary: attrFlag(attrs, 'primary'),
          icon: attrText(attrs, 'icon'),
        };
      case 'hero-image':
        return {
          kind,
          ...fields,
          src: attrText(attrs, 'src') ?? '',
          alt: attrText(attrs, 'alt'),
        };
      case 'testimonial':
        return {
          kind,
          ...fields,
          body,
          author: attrText(attrs, ...keysFor(kind, 'author')),
          role: attrText(attrs, ...keysFor(kind, 'role')),
          company: attrText(attrs, ...keysFor(kind, 'company')),
        };
      case 'style':
        return { kind, ...fields, properties: parseProperties(body) };
      case 'faq':
        return this.buildFaq(directive, fields);
      case 'pricing-table':
        return this.buildPricing(fields, body);
      case 'site':
        return this.buildSite(directive, fields, diagnostics);
      case 'page':
        return this.buildPage(directive, fields, diagnostics);
    }
  }

  private buildText(text: string, base: SourcePosition, diagnostics: Diagnostic[]): DocumentNode[] {
    const scan = this.scanner.scan(text, base);
    diagnostics.push(...scan.diagnostics);
    return this.buildSegments(scan.segments, diagnostics);
  }

  private buildData(fields: BlockFields, body: string): DataBlock {
    const format = attrChoice(fields.attributes, 'format', DATA_FORMATS) ?? 'table';
    const table =
      format === 'csv' ? parseCsv(body) : format === 'json' ? parseJsonTable(body) : parsePipeTable(body);
    return {
      kind: 'data',
      ...fields,
      format,
      sortable: attrFlag(fields.attributes, 'sortable'),
      headers: table.headers,
      rows: table.rows,
    };
  }

  /**
   * Panels come from `:::tab[label=…]` directives when present, otherwise
   * from `##`/`###` headings. Content before the first tab or heading
   * becomes a panel of its own.
   */
  private buildTabs(directive: ScannedDirective, fields: BlockFields, diagnostics: Diagnostic[]): TabsBlock {
    const scan = this.scanner.scan(directive.body, directive.bodyStart);
    const panels: TabPanel[] = [];
    const defaultLabel = (): string => `Tab ${panels.length + 1}`;

    if (scan.segments.some(segment => segment.kind === 'directive' && segment.name === 'tab')) {
      diagnostics.push(...scan.diagnostics);
      let loose: ScanSegment[] = [];
      const flushLoose = (): void => {
        if (loose.length === 0) return;
        panels.push({
          label: defaultLabel(),
          children: this.buildSegments(loose, diagnostics),
          span: coverSpan(loose),
        });
        loose = [];
      };

      for (const segment of scan.segments) {
        if (segment.kind === 'directive' && segment.name === 'tab') {
          flushLoose();
          panels.push({
            label: attrText(segment.attributes, 'label', 'title') ?? defaultLabel(),
            children: this.buildText(segment.body, segment.bodyStart, diagnostics),
            span: segment.span,
          });
        } else {
          loose.push(segment);
        }
      }
      flushLoose();
    } else {
      const sections = splitSections(splitLines(directive.body, directive.bodyStart), headingMarker);
      for (const section of sections) {
        const content = sectionText(section.lines);
        if (section.marker === null && !content) continue;
        panels.push({
          label: section.marker ?? defaultLabel(),
          children: content ? this.buildText(content.text, content.start, diagnostics) : [],
          span: sectionSpan(section, directive.bodyStart),
        });
      }
    }

    return { kind: 'tabs', ...fields, panels };
  }

  /**
   * Columns come from `:::column` directives when present, otherwise from
   * `---` lines. A body without separators is a single column.
   */
  private buildColumns(directive: ScannedDirective, fields: BlockFields, diagnostics: Diagnostic[]): ColumnsBlock {
    const scan = this.scanner.scan(directive.body, directive.bodyStart);
    const columns: Column[] = [];

    if (scan.segments.some(segment => segment.kind === 'directive' && segment.name === 'column')) {
      diagnostics.push(...scan.diagnostics);
      let loose: ScanSegment[] = [];
      const flushLoose = (): void => {
        if (loose.length === 0) return;
        columns.push({ children: this.buildSegments(loose, diagnostics), span: coverSpan(loose) });
        loose = [];
      };

      for (const segment of scan.segments) {
        if (segment.kind === 'directive' && segment.name === 'column') {
          flushLoose();
          columns.push({
            children: this.buildText(segment.body, segment.bodyStart, diagnostics),
            span: segment.span,
          });
        } else {
          loose.push(segment);
        }
      }
      flushLoose();
    } else {
      const sections = splitSections(splitLines(directive.body, directive.bodyStart), ruleMarker);
      for (const section of sections) {
        const content = sectionText(section.lines);
        if (!content) continue;
        columns.push({
          children: this.buildText(content.text, content.start, diagnostics),
          span: content.span,
        });
      }
    }

    return { kind: 'columns', ...fields, columns };
  }

  /**
   * Questions are `###` or `##` headings; text before the first heading
   * becomes an entry without a question.
   */
  private buildFaq(directive: ScannedDirective, fields: BlockFields): FaqBlock {
    const sections = splitSections(splitLines(directive.body, directive.bodyStart), headingMarker);
    const items: FaqItem[] = [];
    for (const section of sections) {
      const content = sectionText(section.lines);
      if (section.marker === null && !content) continue;
      items.push({
        question: section.marker ?? '',
        answer: content?.text ?? '',
        span: sectionSpan(section, directive.bodyStart),
      });
    }
    return { kind: 'faq', ...fields, items };
  }

  /**
   * First column holds feature names, every other header names a tier
   */
  private buildPricing(fields: BlockFields, body: string): PricingTableBlock {
    const { headers, rows } = parsePipeTable(body);
    const tiers = headers.slice(1).map((name, index) => ({
      name,
      features: rows.filter(row => row.length > index + 1).map(row => row[index + 1]),
    }));
    return { kind: 'pricing-table', ...fields, headers, rows, tiers };
  }

  /**
   * `key: value` lines in the site body are configuration; everything
   * else (pages, other blocks, remaining prose) becomes a child.
   */
  private buildSite(directive: ScannedDirective, fields: BlockFields, diagnostics: Diagnostic[]): SiteBlock {
    const scan = this.scanner.scan(directive.body, directive.bodyStart);
    diagnostics.push(...scan.diagnostics);

    const properties: StyleProperty[] = [];
    const children: DocumentNode[] = [];

    for (const segment of scan.segments) {
      if (segment.kind === 'directive') {
        children.push(this.buildBlock(segment, diagnostics));
        continue;
      }
      let run: SourceLine[] = [];
      const flushRun = (): void => {
        const content = sectionText(run);
        if (content) children.push(this.proseNode(content.text, content.span));
        run = [];
      };
      for (const line of splitLines(segment.text, segment.span.start)) {
        const property = parsePropertyLine(line.text);
        if (property) {
          flushRun();
          properties.push(property);
        } else {
          run.push(line);
        }
      }
      flushRun();
    }

    return {
      kind: 'site',
      ...fields,
      domain: attrText(fields.attributes, 'domain'),
      name: attrText(fields.attributes, 'name'),
      properties,
      children,
    };
  }

  private buildPage(directive: ScannedDirective, fields: BlockFields, diagnostics: Diagnostic[]): PageBlock {
    const attrs = fields.attributes;
    return {
      kind: 'page',
      ...fields,
      route: attrText(attrs, 'route'),
      title: attrText(attrs, 'title'),
      layout: attrText(attrs, 'layout'),
      sidebar: attrFlag(attrs, 'sidebar'),
      order: attrNumber(attrs, 'order'),
      children: this.buildText(directive.body, directive.bodyStart, diagnostics),
    };
  }

  private proseNode(text: string, span: SourceSpan): ProseNode {
    return { kind: 'prose', text, span };
  }
}
