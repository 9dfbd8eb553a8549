/**
 * Types for the SurfDoc document tree
 *
 * A document is an ordered list of prose nodes and typed blocks.
 * `Block` is a closed union on `kind`: renderers and the validator
 * switch over it exhaustively.
 *
 * @since 2026-10-18
 */

import type { SourceSpan } from '../base/SourceTypes.js';
import type { Diagnostic } from '../base/Diagnostics.js';

// =============================================================================
// Attributes
// =============================================================================

export type AttributeValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'symbol'; value: string }
  | { kind: 'list'; value: string[] };

export type AttributeKind = AttributeValue['kind'];

/**
 * Attribute name to value, in source order. Keys are unique.
 */
export type AttributeMap = ReadonlyMap<string, AttributeValue>;

// =============================================================================
// Nodes
// =============================================================================

/**
 * Markdown text between directives, handed to the prose engine as-is
 */
export interface ProseNode {
  readonly kind: 'prose';
  readonly text: string;
  readonly span: SourceSpan;
}

interface BlockBase {
  /** Tag as written in the source (case preserved) */
  readonly tag: string;
  readonly attributes: AttributeMap;
  /** Verbatim text between the header line and the closing fence */
  readonly rawBody: string;
  readonly span: SourceSpan;
}

export type CalloutType = 'info' | 'warning' | 'danger' | 'tip' | 'note' | 'success';
export type DataFormat = 'table' | 'csv' | 'json';
export type DecisionStatus = 'proposed' | 'accepted' | 'rejected' | 'superseded';
export type Trend = 'up' | 'down' | 'flat';

export interface CalloutBlock extends BlockBase {
  readonly kind: 'callout';
  readonly calloutType: CalloutType;
  readonly title?: string;
  readonly body: string;
}

export interface DataBlock extends BlockBase {
  readonly kind: 'data';
  readonly format: DataFormat;
  readonly sortable: boolean;
  readonly headers: string[];
  readonly rows: string[][];
}

export interface CodeBlock extends BlockBase {
  readonly kind: 'code';
  readonly lang?: string;
  readonly file?: string;
  readonly highlight: string[];
  readonly body: string;
}

export interface TaskItem {
  readonly done: boolean;
  readonly text: string;
  readonly assignee?: string;
}

export interface TasksBlock extends BlockBase {
  readonly kind: 'tasks';
  readonly items: TaskItem[];
}

export interface DecisionBlock extends BlockBase {
  readonly kind: 'decision';
  readonly status: DecisionStatus;
  readonly date?: string;
  readonly deciders: string[];
  readonly options: string[];
  readonly outcome?: string;
  readonly body: string;
}

export interface MetricBlock extends BlockBase {
  readonly kind: 'metric';
  readonly label: string;
  /** Present only when the `value` attribute is numeric */
  readonly value?: number;
  /** Value text as written, shown by renderers even when not numeric */
  readonly displayValue: string;
  readonly unit?: string;
  readonly trend?: Trend;
}

export interface SummaryBlock extends BlockBase {
  readonly kind: 'summary';
  readonly body: string;
}

export interface FigureBlock extends BlockBase {
  readonly kind: 'figure';
  readonly src: string;
  readonly alt?: string;
  readonly caption?: string;
  readonly width?: string;
}

export interface TabPanel {
  readonly label: string;
  readonly children: DocumentNode[];
  readonly span: SourceSpan;
}

export interface TabsBlock extends BlockBase {
  readonly kind: 'tabs';
  readonly panels: TabPanel[];
}

export interface Column {
  readonly children: DocumentNode[];
  readonly span: SourceSpan;
}

export interface ColumnsBlock extends BlockBase {
  readonly kind: 'columns';
  readonly columns: Column[];
}

export interface QuoteBlock extends BlockBase {
  readonly kind: 'quote';
  readonly body: string;
  readonly attribution?: string;
  readonly cite?: string;
}

export interface CtaBlock extends BlockBase {
  readonly kind: 'cta';
  readonly label: string;
  readonly href: string;
  readonly primary: boolean;
  readonly icon?: string;
}

export interface HeroImageBlock extends BlockBase {
  readonly kind: 'hero-image';
  readonly src: string;
  readonly alt?: string;
}

export interface TestimonialBlock extends BlockBase {
  readonly kind: 'testimonial';
  readonly body: string;
  readonly author?: string;
  readonly role?: string;
  readonly company?: string;
}

export interface StyleProperty {
  readonly key: string;
  readonly value: string;
}

export interface StyleBlock extends BlockBase {
  readonly kind: 'style';
  readonly properties: StyleProperty[];
}

export interface FaqItem {
  readonly question: string;
  readonly answer: string;
  readonly span: SourceSpan;
}

export interface FaqBlock extends BlockBase {
  readonly kind: 'faq';
  readonly items: FaqItem[];
}

export interface PricingTier {
  readonly name: string;
  /** One entry per feature row; shorter than the row count when cells are missing */
  readonly features: string[];
}

export interface PricingTableBlock extends BlockBase {
  readonly kind: 'pricing-table';
  readonly headers: string[];
  readonly rows: string[][];
  readonly tiers: PricingTier[];
}

export interface SiteBlock extends BlockBase {
  readonly kind: 'site';
  readonly domain?: string;
  readonly name?: string;
  readonly properties: StyleProperty[];
  readonly children: DocumentNode[];
}

export interface PageBlock extends BlockBase {
  readonly kind: 'page';
  readonly route?: string;
  readonly title?: string;
  readonly layout?: string;
  readonly sidebar: boolean;
  readonly order?: number;
  readonly children: DocumentNode[];
}

/**
 * Passthrough for unrecognised tags. Tag, header text and body are
 * kept byte-for-byte so the directive can be re-emitted unchanged.
 */
export interface UnknownBlock extends BlockBase {
  readonly kind: 'unknown';
  /** Colon fence of the header line, e.g. `::` or `:::` */
  readonly fence: string;
  /** Header text after the tag, e.g. `[a=1, b="x"]` */
  readonly rawAttributes: string;
  /** The whole directive from its header line through its closing line */
  readonly rawText: string;
}

export type Block =
  | CalloutBlock
  | DataBlock
  | CodeBlock
  | TasksBlock
  | DecisionBlock
  | MetricBlock
  | SummaryBlock
  | FigureBlock
  | TabsBlock
  | ColumnsBlock
  | QuoteBlock
  | CtaBlock
  | HeroImageBlock
  | TestimonialBlock
  | StyleBlock
  | FaqBlock
  | PricingTableBlock
  | SiteBlock
  | PageBlock
  | UnknownBlock;

export type BlockKind = Block['kind'];
export type TypedBlockKind = Exclude<BlockKind, 'unknown'>;

export type DocumentNode = ProseNode | Block;

// =============================================================================
// Document
// =============================================================================

export interface SurfDocument {
  readonly nodes: readonly DocumentNode[];
  /** Externally supplied front matter */
  readonly frontMatter?: Readonly<Record<string, string>>;
  /** Lexical diagnostics recorded while scanning */
  readonly parseDiagnostics: readonly Diagnostic[];
  /** Lexical and validation diagnostics, sorted */
  readonly diagnostics: readonly Diagnostic[];
  /** CRLF-normalised source text */
  readonly source: string;
  /** Content hash (sha256, 16 hex chars) */
  readonly hash: string;
}
