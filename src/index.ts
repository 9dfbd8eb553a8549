/**
 * surfdoc
 *
 * Parser, validator and renderers for SurfDoc, a markdown superset with
 * typed `::directive` blocks
 *
 * ## Recommended API (use these):
 * - parse, SurfDocParser - Text to validated document tree
 * - renderDocument, HtmlRenderer, MarkdownRenderer, AnsiRenderer - Output
 * - assembleSite - Multi-page sites from a `::site` block
 * - extractFrontMatter - Leading YAML block to a string map
 *
 * ## Model Types:
 * - SurfDocument, DocumentNode, Block and the block variants from './model'
 */

// =============================================================================
// PUBLIC API - Recommended for external use
// =============================================================================

// Base infrastructure (positions, diagnostics, configuration, renderer contract)
export * from './base/index.js';

// Document model
export * from './model/index.js';

// Parsing
export * from './parser/index.js';

// Rendering
export * from './renderers/index.js';
export * from './site/index.js';

// Markdown collaborators
export * from './markdown/index.js';

// =============================================================================
// INTERNAL API - Pipeline stages, exported for tooling
// =============================================================================

export * from './scanner/index.js';
export * from './attributes/index.js';
export * from './blocks/index.js';
export * from './validation/index.js';
