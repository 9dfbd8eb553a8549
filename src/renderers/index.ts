/**
 * Output renderers
 *
 * HTML, degraded markdown and ANSI terminal text, plus a registry
 * pre-populated with all three.
 *
 * @since 2026-10-18
 */

import { RendererRegistry } from '../base/RendererRegistry.js';
import type { OutputFormat } from '../base/Renderer.js';
import type { RenderConfigInput } from '../base/RenderConfig.js';
import type { SurfDocument } from '../model/types.js';
import { HtmlRenderer } from './HtmlRenderer.js';
import { MarkdownRenderer } from './MarkdownRenderer.js';
import { AnsiRenderer } from './AnsiRenderer.js';

export { HtmlRenderer, GENERATOR, highlightedLines } from './HtmlRenderer.js';
export { MarkdownRenderer, pipeTable } from './MarkdownRenderer.js';
export { AnsiRenderer, boxTable } from './AnsiRenderer.js';
export type { Colors } from './AnsiRenderer.js';
export {
  buildStylesheet,
  collectStyleOverrides,
  applyStyleProperties,
  resolveFontPreset,
  styleElement,
} from './stylesheet.js';
export type { StyleOverrides, Theme } from './stylesheet.js';

/**
 * Registry holding one renderer per built-in format
 */
export function createDefaultRenderers(): RendererRegistry {
  const registry = new RendererRegistry();
  registry.register(new HtmlRenderer());
  registry.register(new MarkdownRenderer());
  registry.register(new AnsiRenderer());
  return registry;
}

/** Shared registry with the built-in renderers */
export const defaultRenderers = createDefaultRenderers();

/**
 * Render a document with the default renderer for `format`
 */
export function renderDocument(document: SurfDocument, format: OutputFormat, config?: RenderConfigInput): string {
  return defaultRenderers.requireRenderer(format).render(document, config);
}
