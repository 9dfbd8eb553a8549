/**
 * Renderer Registry
 *
 * Maps output formats to renderers and provides lookup by format or by
 * output file name.
 */

import type { DocumentRenderer, OutputFormat } from './Renderer.js';

export class RendererRegistry {
  private renderers = new Map<OutputFormat, DocumentRenderer>();

  /**
   * Register a renderer
   */
  register(renderer: DocumentRenderer): void {
    if (this.renderers.has(renderer.format)) {
      console.warn(`⚠️ Renderer for ${renderer.format} already registered, overwriting`);
    }
    this.renderers.set(renderer.format, renderer);
  }

  /**
   * Get renderer for a format
   */
  getRenderer(format: OutputFormat): DocumentRenderer | null {
    return this.renderers.get(format) ?? null;
  }

  /**
   * Get renderer for a format, throwing when none is registered
   */
  requireRenderer(format: OutputFormat): DocumentRenderer {
    const renderer = this.renderers.get(format);
    if (!renderer) {
      throw new Error(`No renderer registered for format: ${format}`);
    }
    return renderer;
  }

  /**
   * Get renderer whose extension matches an output file
   */
  getRendererForFile(filePath: string): DocumentRenderer | null {
    const ext = filePath.substring(filePath.lastIndexOf('.'));
    for (const renderer of this.renderers.values()) {
      if (renderer.extension === ext) {
        return renderer;
      }
    }
    return null;
  }

  /**
   * Get all registered formats
   */
  getFormats(): OutputFormat[] {
    return Array.from(this.renderers.keys());
  }

  /**
   * Get all registered renderers
   */
  getRenderers(): DocumentRenderer[] {
    return Array.from(this.renderers.values());
  }
}
