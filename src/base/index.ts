/**
 * Base infrastructure
 *
 * Source positions, diagnostics, render configuration, and the renderer
 * interface and registry shared by every output format
 */

export * from './SourceTypes.js';
export * from './Diagnostics.js';
export * from './RenderConfig.js';
export * from './Renderer.js';
export * from './RendererRegistry.js';
