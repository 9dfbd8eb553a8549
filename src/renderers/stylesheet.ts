/**
 * Inline stylesheet assembly
 *
 * The block rules live in `assets/surfdoc.css` and only reference CSS
 * variables; the theme and any `::style` / `::site` overrides supply the
 * values.
 *
 * @since 2026-10-18
 */

import { readFileSync } from 'fs';
import { walkBlocks } from '../model/traverse.js';
import type { DocumentNode, StyleProperty } from '../model/types.js';
import type { RenderConfig } from '../base/RenderConfig.js';

export type Theme = RenderConfig['theme'];

const SYSTEM_STACK = '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Oxygen, sans-serif';
const MONO_STACK = '"SF Mono", "Fira Code", "Cascadia Code", Menlo, Consolas, monospace';

const THEMES: Readonly<Record<Theme, Readonly<Record<string, string>>>> = {
  dark: {
    '--bg': '#0a0a0f',
    '--bg-card': '#12121a',
    '--bg-hover': '#1a1a26',
    '--bg-code': '#0d1117',
    '--border': '#2a2a3a',
    '--border-subtle': '#1e1e2e',
    '--text': '#e8e8f0',
    '--text-dim': '#8888a0',
    '--text-muted': '#5a5a72',
    '--accent': '#3b82f6',
  },
  light: {
    '--bg': '#ffffff',
    '--bg-card': '#f6f7f9',
    '--bg-hover': '#eceef2',
    '--bg-code': '#f3f4f6',
    '--border': '#d0d4dc',
    '--border-subtle': '#e4e7ec',
    '--text': '#1a1d24',
    '--text-dim': '#4b5262',
    '--text-muted': '#7a8191',
    '--accent': '#2563eb',
  },
};

interface FontPreset {
  stack: string;
  import?: string;
}

const FONT_PRESETS: Readonly<Record<string, FontPreset>> = {
  system: { stack: SYSTEM_STACK },
  sans: { stack: SYSTEM_STACK },
  serif: { stack: 'Georgia, "Palatino Linotype", "Book Antiqua", Palatino, serif' },
  editorial: { stack: 'Georgia, "Palatino Linotype", "Book Antiqua", Palatino, serif' },
  mono: { stack: MONO_STACK },
  monospace: { stack: MONO_STACK },
  technical: { stack: MONO_STACK },
  inter: {
    stack: "'Inter', -apple-system, BlinkMacSystemFont, sans-serif",
    import: 'https://fonts.googleapis.com/css2?family=Inter:wght@400;500;600;700&display=swap',
  },
  montserrat: {
    stack: "'Montserrat', sans-serif",
    import: 'https://fonts.googleapis.com/css2?family=Montserrat:wght@400;600;700;800&display=swap',
  },
  'jetbrains-mono': {
    stack: "'JetBrains Mono', monospace",
    import: 'https://fonts.googleapis.com/css2?family=JetBrains+Mono:wght@400;500&display=swap',
  },
  jetbrains: {
    stack: "'JetBrains Mono', monospace",
    import: 'https://fonts.googleapis.com/css2?family=JetBrains+Mono:wght@400;500&display=swap',
  },
};

// Colours and keywords only; anything that could close the rule or the element is dropped
const SAFE_CSS_VALUE = /^[#\w\s(),.%-]+$/;

export interface StyleOverrides {
  /** Variable declarations in application order */
  variables: Array<[string, string]>;
  /** Font stylesheet URLs, deduplicated */
  imports: string[];
}

export function resolveFontPreset(name: string): FontPreset | undefined {
  return FONT_PRESETS[name.trim().toLowerCase()];
}

/**
 * Translate `accent`, `font`, `heading-font` and `body-font` properties
 * into variable overrides. Unrecognised keys and unsafe values are ignored.
 */
export function applyStyleProperties(properties: readonly StyleProperty[], overrides: StyleOverrides): void {
  const useFont = (name: string, variables: string[]) => {
    const preset = resolveFontPreset(name);
    if (!preset) return;
    for (const variable of variables) overrides.variables.push([variable, preset.stack]);
    if (preset.import && !overrides.imports.includes(preset.import)) {
      overrides.imports.push(preset.import);
    }
  };

  for (const { key, value } of properties) {
    switch (key.toLowerCase()) {
      case 'accent':
        if (SAFE_CSS_VALUE.test(value)) overrides.variables.push(['--accent', value.trim()]);
        break;
      case 'font':
        useFont(value, ['--font-heading', '--font-body']);
        break;
      case 'heading-font':
        useFont(value, ['--font-heading']);
        break;
      case 'body-font':
        useFont(value, ['--font-body']);
        break;
      default:
        break;
    }
  }
}

/**
 * Overrides from every `::site` and `::style` block in the tree, in document order
 */
export function collectStyleOverrides(nodes: readonly DocumentNode[]): StyleOverrides {
  const overrides: StyleOverrides = { variables: [], imports: [] };
  walkBlocks(nodes, block => {
    if (block.kind === 'site' || block.kind === 'style') {
      applyStyleProperties(block.properties, overrides);
    }
  });
  return overrides;
}

let blockRules: string | undefined;

/**
 * Block rules from the bundled asset, read once
 */
export function loadBlockRules(): string {
  if (blockRules === undefined) {
    blockRules = readFileSync(new URL('../../assets/surfdoc.css', import.meta.url), 'utf8').trimEnd();
  }
  return blockRules;
}

function declarations(entries: Iterable<[string, string]>): string {
  return [...entries].map(([name, value]) => `  ${name}: ${value};`).join('\n');
}

export function buildStylesheet(theme: Theme, overrides: StyleOverrides): string {
  const parts = overrides.imports.map(url => `@import url('${url}');`);
  const variables = new Map<string, string>([
    ...Object.entries(THEMES[theme]),
    ['--font-heading', SYSTEM_STACK],
    ['--font-body', SYSTEM_STACK],
    ['--font-mono', MONO_STACK],
  ]);
  for (const [name, value] of overrides.variables) variables.set(name, value);

  parts.push(`:root {\n${declarations(variables)}\n}`);
  parts.push(loadBlockRules());
  return parts.join('\n');
}

/**
 * Complete `<style>` element
 */
export function styleElement(theme: Theme, overrides: StyleOverrides): string {
  return `<style>\n${buildStylesheet(theme, overrides)}\n</style>`;
}
