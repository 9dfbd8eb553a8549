/**
 * Tests for render configuration
 */
import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { RenderConfigSchema, resolveRenderConfig } from '../src/base/index.js';

describe('RenderConfig', () => {
  it('should fill in defaults', () => {
    expect(resolveRenderConfig()).toEqual({
      theme: 'dark',
      color: true,
      css: 'inline',
      standalone: false,
      lang: 'en',
      sourcePath: 'source.surf',
    });
  });

  it('should keep supplied values', () => {
    const config = resolveRenderConfig({ theme: 'light', standalone: true, title: 'T', maxPageSize: 5000 });
    expect(config.theme).toBe('light');
    expect(config.standalone).toBe(true);
    expect(config.title).toBe('T');
    expect(config.maxPageSize).toBe(5000);
  });

  it('should reject unknown themes and keys', () => {
    expect(RenderConfigSchema.safeParse({ theme: 'blue' }).success).toBe(false);
    expect(RenderConfigSchema.safeParse({ colour: false }).success).toBe(false);
    expect(RenderConfigSchema.safeParse({ canonicalUrl: 'not a url' }).success).toBe(false);
  });

  it('should throw a ZodError for invalid limits', () => {
    expect(() => resolveRenderConfig({ maxPageSize: -5 })).toThrow(ZodError);
  });
});
