/**
 * Render configuration
 *
 * Caller-supplied options shared by every renderer. Invalid configuration
 * is a programming error and throws a ZodError; document problems never do.
 */

import { z } from 'zod';

export const RenderConfigSchema = z
  .object({
    /** Colour scheme of the inline stylesheet */
    theme: z.enum(['dark', 'light']).default('dark'),
    /** ANSI escape sequences in terminal output */
    color: z.boolean().default(true),
    /** Emit one `<style>` element, or leave styling to the host page */
    css: z.enum(['inline', 'omit']).default('inline'),
    /** Wrap HTML in a complete page */
    standalone: z.boolean().default(false),
    /** Page title; falls back to front matter `title` */
    title: z.string().optional(),
    lang: z.string().min(1).default('en'),
    /** Location of the `.surf` source, linked from standalone pages */
    sourcePath: z.string().min(1).default('source.surf'),
    canonicalUrl: z.string().url().optional(),
    description: z.string().optional(),
    /** Pages whose output exceeds this many characters are flagged */
    maxPageSize: z.number().int().positive().optional(),
  })
  .strict();

export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type RenderConfigInput = z.input<typeof RenderConfigSchema>;

export function resolveRenderConfig(input: RenderConfigInput = {}): RenderConfig {
  return RenderConfigSchema.parse(input);
}
