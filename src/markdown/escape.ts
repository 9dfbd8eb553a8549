const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escape text for HTML content and double- or single-quoted attributes
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

/**
 * `javascript:`, `vbscript:` and `data:` URLs, which links and images never keep
 */
export function isScriptUrl(url: string): boolean {
  return /^\s*(javascript|vbscript|data):/i.test(url);
}
