const ESCAPE_MARKDOWN_RE = /[#&()*+<>[\]\\_`|-]/g;

const ENTITY_REPLACEMENTS: Record<string, string> = {
  '\\': '\\\\',
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '|': '&#124;',
};

/**
 * Escape text so GitHub renders it literally inside Markdown
 */
export function escapeMarkdown(text: string): string {
  return text.replace(ESCAPE_MARKDOWN_RE, (char) => ENTITY_REPLACEMENTS[char] ?? `\\${char}`);
}
