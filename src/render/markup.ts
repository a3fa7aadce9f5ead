const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

const STRIKETHROUGH = /~~(.+?)~~/g;
// Single underscores only; '__x__' is left alone.
const ITALIC = /(?<!_)_([^_]+?)_(?!_)/g;

export function escapeHtml(value: string | null | undefined): string {
  if (!value) return '';
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Escape entry text, then turn ~~x~~ into <s> and _x_ into <em>. */
export function formatEntry(value: string | null | undefined): string {
  return escapeHtml(value)
    .replace(STRIKETHROUGH, '<s>$1</s>')
    .replace(ITALIC, '<em>$1</em>');
}

export type CategoryClass = 'signing' | 'trade' | 'waiver' | 'lost' | '';

/** Colour class for a category name; checks run in priority order. */
export function categoryClass(category: string): CategoryClass {
  if (category.includes('Signing') || category.includes('Extension')) return 'signing';
  if (category.includes('Trade')) return 'trade';
  if (category.includes('Waiver') && !category.includes('Lost')) return 'waiver';
  if (category.includes('Lost')) return 'lost';
  return '';
}
