/**
 * Title fallback and normalization for renamed documents
 */

export const MAX_TITLE_LENGTH = 100;
export const UNTITLED_DOCUMENT = 'Untitled Document';
const FALLBACK_WORD_COUNT = 5;

export function fallbackTitle(content: string): string {
  const words = content.split(/\s+/).filter(word => word.length > 0);
  return words.slice(0, FALLBACK_WORD_COUNT).join(' ');
}

/**
 * Pick the title to apply: the model's suggestion when it gave one,
 * otherwise the first words of the content, capped at 100 characters
 */
export function finalizeTitle(generated: string, content: string): string {
  if (!content.trim()) {
    return UNTITLED_DOCUMENT;
  }

  let title = generated.replace(/\s+/g, ' ').trim();
  if (!title) {
    title = fallbackTitle(content);
  }
  if (title.length > MAX_TITLE_LENGTH) {
    title = `${title.substring(0, MAX_TITLE_LENGTH - 3)}...`;
  }
  return title;
}
