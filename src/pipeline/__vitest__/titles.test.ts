import { describe, it, expect } from 'vitest';
import { fallbackTitle, finalizeTitle, MAX_TITLE_LENGTH, UNTITLED_DOCUMENT } from '../titles.js';

describe('titles', () => {
  it('should keep a usable model title', () => {
    expect(finalizeTitle('Electricity Bill March 2024', 'Your electricity bill...')).toBe('Electricity Bill March 2024');
  });

  it('should use the first five words when the model gave nothing', () => {
    expect(finalizeTitle('  ', 'Notice of  change\nin terms and conditions')).toBe('Notice of change in terms');
  });

  it('should name documents without content Untitled Document', () => {
    expect(finalizeTitle('Anything', '   ')).toBe(UNTITLED_DOCUMENT);
  });

  it('should cap long titles with an ellipsis', () => {
    const title = finalizeTitle('x'.repeat(150), 'content');

    expect(title).toHaveLength(MAX_TITLE_LENGTH);
    expect(title).toBe(`${'x'.repeat(97)}...`);
  });

  it('should leave a title of exactly the maximum length alone', () => {
    expect(finalizeTitle('y'.repeat(100), 'content')).toBe('y'.repeat(100));
  });

  it('should take fewer words from short content', () => {
    expect(fallbackTitle('Receipt')).toBe('Receipt');
  });
});
