import { describe, expect, it } from 'vitest';
import { generateSlug } from '../../../../src/shared/text/slug';

describe('generateSlug', () => {
  it('lowercases and joins words with hyphens', () => {
    expect(generateSlug('Hello World')).toBe('hello-world');
  });

  it('drops punctuation and collapses separators', () => {
    expect(generateSlug('  TypeScript: Tips & Tricks!!  ')).toBe('typescript-tips-tricks');
  });

  it('keeps digits and underscores', () => {
    expect(generateSlug('Top 10 snake_case ideas')).toBe('top-10-snake_case-ideas');
  });

  it('keeps non-ASCII letters', () => {
    expect(generateSlug('Café Über')).toBe('café-über');
  });

  it('returns an empty string when nothing survives', () => {
    expect(generateSlug('!!! ???')).toBe('');
  });
});
