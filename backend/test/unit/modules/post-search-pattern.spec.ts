import { describe, it, expect } from 'vitest';
import { toContainsPattern } from '../../../src/modules/posts/dal/post.query-sql';

describe('toContainsPattern', () => {
  it('wraps the lowercased term in wildcards', () => {
    expect(toContainsPattern('TypeScript')).toBe('%typescript%');
  });

  it('escapes LIKE wildcards and the escape character', () => {
    expect(toContainsPattern('100%_done\\')).toBe('%100\\%\\_done\\\\%');
  });
});
