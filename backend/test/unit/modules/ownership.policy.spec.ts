import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import {
  MUTATION_POLICY,
  assertCanMutate,
  authorizeOwner,
} from '../../../src/modules/_shared/policies/ownership.policy';

describe('authorizeOwner', () => {
  it('is true only for the author', () => {
    expect(authorizeOwner({ authorId: 'u1' }, { id: 'u1' })).toBe(true);
    expect(authorizeOwner({ authorId: 'u1' }, { id: 'u2' })).toBe(false);
  });
});

describe('assertCanMutate', () => {
  it('lets the owner mutate posts and comments', () => {
    expect(() =>
      assertCanMutate({
        kind: 'post',
        action: 'update',
        resource: { id: 'p1', authorId: 'u1' },
        identity: { id: 'u1' },
      }),
    ).not.toThrow();
  });

  it('forbids anyone else with a 403 naming the action and kind', () => {
    try {
      assertCanMutate({
        kind: 'comment',
        action: 'delete',
        resource: { id: 'c1', authorId: 'u1' },
        identity: { id: 'u2' },
      });
      expect.unreachable('assertCanMutate should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      if (!(err instanceof AppError)) return;
      expect(err.status).toBe(403);
      expect(err.message).toBe('Not authorized to delete this comment');
    }
  });

  it('forbids owner-only kinds when the resource has no author', () => {
    expect(() =>
      assertCanMutate({
        kind: 'post',
        action: 'delete',
        resource: { id: 'p1', authorId: null },
        identity: { id: 'u1' },
      }),
    ).toThrowError('Not authorized to delete this post');
  });

  it('lets any authenticated user mutate categories and tags', () => {
    expect(MUTATION_POLICY.category).toBe('authenticated');
    expect(MUTATION_POLICY.tag).toBe('authenticated');
    expect(() =>
      assertCanMutate({
        kind: 'tag',
        action: 'update',
        resource: { id: 't1', authorId: 'u1' },
        identity: { id: 'u2' },
      }),
    ).not.toThrow();
  });
});
