import { randomUUID } from 'node:crypto';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import type { TestApp } from '../helpers/build-test-app';
import { bearer, createPost, createTaxonomy, signup } from '../helpers/api';
import type { ErrorBody, PostBody, SignedUpUser } from '../helpers/api';

describe('posts', () => {
  let t: TestApp;
  let alice: SignedUpUser;
  let bob: SignedUpUser;

  beforeEach(async () => {
    t = await buildTestApp();
    alice = await signup(t.app, { username: 'alice', fullName: 'Alice Liddell' });
    bob = await signup(t.app, { username: 'bob' });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await t.close();
  });

  async function getPosts(url: string): Promise<PostBody[]> {
    const res = await t.app.inject({ method: 'GET', url });
    expect(res.statusCode).toBe(200);
    return res.json<PostBody[]>();
  }

  describe('POST /posts', () => {
    it('creates a post with author, category and only the tags that exist', async () => {
      const category = await createTaxonomy(t.app, alice.token, 'categories', {
        name: 'Engineering',
        slug: 'engineering',
      });
      const tag = await createTaxonomy(t.app, alice.token, 'tags', {
        name: 'TypeScript',
        slug: 'typescript',
      });

      const post = await createPost(t.app, alice.token, {
        title: 'Hello World',
        slug: 'Hello World!',
        content: 'First post',
        excerpt: 'Intro',
        categoryId: category.id,
        tagIds: [tag.id, randomUUID()],
        isPublished: true,
      });

      expect(post.slug).toBe('hello-world');
      expect(post.authorId).toBe(alice.id);
      expect(post.author).toEqual({
        id: alice.id,
        username: 'alice',
        fullName: 'Alice Liddell',
        profileImageUrl: null,
      });
      expect(post.category?.id).toBe(category.id);
      expect(post.tags.map((tg) => tg.id)).toEqual([tag.id]);
      expect(post.isPublished).toBe(true);
      expect(post.publishedAt).not.toBeNull();
      expect(post.viewCount).toBe(0);
    });

    it('creates drafts by default', async () => {
      const post = await createPost(t.app, alice.token, {
        title: 'Draft',
        slug: 'draft',
        content: 'Not yet',
      });

      expect(post.isPublished).toBe(false);
      expect(post.publishedAt).toBeNull();
      expect(post.category).toBeNull();
      expect(post.tags).toEqual([]);
    });

    it('rejects a slug that is already used', async () => {
      await createPost(t.app, alice.token, { title: 'One', slug: 'same', content: 'x' });

      const res = await t.app.inject({
        method: 'POST',
        url: '/posts',
        headers: bearer(bob.token),
        payload: { title: 'Two', slug: 'Same', content: 'y' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>()).toEqual({
        error: { code: 'CONFLICT', message: 'Slug already in use' },
      });
    });

    it('rejects an unknown category with 404', async () => {
      const res = await t.app.inject({
        method: 'POST',
        url: '/posts',
        headers: bearer(alice.token),
        payload: { title: 'T', slug: 't', content: 'c', categoryId: randomUUID() },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json<ErrorBody>().error.message).toBe('Category not found');
    });

    it('requires authentication', async () => {
      const res = await t.app.inject({
        method: 'POST',
        url: '/posts',
        payload: { title: 'T', slug: 't', content: 'c' },
      });

      expect(res.statusCode).toBe(401);
    });

    it('validates the body', async () => {
      const res = await t.app.inject({
        method: 'POST',
        url: '/posts',
        headers: bearer(alice.token),
        payload: { title: '', slug: 't' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>().error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /posts', () => {
    it('returns `limit` published posts, newest first', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      const start = Date.parse('2024-01-01T00:00:00Z');

      for (let i = 1; i <= 15; i++) {
        vi.setSystemTime(start + i * 60_000);
        await createPost(t.app, alice.token, {
          title: `Post ${i}`,
          slug: `post-${i}`,
          content: 'body',
          isPublished: true,
        });
      }

      const posts = await getPosts('/posts?limit=10');

      expect(posts).toHaveLength(10);
      expect(posts.map((p) => p.title)).toEqual([
        'Post 15',
        'Post 14',
        'Post 13',
        'Post 12',
        'Post 11',
        'Post 10',
        'Post 9',
        'Post 8',
        'Post 7',
        'Post 6',
      ]);

      const page2 = await getPosts('/posts?skip=10&limit=10');
      expect(page2.map((p) => p.title)).toEqual(['Post 5', 'Post 4', 'Post 3', 'Post 2', 'Post 1']);
    });

    it('hides drafts', async () => {
      await createPost(t.app, alice.token, { title: 'Draft', slug: 'draft', content: 'x' });
      await createPost(t.app, alice.token, {
        title: 'Live',
        slug: 'live',
        content: 'x',
        isPublished: true,
      });

      const posts = await getPosts('/posts');
      expect(posts.map((p) => p.slug)).toEqual(['live']);
    });

    it('filters by category and by tag', async () => {
      const category = await createTaxonomy(t.app, alice.token, 'categories', {
        name: 'News',
        slug: 'news',
      });
      const tag = await createTaxonomy(t.app, alice.token, 'tags', { name: 'Node', slug: 'node' });

      await createPost(t.app, alice.token, {
        title: 'In category',
        slug: 'in-category',
        content: 'x',
        categoryId: category.id,
        isPublished: true,
      });
      await createPost(t.app, alice.token, {
        title: 'Tagged',
        slug: 'tagged',
        content: 'x',
        tagIds: [tag.id],
        isPublished: true,
      });
      await createPost(t.app, alice.token, {
        title: 'Plain',
        slug: 'plain',
        content: 'x',
        isPublished: true,
      });

      const byCategory = await getPosts(`/posts?categoryId=${category.id}`);
      expect(byCategory.map((p) => p.slug)).toEqual(['in-category']);

      const byTag = await getPosts(`/posts?tagId=${tag.id}`);
      expect(byTag.map((p) => p.slug)).toEqual(['tagged']);
    });

    it('matches nothing by a deleted category or tag', async () => {
      const category = await createTaxonomy(t.app, alice.token, 'categories', {
        name: 'Old news',
        slug: 'old-news',
      });
      const tag = await createTaxonomy(t.app, alice.token, 'tags', { name: 'Old', slug: 'old' });
      await createPost(t.app, alice.token, {
        title: 'Archived',
        slug: 'archived',
        content: 'x',
        categoryId: category.id,
        tagIds: [tag.id],
        isPublished: true,
      });

      for (const url of [`/categories/${category.id}`, `/tags/${tag.id}`]) {
        const res = await t.app.inject({ method: 'DELETE', url, headers: bearer(alice.token) });
        expect(res.statusCode).toBe(204);
      }

      expect(await getPosts(`/posts?categoryId=${category.id}`)).toEqual([]);
      expect(await getPosts(`/posts?tagId=${tag.id}`)).toEqual([]);
    });

    it('rejects an out-of-range skip', async () => {
      const res = await t.app.inject({ method: 'GET', url: '/posts?skip=1e20' });
      expect(res.statusCode).toBe(400);
    });

    it('rejects a limit above 100', async () => {
      const res = await t.app.inject({ method: 'GET', url: '/posts?limit=101' });
      expect(res.statusCode).toBe(400);
    });
  });

  describe('GET /posts/search/:query', () => {
    it('matches title, content and excerpt case-insensitively, published only', async () => {
      await createPost(t.app, alice.token, {
        title: 'Learning TYPESCRIPT',
        slug: 'in-title',
        content: 'x',
        isPublished: true,
      });
      await createPost(t.app, alice.token, {
        title: 'Other',
        slug: 'in-content',
        content: 'all about typescript generics',
        isPublished: true,
      });
      await createPost(t.app, alice.token, {
        title: 'Third',
        slug: 'in-excerpt',
        content: 'x',
        excerpt: 'TypeScript tips',
        isPublished: true,
      });
      await createPost(t.app, alice.token, {
        title: 'TypeScript draft',
        slug: 'draft',
        content: 'x',
      });
      await createPost(t.app, alice.token, {
        title: 'Unrelated',
        slug: 'unrelated',
        content: 'python',
        isPublished: true,
      });

      const posts = await getPosts('/posts/search/typeScript');

      expect(posts.map((p) => p.slug).sort()).toEqual(['in-content', 'in-excerpt', 'in-title']);
    });

    it('treats LIKE wildcards literally', async () => {
      await createPost(t.app, alice.token, {
        title: '100% coverage',
        slug: 'percent',
        content: 'x',
        isPublished: true,
      });
      await createPost(t.app, alice.token, {
        title: '100 tests',
        slug: 'no-percent',
        content: 'x',
        isPublished: true,
      });

      const posts = await getPosts(`/posts/search/${encodeURIComponent('100%')}`);
      expect(posts.map((p) => p.slug)).toEqual(['percent']);
    });
  });

  describe('GET /posts/user/:userId', () => {
    it('lists the author posts including drafts', async () => {
      await createPost(t.app, alice.token, { title: 'Draft', slug: 'a-draft', content: 'x' });
      await createPost(t.app, alice.token, {
        title: 'Live',
        slug: 'a-live',
        content: 'x',
        isPublished: true,
      });
      await createPost(t.app, bob.token, {
        title: 'Bob',
        slug: 'b-live',
        content: 'x',
        isPublished: true,
      });

      const posts = await getPosts(`/posts/user/${alice.id}`);
      expect(posts.map((p) => p.slug).sort()).toEqual(['a-draft', 'a-live']);
    });

    it('returns 404 for an unknown user', async () => {
      const res = await t.app.inject({ method: 'GET', url: `/posts/user/${randomUUID()}` });

      expect(res.statusCode).toBe(404);
      expect(res.json<ErrorBody>().error.message).toBe('User not found');
    });
  });

  describe('single post reads', () => {
    it('counts a view on every fetch by id or slug', async () => {
      const post = await createPost(t.app, alice.token, {
        title: 'Counted',
        slug: 'counted',
        content: 'x',
        isPublished: true,
      });

      const first = await t.app.inject({ method: 'GET', url: `/posts/${post.id}` });
      expect(first.statusCode).toBe(200);
      expect(first.json<PostBody>().viewCount).toBe(0);

      const second = await t.app.inject({ method: 'GET', url: '/posts/slug/counted' });
      expect(second.statusCode).toBe(200);
      expect(second.json<PostBody>().id).toBe(post.id);
      expect(second.json<PostBody>().viewCount).toBe(1);

      const row = await t.db
        .selectFrom('posts')
        .select('view_count')
        .where('id', '=', post.id)
        .executeTakeFirstOrThrow();
      expect(row.view_count).toBe(2);
    });

    it('returns 404 for unknown ids and slugs, 400 for malformed ids', async () => {
      const byId = await t.app.inject({ method: 'GET', url: `/posts/${randomUUID()}` });
      expect(byId.statusCode).toBe(404);
      expect(byId.json<ErrorBody>().error.message).toBe('Post not found');

      const bySlug = await t.app.inject({ method: 'GET', url: '/posts/slug/missing' });
      expect(bySlug.statusCode).toBe(404);

      const malformed = await t.app.inject({ method: 'GET', url: '/posts/not-a-uuid' });
      expect(malformed.statusCode).toBe(400);
    });
  });

  describe('PUT /posts/:id', () => {
    it('lets the author change only the supplied fields', async () => {
      const tagA = await createTaxonomy(t.app, alice.token, 'tags', { name: 'A', slug: 'a' });
      const tagB = await createTaxonomy(t.app, alice.token, 'tags', { name: 'B', slug: 'b' });
      const category = await createTaxonomy(t.app, alice.token, 'categories', {
        name: 'News',
        slug: 'news',
      });
      const post = await createPost(t.app, alice.token, {
        title: 'Original',
        slug: 'original',
        content: 'body',
        categoryId: category.id,
        tagIds: [tagA.id],
      });

      const res = await t.app.inject({
        method: 'PUT',
        url: `/posts/${post.id}`,
        headers: bearer(alice.token),
        payload: { title: 'Renamed', categoryId: null, tagIds: [tagB.id] },
      });

      expect(res.statusCode).toBe(200);
      const updated = res.json<PostBody>();
      expect(updated.title).toBe('Renamed');
      expect(updated.slug).toBe('original');
      expect(updated.content).toBe('body');
      expect(updated.category).toBeNull();
      expect(updated.tags.map((tg) => tg.id)).toEqual([tagB.id]);
    });

    it('stamps publishedAt on first publish and keeps it afterwards', async () => {
      const post = await createPost(t.app, alice.token, {
        title: 'Draft',
        slug: 'draft',
        content: 'x',
      });

      const published = await t.app.inject({
        method: 'PUT',
        url: `/posts/${post.id}`,
        headers: bearer(alice.token),
        payload: { isPublished: true },
      });
      const publishedAt = published.json<PostBody>().publishedAt;
      expect(publishedAt).not.toBeNull();

      const unpublished = await t.app.inject({
        method: 'PUT',
        url: `/posts/${post.id}`,
        headers: bearer(alice.token),
        payload: { isPublished: false },
      });
      expect(unpublished.json<PostBody>().isPublished).toBe(false);
      expect(unpublished.json<PostBody>().publishedAt).toBe(publishedAt);
    });

    it('forbids other users', async () => {
      const post = await createPost(t.app, alice.token, { title: 'Mine', slug: 'mine', content: 'x' });

      const res = await t.app.inject({
        method: 'PUT',
        url: `/posts/${post.id}`,
        headers: bearer(bob.token),
        payload: { title: 'Hijacked' },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json<ErrorBody>()).toEqual({
        error: { code: 'FORBIDDEN', message: 'Not authorized to update this post' },
      });
    });

    it('rejects a slug owned by another post', async () => {
      await createPost(t.app, alice.token, { title: 'One', slug: 'one', content: 'x' });
      const two = await createPost(t.app, alice.token, { title: 'Two', slug: 'two', content: 'x' });

      const res = await t.app.inject({
        method: 'PUT',
        url: `/posts/${two.id}`,
        headers: bearer(alice.token),
        payload: { slug: 'one' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>().error.message).toBe('Slug already in use');
    });
  });

  describe('DELETE /posts/:id', () => {
    it('forbids other users', async () => {
      const post = await createPost(t.app, alice.token, { title: 'Mine', slug: 'mine', content: 'x' });

      const res = await t.app.inject({
        method: 'DELETE',
        url: `/posts/${post.id}`,
        headers: bearer(bob.token),
      });

      expect(res.statusCode).toBe(403);
      expect(res.json<ErrorBody>().error.message).toBe('Not authorized to delete this post');
    });

    it('soft deletes: the post disappears from every read', async () => {
      const post = await createPost(t.app, alice.token, {
        title: 'Gone',
        slug: 'gone',
        content: 'x',
        isPublished: true,
      });

      const res = await t.app.inject({
        method: 'DELETE',
        url: `/posts/${post.id}`,
        headers: bearer(alice.token),
      });
      expect(res.statusCode).toBe(204);

      expect((await t.app.inject({ method: 'GET', url: `/posts/${post.id}` })).statusCode).toBe(
        404,
      );
      expect((await t.app.inject({ method: 'GET', url: '/posts/slug/gone' })).statusCode).toBe(404);
      expect(await getPosts('/posts')).toEqual([]);
      expect(await getPosts(`/posts/user/${alice.id}`)).toEqual([]);

      const row = await t.db
        .selectFrom('posts')
        .select('deleted_at')
        .where('id', '=', post.id)
        .executeTakeFirstOrThrow();
      expect(row.deleted_at).toBeInstanceOf(Date);
    });
  });
});
