import { randomUUID } from 'node:crypto';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import type { TestApp } from '../helpers/build-test-app';
import { bearer, createTaxonomy, signup } from '../helpers/api';
import type { ErrorBody, SignedUpUser } from '../helpers/api';

type CategoryBody = {
  id: string;
  name: string;
  slug: string;
  description: string | null;
};

describe('categories', () => {
  let t: TestApp;
  let alice: SignedUpUser;
  let bob: SignedUpUser;

  beforeEach(async () => {
    t = await buildTestApp();
    alice = await signup(t.app, { username: 'alice' });
    bob = await signup(t.app, { username: 'bob' });
  });

  afterEach(async () => {
    await t.close();
  });

  it('creates a category with a normalized slug', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/categories',
      headers: bearer(alice.token),
      payload: { name: 'Web Dev', slug: 'Web Dev', description: 'Frontend and backend' },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json<CategoryBody>()).toMatchObject({
      name: 'Web Dev',
      slug: 'web-dev',
      description: 'Frontend and backend',
    });
  });

  it('rejects duplicate names and slugs', async () => {
    await createTaxonomy(t.app, alice.token, 'categories', { name: 'News', slug: 'news' });

    const sameSlug = await t.app.inject({
      method: 'POST',
      url: '/categories',
      headers: bearer(alice.token),
      payload: { name: 'Other', slug: 'NEWS' },
    });
    expect(sameSlug.statusCode).toBe(400);
    expect(sameSlug.json<ErrorBody>().error.message).toBe('Slug already in use');

    const sameName = await t.app.inject({
      method: 'POST',
      url: '/categories',
      headers: bearer(alice.token),
      payload: { name: 'News', slug: 'news-2' },
    });
    expect(sameName.statusCode).toBe(400);
    expect(sameName.json<ErrorBody>().error.message).toBe('Name already in use');
  });

  it('rejects a slug with no letters or digits', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/categories',
      headers: bearer(alice.token),
      payload: { name: 'Symbols', slug: '!!!' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorBody>().error.code).toBe('VALIDATION_ERROR');
  });

  it('gets and lists without authentication', async () => {
    const created = await createTaxonomy(t.app, alice.token, 'categories', {
      name: 'News',
      slug: 'news',
    });

    const get = await t.app.inject({ method: 'GET', url: `/categories/${created.id}` });
    expect(get.statusCode).toBe(200);
    expect(get.json<CategoryBody>().name).toBe('News');

    const list = await t.app.inject({ method: 'GET', url: '/categories' });
    expect(list.statusCode).toBe(200);
    expect(list.json<CategoryBody[]>().map((c) => c.slug)).toEqual(['news']);

    const missing = await t.app.inject({ method: 'GET', url: `/categories/${randomUUID()}` });
    expect(missing.statusCode).toBe(404);
    expect(missing.json<ErrorBody>().error.message).toBe('Category not found');
  });

  it('caps the list limit at 500', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/categories?limit=501' });
    expect(res.statusCode).toBe(400);
  });

  it('lets any signed-in user update and delete', async () => {
    const created = await createTaxonomy(t.app, alice.token, 'categories', {
      name: 'News',
      slug: 'news',
    });

    const updated = await t.app.inject({
      method: 'PUT',
      url: `/categories/${created.id}`,
      headers: bearer(bob.token),
      payload: { description: 'Daily updates' },
    });
    expect(updated.statusCode).toBe(200);
    expect(updated.json<CategoryBody>()).toMatchObject({
      name: 'News',
      slug: 'news',
      description: 'Daily updates',
    });

    const deleted = await t.app.inject({
      method: 'DELETE',
      url: `/categories/${created.id}`,
      headers: bearer(bob.token),
    });
    expect(deleted.statusCode).toBe(204);

    const get = await t.app.inject({ method: 'GET', url: `/categories/${created.id}` });
    expect(get.statusCode).toBe(404);

    const list = await t.app.inject({ method: 'GET', url: '/categories' });
    expect(list.json<CategoryBody[]>()).toEqual([]);
  });

  it('requires authentication to write', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/categories',
      payload: { name: 'News', slug: 'news' },
    });

    expect(res.statusCode).toBe(401);
  });
});
