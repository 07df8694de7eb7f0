import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { DbExecutor } from '../../../src/shared/db/db';
import { AppError } from '../../../src/shared/http/errors';
import { TagErrors } from '../../../src/modules/tags/tag.errors';
import { TaxonomyUniqueness } from '../../../src/modules/_shared/taxonomy/taxonomy-uniqueness';
import type { TaxonomyConflicts } from '../../../src/modules/_shared/taxonomy/taxonomy-uniqueness';
import { createTestDb } from '../../helpers/test-db';

describe('TaxonomyUniqueness', () => {
  let db: DbExecutor;
  let conflicts: TaxonomyConflicts;
  let uniqueness: TaxonomyUniqueness;

  beforeEach(async () => {
    db = await createTestDb();
    conflicts = { nameTaken: false, slugTaken: false };
    uniqueness = new TaxonomyUniqueness({
      db,
      findConflicts: vi.fn(async () => conflicts),
      errors: TagErrors,
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  async function capture(run: () => Promise<unknown>): Promise<AppError> {
    try {
      await run();
    } catch (err) {
      if (err instanceof AppError) return err;
      throw err;
    }
    return expect.unreachable('expected an AppError');
  }

  it('normalizes slugs and rejects ones with nothing left', async () => {
    expect(uniqueness.normalizeSlug('  Type Script ')).toBe('type-script');

    const err = await capture(async () => uniqueness.normalizeSlug('***'));
    expect(err.message).toBe('Slug must contain at least one letter or digit');
  });

  it('reports a slug conflict before a name conflict', async () => {
    conflicts = { nameTaken: true, slugTaken: true };

    const err = await capture(() => uniqueness.assertUnique({ name: 'Rust', slug: 'rust' }));

    expect(err.code).toBe('CONFLICT');
    expect(err.message).toBe('Slug already in use');
  });

  it('maps a racing unique violation to the conflicting field', async () => {
    const violation = Object.assign(new Error('duplicate key'), { code: '23505' });

    conflicts = { nameTaken: true, slugTaken: false };
    const nameErr = await capture(() =>
      uniqueness.withConflictMapping({ name: 'Rust' }, () => Promise.reject(violation)),
    );
    expect(nameErr.message).toBe('Name already in use');

    conflicts = { nameTaken: false, slugTaken: false };
    const fallback = await capture(() =>
      uniqueness.withConflictMapping({ slug: 'rust' }, () => Promise.reject(violation)),
    );
    expect(fallback.message).toBe('Slug already in use');
  });

  it('rethrows anything that is not a unique violation', async () => {
    const boom = new Error('connection lost');

    await expect(uniqueness.withConflictMapping({}, () => Promise.reject(boom))).rejects.toBe(boom);
  });
});
