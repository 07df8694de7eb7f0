/**
 * backend/src/modules/posts/post.service.ts
 *
 * WHY:
 * - Post use-cases: create, read (by id, by slug), list, search, per-author
 *   listing, update, soft delete, view counting.
 * - Only place in the posts module allowed to start transactions.
 *
 * RULES:
 * - Public listings and search show published posts only; the per-author
 *   listing includes drafts.
 * - Updates and deletes require the author (ownership policy).
 * - Only existing, non-deleted tags are linked; unknown ids are dropped.
 * - View counting is best-effort and never fails the read that triggered it.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuthClaims } from '../../shared/http/require-auth-context';
import type { Pagination } from '../../shared/http/request-schemas';
import { isUniqueViolation } from '../../shared/db/db-errors';
import { generateSlug } from '../../shared/text/slug';
import { resolveIdentity } from '../_shared/identity/resolve-identity';
import { assertCanMutate } from '../_shared/policies/ownership.policy';
import { getUserById } from '../users';
import { getCategoryById } from '../categories';
import { getTagsByIds } from '../tags';

import type { PostRepo, PostPatch } from './dal/post.repo';
import { isPostSlugTakenSql } from './dal/post.query-sql';
import {
  buildPostResponse,
  buildPostResponses,
  getPostById,
  getPostBySlug,
  listPosts,
} from './queries/post.queries';
import { PostErrors } from './post.errors';
import type { CreatePostInput, UpdatePostInput } from './post.schemas';
import type { Post, PostResponse } from './post.types';

function normalizeSlug(raw: string): string {
  const slug = generateSlug(raw);
  if (!slug) throw PostErrors.emptySlug({ slug: raw });
  return slug;
}

export class PostService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      postRepo: PostRepo;
    },
  ) {}

  // ── Writes ───────────────────────────────────────────────

  async create(params: {
    claims: AuthClaims;
    input: CreatePostInput;
    requestId: string;
  }): Promise<PostResponse> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const { input } = params;

    const slug = normalizeSlug(input.slug);
    const categoryId = input.categoryId ?? null;
    if (categoryId !== null) await this.assertCategoryExists(categoryId);
    await this.assertSlugAvailable(slug);

    const tagIds = await this.existingTagIds(input.tagIds);
    const now = new Date();

    const post = await this.withSlugConflictMapping(slug, () =>
      this.deps.db.transaction().execute(async (trx) => {
        const postRepo = this.deps.postRepo.withDb(trx);

        const { id } = await postRepo.insertPost({
          title: input.title,
          slug,
          content: input.content,
          excerpt: input.excerpt ?? null,
          authorId: identity.id,
          categoryId,
          isPublished: input.isPublished,
          featuredImageUrl: input.featuredImageUrl ?? null,
          now,
        });

        await postRepo.replacePostTags({ postId: id, tagIds, actorId: identity.id, now });

        const created = await getPostById(trx, id);
        if (!created) throw new Error(`post ${id} missing after insert`);
        return created;
      }),
    );

    this.deps.logger.info({
      msg: 'posts.create.success',
      flow: 'posts.create',
      requestId: params.requestId,
      postId: post.id,
      userId: identity.id,
      tagCount: tagIds.length,
    });

    return buildPostResponse(this.deps.db, post);
  }

  async update(params: {
    claims: AuthClaims;
    postId: string;
    input: UpdatePostInput;
    requestId: string;
  }): Promise<PostResponse> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const existing = await this.requirePost(params.postId);

    assertCanMutate({
      kind: 'post',
      action: 'update',
      resource: { id: existing.id, authorId: existing.authorId },
      identity,
    });

    const { input } = params;
    const patch: PostPatch = {
      title: input.title,
      content: input.content,
      excerpt: input.excerpt,
      isPublished: input.isPublished,
      featuredImageUrl: input.featuredImageUrl,
      categoryId: input.categoryId,
    };

    if (input.slug !== undefined) {
      patch.slug = normalizeSlug(input.slug);
      await this.assertSlugAvailable(patch.slug, existing.id);
    }
    if (input.categoryId) await this.assertCategoryExists(input.categoryId);

    const now = new Date();
    if (input.isPublished === true && existing.publishedAt === null) {
      patch.publishedAt = now;
    }

    const tagIds = input.tagIds !== undefined ? await this.existingTagIds(input.tagIds) : null;

    const post = await this.withSlugConflictMapping(patch.slug ?? existing.slug, () =>
      this.deps.db.transaction().execute(async (trx) => {
        const postRepo = this.deps.postRepo.withDb(trx);

        await postRepo.updatePost({ postId: existing.id, patch, actorId: identity.id, now });
        if (tagIds !== null) {
          await postRepo.replacePostTags({
            postId: existing.id,
            tagIds,
            actorId: identity.id,
            now,
          });
        }

        const updated = await getPostById(trx, existing.id);
        if (!updated) throw PostErrors.notFound({ postId: existing.id });
        return updated;
      }),
    );

    this.deps.logger.info({
      msg: 'posts.update.success',
      flow: 'posts.update',
      requestId: params.requestId,
      postId: post.id,
      userId: identity.id,
    });

    return buildPostResponse(this.deps.db, post);
  }

  async softDelete(params: { claims: AuthClaims; postId: string; requestId: string }) {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const existing = await this.requirePost(params.postId);

    assertCanMutate({
      kind: 'post',
      action: 'delete',
      resource: { id: existing.id, authorId: existing.authorId },
      identity,
    });

    const now = new Date();
    await this.deps.db.transaction().execute(async (trx) => {
      await this.deps.postRepo
        .withDb(trx)
        .softDeletePost({ postId: existing.id, actorId: identity.id, now });
    });

    this.deps.logger.info({
      msg: 'posts.delete.success',
      flow: 'posts.delete',
      requestId: params.requestId,
      postId: existing.id,
      userId: identity.id,
    });
  }

  // ── Reads ────────────────────────────────────────────────

  /** Returns the post as read, then counts the view. */
  async getById(postId: string, requestId: string): Promise<PostResponse> {
    const post = await this.requirePost(postId);
    const response = await buildPostResponse(this.deps.db, post);
    await this.incrementViewCount(post.id, requestId);
    return response;
  }

  async getBySlug(slug: string, requestId: string): Promise<PostResponse> {
    const post = await getPostBySlug(this.deps.db, slug);
    if (!post) throw PostErrors.notFound({ slug });

    const response = await buildPostResponse(this.deps.db, post);
    await this.incrementViewCount(post.id, requestId);
    return response;
  }

  async list(params: {
    page: Pagination;
    categoryId?: string;
    tagId?: string;
  }): Promise<PostResponse[]> {
    const posts = await listPosts(
      this.deps.db,
      { publishedOnly: true, categoryId: params.categoryId, tagId: params.tagId },
      params.page,
    );
    return buildPostResponses(this.deps.db, posts);
  }

  async search(query: string, page: Pagination): Promise<PostResponse[]> {
    const posts = await listPosts(this.deps.db, { publishedOnly: true, search: query }, page);
    return buildPostResponses(this.deps.db, posts);
  }

  async listByAuthor(userId: string, page: Pagination): Promise<PostResponse[]> {
    const author = await getUserById(this.deps.db, userId);
    if (!author) throw PostErrors.authorNotFound({ userId });

    const posts = await listPosts(
      this.deps.db,
      { publishedOnly: false, authorId: author.id },
      page,
    );
    return buildPostResponses(this.deps.db, posts);
  }

  /**
   * Best-effort: a failed increment is logged and swallowed so the read
   * that triggered it still succeeds.
   */
  async incrementViewCount(postId: string, requestId: string): Promise<void> {
    try {
      await this.deps.postRepo.incrementViewCount(postId);
    } catch (err) {
      this.deps.logger.warn({
        msg: 'posts.view_count.failed',
        flow: 'posts.view',
        requestId,
        postId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  // ── Internals ────────────────────────────────────────────

  private async requirePost(postId: string): Promise<Post> {
    const post = await getPostById(this.deps.db, postId);
    if (!post) throw PostErrors.notFound({ postId });
    return post;
  }

  private async assertCategoryExists(categoryId: string): Promise<void> {
    const category = await getCategoryById(this.deps.db, categoryId);
    if (!category) throw PostErrors.categoryNotFound({ categoryId });
  }

  private async assertSlugAvailable(slug: string, excludeId?: string): Promise<void> {
    if (await isPostSlugTakenSql(this.deps.db, slug, excludeId)) {
      throw PostErrors.slugTaken({ slug });
    }
  }

  private async existingTagIds(requested: readonly string[]): Promise<string[]> {
    const unique = [...new Set(requested)];
    const tags = await getTagsByIds(this.deps.db, unique);
    return unique.filter((id) => tags.has(id));
  }

  private async withSlugConflictMapping<T>(slug: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (isUniqueViolation(err)) throw PostErrors.slugTaken({ slug });
      throw err;
    }
  }
}
