/**
 * backend/src/modules/posts/dal/post.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for posts and post_tags.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import { randomUUID } from 'node:crypto';
import { sql } from 'kysely';
import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { PostsTable } from '../../../shared/db/schema';

export type PostPatch = {
  title?: string;
  slug?: string;
  content?: string;
  excerpt?: string | null;
  categoryId?: string | null;
  isPublished?: boolean;
  publishedAt?: Date;
  featuredImageUrl?: string | null;
};

export class PostRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): PostRepo {
    return new PostRepo(db);
  }

  async insertPost(params: {
    title: string;
    slug: string;
    content: string;
    excerpt: string | null;
    authorId: string;
    categoryId: string | null;
    isPublished: boolean;
    featuredImageUrl: string | null;
    now: Date;
  }): Promise<{ id: string }> {
    const id = randomUUID();

    await this.db
      .insertInto('posts')
      .values({
        id,
        title: params.title,
        slug: params.slug,
        content: params.content,
        excerpt: params.excerpt,
        author_id: params.authorId,
        category_id: params.categoryId,
        is_published: params.isPublished,
        published_at: params.isPublished ? params.now : null,
        featured_image_url: params.featuredImageUrl,
        view_count: 0,
        date_added: params.now,
        date_updated: params.now,
        added_by: params.authorId,
        updated_by: params.authorId,
        deleted_at: null,
      })
      .execute();

    return { id };
  }

  async updatePost(params: {
    postId: string;
    patch: PostPatch;
    actorId: string;
    now: Date;
  }): Promise<void> {
    const { patch } = params;
    const set: Updateable<PostsTable> = {
      updated_by: params.actorId,
      date_updated: params.now,
    };
    if (patch.title !== undefined) set.title = patch.title;
    if (patch.slug !== undefined) set.slug = patch.slug;
    if (patch.content !== undefined) set.content = patch.content;
    if (patch.excerpt !== undefined) set.excerpt = patch.excerpt;
    if (patch.categoryId !== undefined) set.category_id = patch.categoryId;
    if (patch.isPublished !== undefined) set.is_published = patch.isPublished;
    if (patch.publishedAt !== undefined) set.published_at = patch.publishedAt;
    if (patch.featuredImageUrl !== undefined) set.featured_image_url = patch.featuredImageUrl;

    await this.db
      .updateTable('posts')
      .set(set)
      .where('id', '=', params.postId)
      .where('deleted_at', 'is', null)
      .execute();
  }

  async softDeletePost(params: { postId: string; actorId: string; now: Date }): Promise<void> {
    await this.db
      .updateTable('posts')
      .set({
        deleted_at: params.now,
        updated_by: params.actorId,
        date_updated: params.now,
      })
      .where('id', '=', params.postId)
      .where('deleted_at', 'is', null)
      .execute();
  }

  /** Replaces the post's tag links with exactly `tagIds`. */
  async replacePostTags(params: {
    postId: string;
    tagIds: readonly string[];
    actorId: string;
    now: Date;
  }): Promise<void> {
    await this.db.deleteFrom('post_tags').where('post_id', '=', params.postId).execute();

    if (params.tagIds.length === 0) return;

    await this.db
      .insertInto('post_tags')
      .values(
        params.tagIds.map((tagId) => ({
          post_id: params.postId,
          tag_id: tagId,
          date_added: params.now,
          added_by: params.actorId,
        })),
      )
      .execute();
  }

  /**
   * Single atomic UPDATE. Not part of any read transaction; concurrent
   * increments may race but never corrupt the row.
   */
  async incrementViewCount(postId: string): Promise<void> {
    await this.db
      .updateTable('posts')
      .set({ view_count: sql<number>`view_count + 1` })
      .where('id', '=', postId)
      .where('deleted_at', 'is', null)
      .execute();
  }
}
