/**
 * backend/src/modules/posts/queries/post.queries.ts
 *
 * WHY:
 * - Shape post rows into Post domain types.
 * - Assemble API responses (author, category, tags) with one batched read
 *   per relation instead of one per post.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { lifecycleFromDeletedAt } from '../../../shared/db/lifecycle';
import { getUsersByIds, toAuthorSummary } from '../../users';
import { getCategoriesByIds, toCategoryResponse } from '../../categories';
import { toTagResponse } from '../../tags';
import type { TagResponse } from '../../tags';
import {
  selectActiveTagsForPostsSql,
  selectPostByIdSql,
  selectPostBySlugSql,
  selectPostsSql,
} from '../dal/post.query-sql';
import type { PostRow, PostTagRow } from '../dal/post.query-sql';
import type { Post, PostListFilters, PostResponse } from '../post.types';

function toPost(row: PostRow): Post {
  return {
    id: row.id,
    title: row.title,
    slug: row.slug,
    content: row.content,
    excerpt: row.excerpt ?? null,
    authorId: row.author_id,
    categoryId: row.category_id ?? null,
    isPublished: row.is_published,
    publishedAt: row.published_at ?? null,
    featuredImageUrl: row.featured_image_url ?? null,
    viewCount: row.view_count,
    lifecycle: lifecycleFromDeletedAt(row.deleted_at),
    dateAdded: row.date_added,
    dateUpdated: row.date_updated,
    addedBy: row.added_by,
    updatedBy: row.updated_by,
  };
}

function tagResponseFromRow(row: PostTagRow): TagResponse {
  return toTagResponse({
    id: row.id,
    name: row.name,
    slug: row.slug,
    lifecycle: lifecycleFromDeletedAt(row.deleted_at),
    dateAdded: row.date_added,
    dateUpdated: row.date_updated,
    addedBy: row.added_by,
    updatedBy: row.updated_by,
  });
}

export async function getPostById(db: DbExecutor, postId: string): Promise<Post | undefined> {
  const row = await selectPostByIdSql(db, postId);
  if (!row) return undefined;
  return toPost(row);
}

export async function getPostBySlug(db: DbExecutor, slug: string): Promise<Post | undefined> {
  const row = await selectPostBySlugSql(db, slug);
  if (!row) return undefined;
  return toPost(row);
}

export async function listPosts(
  db: DbExecutor,
  filters: PostListFilters,
  page: { skip: number; limit: number },
): Promise<Post[]> {
  const rows = await selectPostsSql(db, filters, page);
  return rows.map(toPost);
}

export async function buildPostResponses(
  db: DbExecutor,
  posts: readonly Post[],
): Promise<PostResponse[]> {
  const authorIds = [...new Set(posts.map((p) => p.authorId))];
  const categoryIds = [
    ...new Set(posts.flatMap((p) => (p.categoryId === null ? [] : [p.categoryId]))),
  ];

  const [authors, categories, tagRows] = await Promise.all([
    getUsersByIds(db, authorIds),
    getCategoriesByIds(db, categoryIds),
    selectActiveTagsForPostsSql(
      db,
      posts.map((p) => p.id),
    ),
  ]);

  const tagsByPost = new Map<string, TagResponse[]>();
  for (const row of tagRows) {
    const list = tagsByPost.get(row.post_id) ?? [];
    list.push(tagResponseFromRow(row));
    tagsByPost.set(row.post_id, list);
  }

  return posts.map((post) => {
    const author = authors.get(post.authorId);
    const category = post.categoryId === null ? undefined : categories.get(post.categoryId);

    return {
      id: post.id,
      title: post.title,
      slug: post.slug,
      content: post.content,
      excerpt: post.excerpt,
      authorId: post.authorId,
      categoryId: post.categoryId,
      isPublished: post.isPublished,
      publishedAt: post.publishedAt,
      featuredImageUrl: post.featuredImageUrl,
      viewCount: post.viewCount,
      dateAdded: post.dateAdded,
      dateUpdated: post.dateUpdated,
      author: author ? toAuthorSummary(author) : null,
      category: category ? toCategoryResponse(category) : null,
      tags: tagsByPost.get(post.id) ?? [],
    };
  });
}

export async function buildPostResponse(db: DbExecutor, post: Post): Promise<PostResponse> {
  const [response] = await buildPostResponses(db, [post]);
  if (!response) throw new Error(`post ${post.id} produced no response`);
  return response;
}
