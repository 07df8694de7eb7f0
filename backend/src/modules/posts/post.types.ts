/**
 * backend/src/modules/posts/post.types.ts
 *
 * WHY:
 * - Domain types for posts and the shape the API returns for them.
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - publishedAt is stamped the first time a post is published and never
 *   cleared by unpublishing.
 */

import type { Audit, Lifecycle } from '../../shared/db/lifecycle';
import type { AuthorSummary } from '../users';
import type { CategoryResponse } from '../categories';
import type { TagResponse } from '../tags';

export type Post = Audit & {
  id: string;
  title: string;
  slug: string;
  content: string;
  excerpt: string | null;
  authorId: string;
  categoryId: string | null;
  isPublished: boolean;
  publishedAt: Date | null;
  featuredImageUrl: string | null;
  viewCount: number;
  lifecycle: Lifecycle;
};

export type PostResponse = {
  id: string;
  title: string;
  slug: string;
  content: string;
  excerpt: string | null;
  authorId: string;
  categoryId: string | null;
  isPublished: boolean;
  publishedAt: Date | null;
  featuredImageUrl: string | null;
  viewCount: number;
  dateAdded: Date;
  dateUpdated: Date;
  /** null when the author account has since been deleted. */
  author: AuthorSummary | null;
  category: CategoryResponse | null;
  tags: TagResponse[];
};

export type PostListFilters = {
  publishedOnly: boolean;
  categoryId?: string;
  tagId?: string;
  authorId?: string;
  search?: string;
};
