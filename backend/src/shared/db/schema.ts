/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Table interfaces for Kysely. Kept by hand next to the migrations; any
 *   migration that changes a column must change this file in the same commit.
 *
 * RULES:
 * - Column names stay snake_case, exactly as in SQL.
 * - Ids and timestamps are produced by the application, never by DB defaults,
 *   so every column is supplied on insert.
 */

export interface AuditColumns {
  date_added: Date;
  date_updated: Date;
  added_by: string | null;
  updated_by: string | null;
  deleted_at: Date | null;
}

export interface UsersTable extends AuditColumns {
  id: string;
  email: string;
  username: string;
  full_name: string | null;
  password_hash: string;
  is_active: boolean;
  is_verified: boolean;
  bio: string | null;
  profile_image_url: string | null;
  password_version: number;
}

export interface CategoriesTable extends AuditColumns {
  id: string;
  name: string;
  slug: string;
  description: string | null;
}

export interface TagsTable extends AuditColumns {
  id: string;
  name: string;
  slug: string;
}

export interface PostsTable extends AuditColumns {
  id: string;
  title: string;
  slug: string;
  content: string;
  excerpt: string | null;
  author_id: string;
  category_id: string | null;
  is_published: boolean;
  published_at: Date | null;
  featured_image_url: string | null;
  view_count: number;
}

export interface CommentsTable extends AuditColumns {
  id: string;
  content: string;
  post_id: string;
  author_id: string;
  parent_comment_id: string | null;
  is_approved: boolean;
}

export interface PostTagsTable {
  post_id: string;
  tag_id: string;
  date_added: Date;
  added_by: string | null;
}

export interface DB {
  users: UsersTable;
  categories: CategoriesTable;
  tags: TagsTable;
  posts: PostsTable;
  comments: CommentsTable;
  post_tags: PostTagsTable;
}
