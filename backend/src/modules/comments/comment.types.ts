/**
 * backend/src/modules/comments/comment.types.ts
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - New comments start unapproved; only the post's author approves them.
 */

import type { Audit, Lifecycle } from '../../shared/db/lifecycle';
import type { AuthorSummary } from '../users';

export type Comment = Audit & {
  id: string;
  content: string;
  postId: string;
  authorId: string;
  parentCommentId: string | null;
  isApproved: boolean;
  lifecycle: Lifecycle;
};

export type CommentResponse = {
  id: string;
  content: string;
  postId: string;
  authorId: string;
  parentCommentId: string | null;
  isApproved: boolean;
  dateAdded: Date;
  dateUpdated: Date;
  author: AuthorSummary | null;
};
