/**
 * backend/src/modules/comments/queries/comment.queries.ts
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { lifecycleFromDeletedAt } from '../../../shared/db/lifecycle';
import { getUsersByIds, toAuthorSummary } from '../../users';
import { selectApprovedCommentsForPostSql, selectCommentByIdSql } from '../dal/comment.query-sql';
import type { CommentRow } from '../dal/comment.query-sql';
import type { Comment, CommentResponse } from '../comment.types';

function toComment(row: CommentRow): Comment {
  return {
    id: row.id,
    content: row.content,
    postId: row.post_id,
    authorId: row.author_id,
    parentCommentId: row.parent_comment_id ?? null,
    isApproved: row.is_approved,
    lifecycle: lifecycleFromDeletedAt(row.deleted_at),
    dateAdded: row.date_added,
    dateUpdated: row.date_updated,
    addedBy: row.added_by,
    updatedBy: row.updated_by,
  };
}

export async function getCommentById(
  db: DbExecutor,
  commentId: string,
): Promise<Comment | undefined> {
  const row = await selectCommentByIdSql(db, commentId);
  if (!row) return undefined;
  return toComment(row);
}

export async function listApprovedCommentsForPost(
  db: DbExecutor,
  postId: string,
  page: { skip: number; limit: number },
): Promise<Comment[]> {
  const rows = await selectApprovedCommentsForPostSql(db, postId, page);
  return rows.map(toComment);
}

export async function buildCommentResponses(
  db: DbExecutor,
  comments: readonly Comment[],
): Promise<CommentResponse[]> {
  const authors = await getUsersByIds(db, [...new Set(comments.map((c) => c.authorId))]);

  return comments.map((comment) => {
    const author = authors.get(comment.authorId);
    return {
      id: comment.id,
      content: comment.content,
      postId: comment.postId,
      authorId: comment.authorId,
      parentCommentId: comment.parentCommentId,
      isApproved: comment.isApproved,
      dateAdded: comment.dateAdded,
      dateUpdated: comment.dateUpdated,
      author: author ? toAuthorSummary(author) : null,
    };
  });
}

export async function buildCommentResponse(
  db: DbExecutor,
  comment: Comment,
): Promise<CommentResponse> {
  const [response] = await buildCommentResponses(db, [comment]);
  if (!response) throw new Error(`comment ${comment.id} produced no response`);
  return response;
}
