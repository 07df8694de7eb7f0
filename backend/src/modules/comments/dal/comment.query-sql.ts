/**
 * backend/src/modules/comments/dal/comment.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for comments.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 * - Soft-deleted comments are never returned.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { CommentsTable } from '../../../shared/db/schema';

export type CommentRow = Selectable<CommentsTable>;

export async function selectCommentByIdSql(
  db: DbExecutor,
  commentId: string,
): Promise<CommentRow | undefined> {
  return db
    .selectFrom('comments')
    .selectAll()
    .where('id', '=', commentId)
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectApprovedCommentsForPostSql(
  db: DbExecutor,
  postId: string,
  page: { skip: number; limit: number },
): Promise<CommentRow[]> {
  return db
    .selectFrom('comments')
    .selectAll()
    .where('post_id', '=', postId)
    .where('is_approved', '=', true)
    .where('deleted_at', 'is', null)
    .orderBy('date_added', 'desc')
    .orderBy('id')
    .offset(page.skip)
    .limit(page.limit)
    .execute();
}
