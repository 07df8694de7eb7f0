/**
 * backend/src/modules/comments/dal/comment.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for comments.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Supports withDb() for transaction binding.
 */

import { randomUUID } from 'node:crypto';
import type { DbExecutor } from '../../../shared/db/db';

export class CommentRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): CommentRepo {
    return new CommentRepo(db);
  }

  async insertComment(params: {
    content: string;
    postId: string;
    authorId: string;
    parentCommentId: string | null;
    now: Date;
  }): Promise<{ id: string }> {
    const id = randomUUID();

    await this.db
      .insertInto('comments')
      .values({
        id,
        content: params.content,
        post_id: params.postId,
        author_id: params.authorId,
        parent_comment_id: params.parentCommentId,
        is_approved: false,
        date_added: params.now,
        date_updated: params.now,
        added_by: params.authorId,
        updated_by: params.authorId,
        deleted_at: null,
      })
      .execute();

    return { id };
  }

  async updateContent(params: {
    commentId: string;
    content: string;
    actorId: string;
    now: Date;
  }): Promise<void> {
    await this.db
      .updateTable('comments')
      .set({
        content: params.content,
        updated_by: params.actorId,
        date_updated: params.now,
      })
      .where('id', '=', params.commentId)
      .where('deleted_at', 'is', null)
      .execute();
  }

  async markApproved(params: { commentId: string; actorId: string; now: Date }): Promise<void> {
    await this.db
      .updateTable('comments')
      .set({
        is_approved: true,
        updated_by: params.actorId,
        date_updated: params.now,
      })
      .where('id', '=', params.commentId)
      .where('deleted_at', 'is', null)
      .execute();
  }

  async softDeleteComment(params: { commentId: string; actorId: string; now: Date }) {
    await this.db
      .updateTable('comments')
      .set({
        deleted_at: params.now,
        updated_by: params.actorId,
        date_updated: params.now,
      })
      .where('id', '=', params.commentId)
      .where('deleted_at', 'is', null)
      .execute();
  }
}
