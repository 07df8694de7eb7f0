/**
 * backend/src/modules/comments/comment.service.ts
 *
 * WHY:
 * - Comment use-cases: create, read, list per post, edit, soft delete, approve.
 *
 * RULES:
 * - A parent comment must be an active comment of the same post.
 * - Public listings show approved comments only.
 * - Edit and delete belong to the comment's author; approval belongs to the
 *   author of the post the comment sits on.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuthClaims } from '../../shared/http/require-auth-context';
import type { Pagination } from '../../shared/http/request-schemas';
import { resolveIdentity } from '../_shared/identity/resolve-identity';
import { assertCanMutate } from '../_shared/policies/ownership.policy';
import { getPostById } from '../posts';
import type { Post } from '../posts';

import type { CommentRepo } from './dal/comment.repo';
import {
  buildCommentResponse,
  buildCommentResponses,
  getCommentById,
  listApprovedCommentsForPost,
} from './queries/comment.queries';
import { CommentErrors } from './comment.errors';
import type { CreateCommentInput, UpdateCommentInput } from './comment.schemas';
import type { Comment, CommentResponse } from './comment.types';

export class CommentService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      commentRepo: CommentRepo;
    },
  ) {}

  async create(params: {
    claims: AuthClaims;
    postId: string;
    input: CreateCommentInput;
    requestId: string;
  }): Promise<CommentResponse> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const post = await this.requirePost(params.postId);

    const parentCommentId = params.input.parentCommentId ?? null;
    if (parentCommentId !== null) {
      const parent = await getCommentById(this.deps.db, parentCommentId);
      if (!parent || parent.postId !== post.id) {
        throw CommentErrors.parentNotFound({ parentCommentId, postId: post.id });
      }
    }

    const now = new Date();
    const comment = await this.deps.db.transaction().execute(async (trx) => {
      const { id } = await this.deps.commentRepo.withDb(trx).insertComment({
        content: params.input.content,
        postId: post.id,
        authorId: identity.id,
        parentCommentId,
        now,
      });

      const created = await getCommentById(trx, id);
      if (!created) throw new Error(`comment ${id} missing after insert`);
      return created;
    });

    this.deps.logger.info({
      msg: 'comments.create.success',
      flow: 'comments.create',
      requestId: params.requestId,
      commentId: comment.id,
      postId: post.id,
      userId: identity.id,
    });

    return buildCommentResponse(this.deps.db, comment);
  }

  async getById(commentId: string): Promise<CommentResponse> {
    const comment = await this.requireComment(commentId);
    return buildCommentResponse(this.deps.db, comment);
  }

  async listForPost(postId: string, page: Pagination): Promise<CommentResponse[]> {
    const post = await this.requirePost(postId);
    const comments = await listApprovedCommentsForPost(this.deps.db, post.id, page);
    return buildCommentResponses(this.deps.db, comments);
  }

  async update(params: {
    claims: AuthClaims;
    commentId: string;
    input: UpdateCommentInput;
    requestId: string;
  }): Promise<CommentResponse> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const existing = await this.requireComment(params.commentId);

    assertCanMutate({
      kind: 'comment',
      action: 'update',
      resource: { id: existing.id, authorId: existing.authorId },
      identity,
    });

    const now = new Date();
    const comment = await this.deps.db.transaction().execute(async (trx) => {
      await this.deps.commentRepo.withDb(trx).updateContent({
        commentId: existing.id,
        content: params.input.content,
        actorId: identity.id,
        now,
      });

      const updated = await getCommentById(trx, existing.id);
      if (!updated) throw CommentErrors.notFound({ commentId: existing.id });
      return updated;
    });

    this.deps.logger.info({
      msg: 'comments.update.success',
      flow: 'comments.update',
      requestId: params.requestId,
      commentId: comment.id,
      userId: identity.id,
    });

    return buildCommentResponse(this.deps.db, comment);
  }

  async softDelete(params: {
    claims: AuthClaims;
    commentId: string;
    requestId: string;
  }): Promise<void> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const existing = await this.requireComment(params.commentId);

    assertCanMutate({
      kind: 'comment',
      action: 'delete',
      resource: { id: existing.id, authorId: existing.authorId },
      identity,
    });

    const now = new Date();
    await this.deps.db.transaction().execute(async (trx) => {
      await this.deps.commentRepo
        .withDb(trx)
        .softDeleteComment({ commentId: existing.id, actorId: identity.id, now });
    });

    this.deps.logger.info({
      msg: 'comments.delete.success',
      flow: 'comments.delete',
      requestId: params.requestId,
      commentId: existing.id,
      userId: identity.id,
    });
  }

  /** Approving an already approved comment is a no-op that still returns it. */
  async approve(params: {
    claims: AuthClaims;
    commentId: string;
    requestId: string;
  }): Promise<CommentResponse> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const existing = await this.requireComment(params.commentId);
    const post = await this.requirePost(existing.postId);

    // The post's author moderates, not the comment's.
    assertCanMutate({
      kind: 'comment',
      action: 'approve',
      resource: { id: existing.id, authorId: post.authorId },
      identity,
    });

    if (existing.isApproved) return buildCommentResponse(this.deps.db, existing);

    const now = new Date();
    const comment = await this.deps.db.transaction().execute(async (trx) => {
      await this.deps.commentRepo
        .withDb(trx)
        .markApproved({ commentId: existing.id, actorId: identity.id, now });

      const approved = await getCommentById(trx, existing.id);
      if (!approved) throw CommentErrors.notFound({ commentId: existing.id });
      return approved;
    });

    this.deps.logger.info({
      msg: 'comments.approve.success',
      flow: 'comments.approve',
      requestId: params.requestId,
      commentId: comment.id,
      postId: post.id,
      userId: identity.id,
    });

    return buildCommentResponse(this.deps.db, comment);
  }

  private async requireComment(commentId: string): Promise<Comment> {
    const comment = await getCommentById(this.deps.db, commentId);
    if (!comment) throw CommentErrors.notFound({ commentId });
    return comment;
  }

  private async requirePost(postId: string): Promise<Post> {
    const post = await getPostById(this.deps.db, postId);
    if (!post) throw CommentErrors.postNotFound({ postId });
    return post;
  }
}
