/**
 * backend/src/modules/comments/comment.controller.ts
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { requireAuthContext } from '../../shared/http/require-auth-context';
import { idParamsSchema } from '../../shared/http/request-schemas';
import { parseOrThrow } from '../../shared/http/parse-request';
import {
  createCommentSchema,
  listCommentsQuerySchema,
  postParamsSchema,
  updateCommentSchema,
} from './comment.schemas';
import type { CommentService } from './comment.service';

export class CommentController {
  constructor(private readonly commentService: CommentService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);
    const { postId } = parseOrThrow(postParamsSchema, req.params, 'Invalid post id');
    const input = parseOrThrow(createCommentSchema, req.body, 'Invalid request body');

    const comment = await this.commentService.create({
      claims,
      postId,
      input,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(comment);
  }

  async listForPost(req: FastifyRequest, reply: FastifyReply) {
    const { postId } = parseOrThrow(postParamsSchema, req.params, 'Invalid post id');
    const page = parseOrThrow(listCommentsQuerySchema, req.query, 'Invalid query parameters');

    const comments = await this.commentService.listForPost(postId, page);
    return reply.status(200).send(comments);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid comment id');
    const comment = await this.commentService.getById(id);
    return reply.status(200).send(comment);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid comment id');
    const input = parseOrThrow(updateCommentSchema, req.body, 'Invalid request body');

    const comment = await this.commentService.update({
      claims,
      commentId: id,
      input,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(comment);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid comment id');

    await this.commentService.softDelete({
      claims,
      commentId: id,
      requestId: req.requestContext.requestId,
    });

    return reply.status(204).send();
  }

  async approve(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid comment id');

    const comment = await this.commentService.approve({
      claims,
      commentId: id,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(comment);
  }
}
