/**
 * backend/src/modules/posts/post.controller.ts
 *
 * WHY:
 * - Maps HTTP → PostService for every /posts endpoint.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Reads are public; writes call requireAuthContext(req) first.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { requireAuthContext } from '../../shared/http/require-auth-context';
import { idParamsSchema } from '../../shared/http/request-schemas';
import { parseOrThrow } from '../../shared/http/parse-request';
import {
  createPostSchema,
  listPostsQuerySchema,
  pagedPostsQuerySchema,
  searchParamsSchema,
  slugParamsSchema,
  updatePostSchema,
  userPostsParamsSchema,
} from './post.schemas';
import type { PostService } from './post.service';

export class PostController {
  constructor(private readonly postService: PostService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);
    const input = parseOrThrow(createPostSchema, req.body, 'Invalid request body');

    const post = await this.postService.create({
      claims,
      input,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(post);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const query = parseOrThrow(listPostsQuerySchema, req.query, 'Invalid query parameters');

    const posts = await this.postService.list({
      page: { skip: query.skip, limit: query.limit },
      categoryId: query.categoryId,
      tagId: query.tagId,
    });

    return reply.status(200).send(posts);
  }

  async search(req: FastifyRequest, reply: FastifyReply) {
    const { query } = parseOrThrow(searchParamsSchema, req.params, 'Invalid search query');
    const page = parseOrThrow(pagedPostsQuerySchema, req.query, 'Invalid query parameters');

    const posts = await this.postService.search(query, page);
    return reply.status(200).send(posts);
  }

  async listByAuthor(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = parseOrThrow(userPostsParamsSchema, req.params, 'Invalid user id');
    const page = parseOrThrow(pagedPostsQuerySchema, req.query, 'Invalid query parameters');

    const posts = await this.postService.listByAuthor(userId, page);
    return reply.status(200).send(posts);
  }

  async getBySlug(req: FastifyRequest, reply: FastifyReply) {
    const { slug } = parseOrThrow(slugParamsSchema, req.params, 'Invalid slug');
    const post = await this.postService.getBySlug(slug, req.requestContext.requestId);
    return reply.status(200).send(post);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid post id');
    const post = await this.postService.getById(id, req.requestContext.requestId);
    return reply.status(200).send(post);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid post id');
    const input = parseOrThrow(updatePostSchema, req.body, 'Invalid request body');

    const post = await this.postService.update({
      claims,
      postId: id,
      input,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(post);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid post id');

    await this.postService.softDelete({
      claims,
      postId: id,
      requestId: req.requestContext.requestId,
    });

    return reply.status(204).send();
  }
}
