/**
 * backend/src/modules/categories/category.controller.ts
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Reads are public; writes call requireAuthContext(req) first.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireAuthContext } from '../../shared/http/require-auth-context';
import { idParamsSchema } from '../../shared/http/request-schemas';
import {
  createCategorySchema,
  listCategoriesQuerySchema,
  updateCategorySchema,
} from './category.schemas';
import { toCategoryResponse } from './category.types';
import type { CategoryService } from './category.service';

function parseCategoryId(req: FastifyRequest): string {
  const parsed = idParamsSchema.safeParse(req.params);
  if (!parsed.success) {
    throw AppError.invalidInput('Invalid category id', parsed.error.issues);
  }
  return parsed.data.id;
}

export class CategoryController {
  constructor(private readonly categoryService: CategoryService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);

    const parsed = createCategorySchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid request body', parsed.error.issues);
    }

    const category = await this.categoryService.create({
      claims,
      input: parsed.data,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(toCategoryResponse(category));
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const parsed = listCategoriesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid query parameters', parsed.error.issues);
    }

    const categories = await this.categoryService.list(parsed.data);
    return reply.status(200).send(categories.map(toCategoryResponse));
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const category = await this.categoryService.getById(parseCategoryId(req));
    return reply.status(200).send(toCategoryResponse(category));
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);
    const categoryId = parseCategoryId(req);

    const parsed = updateCategorySchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid request body', parsed.error.issues);
    }

    const category = await this.categoryService.update({
      claims,
      categoryId,
      input: parsed.data,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(toCategoryResponse(category));
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);

    await this.categoryService.softDelete({
      claims,
      categoryId: parseCategoryId(req),
      requestId: req.requestContext.requestId,
    });

    return reply.status(204).send();
  }
}
