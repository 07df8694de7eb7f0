import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireAuthContext } from '../../shared/http/require-auth-context';
import { idParamsSchema } from '../../shared/http/request-schemas';
import {
  createTagSchema,
  listTagsQuerySchema,
  updateTagSchema,
} from './tag.schemas';
import { toTagResponse } from './tag.types';
import type { TagService } from './tag.service';

function parseTagId(req: FastifyRequest): string {
  const parsed = idParamsSchema.safeParse(req.params);
  if (!parsed.success) {
    throw AppError.invalidInput('Invalid tag id', parsed.error.issues);
  }
  return parsed.data.id;
}

export class TagController {
  constructor(private readonly tagService: TagService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);

    const parsed = createTagSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid request body', parsed.error.issues);
    }

    const tag = await this.tagService.create({
      claims,
      input: parsed.data,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(toTagResponse(tag));
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const parsed = listTagsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid query parameters', parsed.error.issues);
    }

    const tags = await this.tagService.list(parsed.data);
    return reply.status(200).send(tags.map(toTagResponse));
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const tag = await this.tagService.getById(parseTagId(req));
    return reply.status(200).send(toTagResponse(tag));
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);
    const tagId = parseTagId(req);

    const parsed = updateTagSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid request body', parsed.error.issues);
    }

    const tag = await this.tagService.update({
      claims,
      tagId,
      input: parsed.data,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(toTagResponse(tag));
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);

    await this.tagService.softDelete({
      claims,
      tagId: parseTagId(req),
      requestId: req.requestContext.requestId,
    });

    return reply.status(204).send();
  }
}
