/**
 * backend/src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Protected endpoints call requireAuthContext(req) first.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  signupSchema,
  signinSchema,
  forgotPasswordSchema,
  resetPasswordSchema,
  changePasswordSchema,
} from './auth.schemas';
import { AppError } from '../../shared/http/errors';
import { requireAuthContext } from '../../shared/http/require-auth-context';
import { toUserResponse } from '../users/user.types';
import { AUTH_MESSAGES } from './auth.constants';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async signup(req: FastifyRequest, reply: FastifyReply) {
    const parsed = signupSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid request body', parsed.error.issues);
    }

    const result = await this.authService.register({
      email: parsed.data.email,
      username: parsed.data.username,
      password: parsed.data.password,
      fullName: parsed.data.fullName ?? null,
      bio: parsed.data.bio ?? null,
      profileImageUrl: parsed.data.profileImageUrl ?? null,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(result);
  }

  async signin(req: FastifyRequest, reply: FastifyReply) {
    const parsed = signinSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid request body', parsed.error.issues);
    }

    const result = await this.authService.signIn({
      email: parsed.data.email,
      password: parsed.data.password,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async forgotPassword(req: FastifyRequest, reply: FastifyReply) {
    const parsed = forgotPasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid request body', parsed.error.issues);
    }

    await this.authService.initiatePasswordReset({
      email: parsed.data.email,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ message: AUTH_MESSAGES.forgotPassword });
  }

  async resetPassword(req: FastifyRequest, reply: FastifyReply) {
    const parsed = resetPasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid request body', parsed.error.issues);
    }

    await this.authService.completePasswordReset({
      token: parsed.data.token,
      newPassword: parsed.data.newPassword,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ message: AUTH_MESSAGES.passwordReset });
  }

  async changePassword(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);

    const parsed = changePasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('Invalid request body', parsed.error.issues);
    }

    await this.authService.changePassword({
      claims,
      oldPassword: parsed.data.oldPassword,
      newPassword: parsed.data.newPassword,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ message: AUTH_MESSAGES.passwordChanged });
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const claims = requireAuthContext(req);
    const user = await this.authService.getCurrentUser(claims);
    return reply.status(200).send(toUserResponse(user));
  }
}
