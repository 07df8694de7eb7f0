/**
 * backend/src/shared/security/jwt-token-service.ts
 *
 * WHY:
 * - Signed JWTs (HMAC, secret from config) for both token kinds.
 *
 * RULES:
 * - verify() pins the configured algorithm; a token signed with any other
 *   algorithm (including "none") is rejected.
 * - Expiry is enforced by jsonwebtoken: a token is rejected once now >= exp.
 * - Decoded payloads are validated with zod before anyone reads a claim.
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { JwtAlgorithm } from '../../app/config';
import type {
  AccessTokenClaims,
  PasswordResetTokenClaims,
  TokenKind,
  TokenRejection,
  TokenService,
  TokenVerification,
} from './token-service';

export type JwtTokenServiceOptions = Readonly<{
  secret: string;
  algorithm: JwtAlgorithm;
  accessTokenTtlMinutes: number;
  resetTokenTtlHours: number;
}>;

const BaseClaimsSchema = z.object({
  sub: z.string().min(1),
  type: z.string(),
  iat: z.number(),
  exp: z.number(),
});

const AccessClaimsSchema = BaseClaimsSchema.extend({
  type: z.literal('access'),
});

const ResetClaimsSchema = BaseClaimsSchema.extend({
  type: z.literal('password_reset'),
  pwv: z.number().int().min(0),
});

function rejectionFor(err: unknown): TokenRejection {
  if (err instanceof jwt.TokenExpiredError) return 'expired';
  if (err instanceof jwt.JsonWebTokenError && err.message === 'invalid signature') {
    return 'invalid_signature';
  }
  return 'malformed';
}

export class JwtTokenService implements TokenService {
  constructor(private readonly opts: JwtTokenServiceOptions) {}

  createAccessToken(userId: string): string {
    return jwt.sign({ type: 'access' }, this.opts.secret, {
      algorithm: this.opts.algorithm,
      subject: userId,
      expiresIn: this.opts.accessTokenTtlMinutes * 60,
    });
  }

  verifyAccessToken(token: string): TokenVerification<AccessTokenClaims> {
    return this.verify(token, 'access', AccessClaimsSchema);
  }

  createPasswordResetToken(userId: string, passwordVersion: number): string {
    return jwt.sign({ type: 'password_reset', pwv: passwordVersion }, this.opts.secret, {
      algorithm: this.opts.algorithm,
      subject: userId,
      expiresIn: this.opts.resetTokenTtlHours * 60 * 60,
    });
  }

  verifyPasswordResetToken(token: string): TokenVerification<PasswordResetTokenClaims> {
    return this.verify(token, 'password_reset', ResetClaimsSchema);
  }

  private verify<TClaims>(
    token: string,
    kind: TokenKind,
    schema: z.ZodType<TClaims>,
  ): TokenVerification<TClaims> {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.opts.secret, { algorithms: [this.opts.algorithm] });
    } catch (err) {
      return { valid: false, reason: rejectionFor(err) };
    }

    const base = BaseClaimsSchema.safeParse(decoded);
    if (!base.success) return { valid: false, reason: 'malformed' };
    if (base.data.type !== kind) return { valid: false, reason: 'wrong_kind' };

    const claims = schema.safeParse(decoded);
    if (!claims.success) return { valid: false, reason: 'malformed' };

    return { valid: true, claims: claims.data };
  }
}
