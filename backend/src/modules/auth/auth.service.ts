/**
 * backend/src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates signup, sign-in, password reset and password change.
 * - Only place in the auth module allowed to start transactions.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Never store/log raw passwords or tokens.
 * - Emails are best-effort: a failed enqueue is logged, never surfaced.
 *
 * STRUCTURE:
 * - register(): probes email, then username, then inserts in one transaction.
 *   A unique violation from a concurrent signup maps to the same conflicts.
 * - authenticate(): null for unknown email and wrong password alike.
 * - initiatePasswordReset(): always returns normally (anti-enumeration).
 * - completePasswordReset(): the reset token carries the password_version it
 *   was issued for; any password change bumps it, so a token works once.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenService } from '../../shared/security/token-service';
import type { Logger } from '../../shared/logger/logger';
import type { Queue, QueueMessage } from '../../shared/messaging/queue';
import type { AuthClaims } from '../../shared/http/require-auth-context';
import { isUniqueViolation } from '../../shared/db/db-errors';

import type { UserRepo } from '../users/dal/user.repo';
import type { User } from '../users/user.types';
import { toUserResponse } from '../users/user.types';
import {
  findUserConflicts,
  getUserByEmail,
  getUserById,
  getUserCredentialsByEmail,
  getUserCredentialsById,
} from '../users/queries/user.queries';
import { resolveIdentity } from '../_shared/identity/resolve-identity';

import { AuthErrors } from './auth.errors';
import { TOKEN_TYPE } from './auth.constants';
import type { AuthResult } from './auth.types';

// We avoid putting raw emails into operational logs.
function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

// ── Params ──────────────────────────────────────────────────

export type RegisterParams = {
  email: string;
  username: string;
  password: string;
  fullName: string | null;
  bio: string | null;
  profileImageUrl: string | null;
  requestId: string;
};

export type SignInParams = {
  email: string;
  password: string;
  requestId: string;
};

export type CompletePasswordResetParams = {
  token: string;
  newPassword: string;
  requestId: string;
};

export type ChangePasswordParams = {
  claims: AuthClaims;
  oldPassword: string;
  newPassword: string;
  requestId: string;
};

// ── Service ─────────────────────────────────────────────────

export class AuthService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      passwordHasher: PasswordHasher;
      tokenService: TokenService;
      logger: Logger;
      queue: Queue;
      userRepo: UserRepo;
    },
  ) {}

  // ── Signup ───────────────────────────────────────────────

  async register(params: RegisterParams): Promise<AuthResult> {
    const email = params.email.toLowerCase();

    const conflicts = await findUserConflicts(this.deps.db, {
      email,
      username: params.username,
    });
    if (conflicts.emailTaken) throw AuthErrors.emailTaken();
    if (conflicts.usernameTaken) throw AuthErrors.usernameTaken();

    const passwordHash = await this.deps.passwordHasher.hash(params.password);
    const now = new Date();

    let user: User;
    try {
      user = await this.deps.db.transaction().execute(async (trx) => {
        const { id } = await this.deps.userRepo.withDb(trx).insertUser({
          email,
          username: params.username,
          passwordHash,
          fullName: params.fullName,
          bio: params.bio,
          profileImageUrl: params.profileImageUrl,
          now,
        });

        const created = await getUserById(trx, id);
        if (!created) throw new Error(`user ${id} missing after insert`);
        return created;
      });
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      // Lost a race with a concurrent signup: report the same conflict the probes would.
      const raced = await findUserConflicts(this.deps.db, { email, username: params.username });
      throw raced.emailTaken || !raced.usernameTaken
        ? AuthErrors.emailTaken()
        : AuthErrors.usernameTaken();
    }

    const accessToken = this.deps.tokenService.createAccessToken(user.id);

    await this.enqueueBestEffort(
      {
        type: 'account.welcome-email',
        userId: user.id,
        email: user.email,
        username: user.username,
      },
      params.requestId,
    );

    this.deps.logger.info({
      msg: 'auth.register.success',
      flow: 'auth.register',
      requestId: params.requestId,
      userId: user.id,
      emailDomain: emailDomain(email),
    });

    return { accessToken, tokenType: TOKEN_TYPE, user: toUserResponse(user) };
  }

  // ── Sign in ──────────────────────────────────────────────

  /** Returns the user when the credentials match, otherwise null. */
  async authenticate(email: string, password: string): Promise<User | null> {
    const credentials = await getUserCredentialsByEmail(this.deps.db, email);
    if (!credentials) return null;

    const ok = await this.deps.passwordHasher.verify(password, credentials.passwordHash);
    return ok ? credentials.user : null;
  }

  async signIn(params: SignInParams): Promise<AuthResult> {
    const user = await this.authenticate(params.email, params.password);

    if (!user) {
      this.deps.logger.info({
        msg: 'auth.signin.failed',
        flow: 'auth.signin',
        requestId: params.requestId,
        emailDomain: emailDomain(params.email),
      });
      throw AuthErrors.invalidCredentials();
    }

    if (!user.isActive) {
      throw AuthErrors.accountInactive({ userId: user.id });
    }

    this.deps.logger.info({
      msg: 'auth.signin.success',
      flow: 'auth.signin',
      requestId: params.requestId,
      userId: user.id,
    });

    return {
      accessToken: this.deps.tokenService.createAccessToken(user.id),
      tokenType: TOKEN_TYPE,
      user: toUserResponse(user),
    };
  }

  // ── Forgot password ──────────────────────────────────────

  async initiatePasswordReset(params: { email: string; requestId: string }): Promise<void> {
    const user = await getUserByEmail(this.deps.db, params.email);

    if (!user) {
      this.deps.logger.info({
        msg: 'auth.forgot_password.unknown_email',
        flow: 'auth.forgot-password',
        requestId: params.requestId,
        emailDomain: emailDomain(params.email),
      });
      return;
    }

    const resetToken = this.deps.tokenService.createPasswordResetToken(
      user.id,
      user.passwordVersion,
    );

    await this.enqueueBestEffort(
      {
        type: 'account.reset-password-email',
        userId: user.id,
        email: user.email,
        username: user.username,
        resetToken,
      },
      params.requestId,
    );

    this.deps.logger.info({
      msg: 'auth.forgot_password.sent',
      flow: 'auth.forgot-password',
      requestId: params.requestId,
      userId: user.id,
    });
  }

  // ── Reset password ───────────────────────────────────────

  async completePasswordReset(params: CompletePasswordResetParams): Promise<void> {
    const verification = this.deps.tokenService.verifyPasswordResetToken(params.token);
    if (!verification.valid) {
      this.deps.logger.info({
        msg: 'auth.reset_password.token_rejected',
        flow: 'auth.reset-password',
        requestId: params.requestId,
        reason: verification.reason,
      });
      throw AuthErrors.resetTokenInvalid();
    }

    const { sub: userId, pwv } = verification.claims;

    const user = await getUserById(this.deps.db, userId);
    if (!user) {
      throw AuthErrors.userNotFound({ userId });
    }

    const rejectStale = () => {
      this.deps.logger.info({
        msg: 'auth.reset_password.token_rejected',
        flow: 'auth.reset-password',
        requestId: params.requestId,
        reason: 'stale_password_version',
        userId,
      });
      return AuthErrors.resetTokenInvalid();
    };

    if (user.passwordVersion !== pwv) throw rejectStale();

    // A concurrent reset with the same token may have bumped the version since the read.
    const updated = await this.updatePassword(user.id, params.newPassword, user.id, pwv);
    if (!updated) throw rejectStale();

    this.deps.logger.info({
      msg: 'auth.reset_password.completed',
      flow: 'auth.reset-password',
      requestId: params.requestId,
      userId,
    });
  }

  // ── Change password ──────────────────────────────────────

  async changePassword(params: ChangePasswordParams): Promise<void> {
    const identity = await resolveIdentity(this.deps.db, params.claims);

    const credentials = await getUserCredentialsById(this.deps.db, identity.id);
    if (!credentials) {
      throw AuthErrors.userNotFound({ userId: identity.id });
    }

    const ok = await this.deps.passwordHasher.verify(params.oldPassword, credentials.passwordHash);
    if (!ok) {
      throw AuthErrors.incorrectCurrentPassword({ userId: identity.id });
    }

    await this.updatePassword(identity.id, params.newPassword, identity.id);

    this.deps.logger.info({
      msg: 'auth.change_password.completed',
      flow: 'auth.change-password',
      requestId: params.requestId,
      userId: identity.id,
    });
  }

  // ── Current user ─────────────────────────────────────────

  async getCurrentUser(claims: AuthClaims): Promise<User> {
    return resolveIdentity(this.deps.db, claims);
  }

  // ── Internals ────────────────────────────────────────────

  private async updatePassword(
    userId: string,
    newPassword: string,
    actorId: string,
    expectedPasswordVersion?: number,
  ): Promise<boolean> {
    const passwordHash = await this.deps.passwordHasher.hash(newPassword);
    const now = new Date();

    return this.deps.db.transaction().execute(async (trx) =>
      this.deps.userRepo
        .withDb(trx)
        .updatePassword({ userId, passwordHash, actorId, now, expectedPasswordVersion }),
    );
  }

  private async enqueueBestEffort(message: QueueMessage, requestId: string): Promise<void> {
    try {
      await this.deps.queue.enqueue(message);
    } catch (err) {
      this.deps.logger.warn({
        msg: 'auth.email.enqueue_failed',
        flow: 'auth.email',
        requestId,
        type: message.type,
        userId: message.userId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
