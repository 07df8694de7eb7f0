/**
 * backend/src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "I need to send an email" from "here is how emails are sent".
 * - The auth service enqueues messages; rendering and SMTP are wired at the DI
 *   layer only. The service never changes when the transport changes.
 *
 * RULES:
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - The raw reset token is allowed here: it travels to the email renderer so
 *   the reset link can be built. It is never stored anywhere.
 * - Never put password hashes or access tokens in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type WelcomeEmailMessage = {
  type: 'account.welcome-email';
  userId: string;
  email: string;
  username: string;
};

export type ResetPasswordEmailMessage = {
  type: 'account.reset-password-email';
  userId: string;
  email: string;
  username: string;
  /** Signed reset token; goes into the email link only. */
  resetToken: string;
};

export type QueueMessage = WelcomeEmailMessage | ResetPasswordEmailMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
