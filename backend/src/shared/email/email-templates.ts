/**
 * backend/src/shared/email/email-templates.ts
 *
 * WHY:
 * - Email bodies are plain functions of their inputs: easy to test, no
 *   template files to locate at runtime.
 *
 * RULES:
 * - Every interpolated value goes through escapeHtml().
 * - Links are built from PUBLIC_BASE_URL; tokens are URL-encoded.
 */

export type RenderedEmail = {
  subject: string;
  html: string;
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function layout(appName: string, body: string): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<body style="font-family: sans-serif; line-height: 1.5;">',
    body,
    `<p>The ${escapeHtml(appName)} team</p>`,
    '</body>',
    '</html>',
  ].join('\n');
}

export function renderWelcomeEmail(input: { appName: string; username: string }): RenderedEmail {
  return {
    subject: `Welcome to ${input.appName}`,
    html: layout(
      input.appName,
      [
        `<p>Hi ${escapeHtml(input.username)},</p>`,
        `<p>Your ${escapeHtml(input.appName)} account is ready. Start writing!</p>`,
      ].join('\n'),
    ),
  };
}

export function buildResetPasswordLink(publicBaseUrl: string, resetToken: string): string {
  const base = publicBaseUrl.replace(/\/+$/, '');
  return `${base}/reset-password?token=${encodeURIComponent(resetToken)}`;
}

export function renderResetPasswordEmail(input: {
  appName: string;
  username: string;
  resetLink: string;
  expiresInHours: number;
}): RenderedEmail {
  return {
    subject: `Password Reset - ${input.appName}`,
    html: layout(
      input.appName,
      [
        `<p>Hi ${escapeHtml(input.username)},</p>`,
        '<p>We received a request to reset your password.</p>',
        `<p><a href="${escapeHtml(input.resetLink)}">Reset your password</a></p>`,
        `<p>This link expires in ${input.expiresInHours} hours. If you did not ask for it, ignore this email.</p>`,
      ].join('\n'),
    ),
  };
}
