/**
 * backend/src/shared/messaging/mail-queue.ts
 *
 * WHY:
 * - Production Queue: turns each message into a rendered email and hands it
 *   to the Mailer right away. A broker-backed queue can replace it in di.ts
 *   without touching services.
 *
 * RULES:
 * - enqueue() propagates Mailer failures; callers decide whether a send is
 *   best-effort.
 */

import type { Mailer } from '../email/mailer';
import type { Queue, QueueMessage } from './queue';
import type { RenderedEmail } from '../email/email-templates';
import {
  buildResetPasswordLink,
  renderResetPasswordEmail,
  renderWelcomeEmail,
} from '../email/email-templates';

export type MailQueueOptions = Readonly<{
  appName: string;
  publicBaseUrl: string;
  resetTokenTtlHours: number;
}>;

export class MailQueue implements Queue {
  constructor(
    private readonly mailer: Mailer,
    private readonly opts: MailQueueOptions,
  ) {}

  render(message: QueueMessage): RenderedEmail {
    switch (message.type) {
      case 'account.welcome-email':
        return renderWelcomeEmail({ appName: this.opts.appName, username: message.username });
      case 'account.reset-password-email':
        return renderResetPasswordEmail({
          appName: this.opts.appName,
          username: message.username,
          resetLink: buildResetPasswordLink(this.opts.publicBaseUrl, message.resetToken),
          expiresInHours: this.opts.resetTokenTtlHours,
        });
    }
  }

  async enqueue(message: QueueMessage): Promise<void> {
    const rendered = this.render(message);
    await this.mailer.send({ to: message.email, subject: rendered.subject, html: rendered.html });
  }
}
