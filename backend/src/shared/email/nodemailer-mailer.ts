/**
 * backend/src/shared/email/nodemailer-mailer.ts
 *
 * WHY:
 * - SMTP delivery through nodemailer when SMTP_HOST is configured.
 * - Without a host (local dev), nodemailer's JSON transport serializes the
 *   message instead of sending it, so nothing leaves the process.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { AppConfig } from '../../app/config';
import type { Mailer, OutgoingEmail } from './mailer';
import { logger } from '../logger/logger';

type SmtpConfig = AppConfig['smtp'];

function buildTransport(smtp: SmtpConfig): Transporter {
  if (!smtp.host) {
    return nodemailer.createTransport({ jsonTransport: true });
  }

  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: smtp.user ? { user: smtp.user, pass: smtp.password ?? '' } : undefined,
  });
}

export class NodemailerMailer implements Mailer {
  private readonly transport: Transporter;
  private readonly from: string;

  constructor(private readonly smtp: SmtpConfig) {
    this.transport = buildTransport(smtp);
    this.from = `"${smtp.fromName}" <${smtp.fromEmail}>`;
  }

  async send(email: OutgoingEmail): Promise<void> {
    const info = await this.transport.sendMail({
      from: this.from,
      to: email.to,
      subject: email.subject,
      html: email.html,
    });

    logger.info('email.sent', {
      flow: 'email',
      messageId: info.messageId,
      transport: this.smtp.host ? 'smtp' : 'json',
    });
  }
}
