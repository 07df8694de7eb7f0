/**
 * backend/src/shared/email/mailer.ts
 *
 * WHY:
 * - "Send an email to a recipient" is a collaborator, not a service concern.
 * - Tests swap in a recording implementation; production uses nodemailer.
 */

export type OutgoingEmail = {
  to: string;
  subject: string;
  html: string;
};

export interface Mailer {
  send(email: OutgoingEmail): Promise<void>;
}
