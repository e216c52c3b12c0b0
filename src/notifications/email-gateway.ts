/**
 * Outbound email.
 *
 * Delivery is out of scope for this service: the default gateway renders the
 * message and writes it to the log, where a mail relay can pick it up.
 */

import type { Logger } from 'pino';

import { logger } from '../observability/logger';

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
}

export interface EmailGateway {
  sendRegistrationEmail(to: string, username: string): Promise<void>;
  sendPasswordResetEmail(to: string, username: string, resetToken: string): Promise<void>;
}

export class LoggingEmailGateway implements EmailGateway {
  constructor(
    private readonly from: string,
    private readonly appUrl: string,
    private readonly log: Logger = logger.child({ component: 'email-gateway' }),
  ) {}

  async sendRegistrationEmail(to: string, username: string): Promise<void> {
    await this.send({
      to,
      subject: 'Welcome to the store',
      text: `Hi ${username}, your account is ready. Sign in at ${this.appUrl}.`,
    });
  }

  async sendPasswordResetEmail(to: string, username: string, resetToken: string): Promise<void> {
    await this.send({
      to,
      subject: 'Reset your password',
      text: `Hi ${username}, use this link within the hour to reset your password: ${this.appUrl}/reset-password?token=${encodeURIComponent(resetToken)}`,
    });
  }

  protected async send(message: EmailMessage): Promise<void> {
    // Body omitted: it can hold a reset link
    this.log.info({ from: this.from, to: message.to, subject: message.subject }, 'Email queued');
  }
}
