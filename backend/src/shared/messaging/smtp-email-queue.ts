/**
 * src/shared/messaging/smtp-email-queue.ts
 *
 * WHY:
 * - Production mail transport: renders each message and hands it to an SMTP server
 *   through nodemailer.
 * - "Enqueue" resolves once the SMTP server accepted the message. Delivery is bounded
 *   by a per-call timeout so a slow relay cannot hold a request.
 *
 * RULES:
 * - No business rules here: only rendering + transport.
 * - Never log the verification link (it contains the raw token).
 */

import * as nodemailer from 'nodemailer';

import type { Queue, QueueMessage, VerifyEmailMessage } from './queue';
import { withTimeout } from '../async/with-timeout';

export type SmtpSettings = Readonly<{
  host: string;
  port: number;
  secure: boolean;
  user: string | null;
  password: string | null;
}>;

export type SmtpEmailQueueOptions = Readonly<{
  smtp: SmtpSettings;
  from: string;
  appBaseUrl: string;
  timeoutMs: number;
}>;

type RenderedEmail = { to: string; subject: string; text: string; html: string };

/**
 * Link a recipient opens to confirm their address. Served by
 * `GET /auth/verify-email?token=...` on the same app.
 */
export function verifyEmailLink(appBaseUrl: string, verifyToken: string): string {
  const link = new URL('/auth/verify-email', appBaseUrl);
  link.searchParams.set('token', verifyToken);
  return link.toString();
}

export class SmtpEmailQueue implements Queue {
  private readonly transporter: nodemailer.Transporter;

  constructor(private readonly opts: SmtpEmailQueueOptions) {
    this.transporter = nodemailer.createTransport({
      host: opts.smtp.host,
      port: opts.smtp.port,
      secure: opts.smtp.secure,
      auth:
        opts.smtp.user && opts.smtp.password
          ? { user: opts.smtp.user, pass: opts.smtp.password }
          : undefined,
    });
  }

  private renderVerifyEmail(message: VerifyEmailMessage): RenderedEmail {
    const link = verifyEmailLink(this.opts.appBaseUrl, message.verifyToken);

    return {
      to: message.email,
      subject: 'Confirm your email address',
      text: `Confirm your email address by opening this link:\n\n${link}\n`,
      html: `<p>Confirm your email address by opening <a href="${link}">this link</a>.</p>`,
    };
  }

  private render(message: QueueMessage): RenderedEmail {
    switch (message.type) {
      case 'auth.verify-email':
        return this.renderVerifyEmail(message);
    }
  }

  async enqueue(message: QueueMessage): Promise<void> {
    const email = this.render(message);

    await withTimeout(
      this.transporter.sendMail({ from: this.opts.from, ...email }),
      this.opts.timeoutMs,
      `mail.${message.type}`,
    );
  }

  close(): void {
    this.transporter.close();
  }
}
