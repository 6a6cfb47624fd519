import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { MailConfig } from '../../config.js';

export interface ContactMessage {
  name: string;
  email: string;
  phone: string;
  message: string;
}

export type RelayResult =
  | { ok: true; messageId: string }
  | { ok: false; reason: string };

/**
 * The part of a Nodemailer transporter the relay uses.
 */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<{ messageId?: string }>;
}

/**
 * SMTP transport authenticated with the site's own mailbox (STARTTLS on 587).
 */
export function createSmtpTransport(config: MailConfig): MailTransport {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    requireTLS: config.port !== 465,
    auth: config.address && config.password
      ? { user: config.address, pass: config.password }
      : undefined,
  });
}

export function formatContactMessage({ name, email, phone, message }: ContactMessage): string {
  return [`Name: ${name}`, `Email: ${email}`, `Phone: ${phone}`, `Message: ${message}`].join('\n');
}

/**
 * Forwards contact-form submissions to the site's mailbox.
 * Never throws: transport failures come back as `{ ok: false }`.
 */
export class ContactRelay {
  constructor(
    private transport: MailTransport,
    private config: MailConfig
  ) {}

  async send(contact: ContactMessage): Promise<RelayResult> {
    const { address, password, recipient } = this.config;
    if (!address || !password || !recipient) {
      return { ok: false, reason: 'Mail relay is not configured' };
    }

    try {
      const info = await this.transport.sendMail({
        from: address,
        to: recipient,
        replyTo: contact.email,
        subject: 'New Message',
        text: formatContactMessage(contact),
      });
      return { ok: true, messageId: info.messageId ?? '' };
    } catch (error) {
      console.error('Contact relay failed:', error);
      return {
        ok: false,
        reason: error instanceof Error ? error.message : 'Unknown mail transport error',
      };
    }
  }
}
