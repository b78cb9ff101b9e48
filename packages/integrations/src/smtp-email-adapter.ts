import nodemailer from 'nodemailer';

import type { AppointmentIntent, DeliveryReceipt } from '@voice-intake/shared';

import { buildConfirmationEmail, EmailTemplateOptions } from './templates/email-templates.js';
import { ADAPTER_ERROR_CODES, AdapterError, EmailAdapter, toAdapterError } from './types.js';

export interface OutgoingMail {
  from: string;
  to: string;
  subject: string;
  text: string;
  html: string;
}

export interface MailTransport {
  send(mail: OutgoingMail): Promise<{ messageId: string }>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  timeoutMs: number;
}

export function createSmtpMailTransport(settings: SmtpSettings): MailTransport {
  const transporter = nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.secure,
    auth: {
      user: settings.user,
      pass: settings.password,
    },
    connectionTimeout: settings.timeoutMs,
    greetingTimeout: settings.timeoutMs,
    socketTimeout: settings.timeoutMs,
  });

  return {
    async send(mail) {
      const info = await transporter.sendMail(mail);
      return { messageId: info.messageId };
    },
  };
}

export interface SmtpEmailAdapterOptions extends EmailTemplateOptions {
  fromAddress: string;
  transport: MailTransport;
}

export class SmtpEmailAdapter implements EmailAdapter {
  constructor(private readonly options: SmtpEmailAdapterOptions) {}

  async sendEmail(intent: AppointmentIntent, calendarLink?: string): Promise<DeliveryReceipt> {
    const recipient = intent.customerEmail;
    if (recipient === undefined) {
      throw new AdapterError(
        'email',
        ADAPTER_ERROR_CODES.PROVIDER_REJECTED,
        'Cannot send a confirmation email without a recipient',
      );
    }

    const rendered = buildConfirmationEmail(intent, calendarLink, this.options);

    try {
      return await this.options.transport.send({
        from: this.options.fromAddress,
        to: recipient,
        subject: rendered.subject,
        text: rendered.text,
        html: rendered.html,
      });
    } catch (error) {
      throw toAdapterError('email', error);
    }
  }
}
