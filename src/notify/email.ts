import nodemailer from 'nodemailer';
import { getSmtpSettings, isEmailEnabled, type SmtpSettings } from '../config.js';
import { NotifyError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { CrawlTarget, ListingItem } from '../types.js';
import type { Notifier } from './notifier.js';
import { buildAlertEmail } from './templates.js';

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
  html?: string;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export type MailTransportFactory = (settings: SmtpSettings) => MailTransport;

export function createSmtpTransport(settings: SmtpSettings): MailTransport {
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.port === 465,  // otherwise STARTTLS
    auth: {
      user: settings.user,
      pass: settings.password,
    },
  });
}

export interface EmailNotifierOptions {
  enabled?: boolean;
  smtp?: SmtpSettings | null;
  transportFactory?: MailTransportFactory;
  now?: () => Date;
  logger?: Logger;
}

function mask(value: string, keep = 2): string {
  if (value.length <= keep) return '*'.repeat(value.length);
  return value.slice(0, keep) + '*'.repeat(value.length - keep);
}

export class EmailNotifier implements Notifier {
  private enabled: boolean;
  private smtp: SmtpSettings | null;
  private transportFactory: MailTransportFactory;
  private transport: MailTransport | null = null;
  private now: () => Date;
  private logger: Logger;

  constructor(options: EmailNotifierOptions = {}) {
    this.enabled = options.enabled ?? isEmailEnabled();
    this.smtp = options.smtp === undefined ? getSmtpSettings() : options.smtp;
    this.transportFactory = options.transportFactory ?? createSmtpTransport;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('Email');
  }

  async notify(subscriberEmail: string, target: CrawlTarget, newItems: ListingItem[]): Promise<void> {
    if (!this.enabled) {
      this.logger.info('SEND_EMAIL != 1, not sending');
      return;
    }
    if (!this.smtp) {
      this.logger.warn('SMTP settings incomplete (SMTP_HOST, SMTP_USER, SMTP_PASS), not sending');
      return;
    }

    const email = buildAlertEmail(target, newItems, this.now());
    await this.send(this.smtp, { from: this.smtp.from, to: subscriberEmail, ...email });
    this.logger.info(`Sent ${newItems.length} listing(s) to ${subscriberEmail}`);
  }

  async sendTest(to: string): Promise<void> {
    if (!this.smtp) {
      throw new NotifyError('SMTP settings incomplete (SMTP_HOST, SMTP_USER, SMTP_PASS)');
    }
    await this.send(this.smtp, {
      from: this.smtp.from,
      to,
      subject: '[Alerts] Test e-mail',
      text: 'Test message: the SMTP configuration works.',
    });
    this.logger.info(`Test e-mail sent to ${to}`);
  }

  private async send(smtp: SmtpSettings, message: MailMessage): Promise<void> {
    this.logger.debug(`SMTP ${smtp.host}:${smtp.port} user=${mask(smtp.user)} from=${smtp.from}`);
    if (!this.transport) {
      this.transport = this.transportFactory(smtp);
    }
    try {
      await this.transport.sendMail(message);
    } catch (error) {
      throw new NotifyError(`Sending to ${message.to} failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  }
}

export async function sendTestEmail(to: string, options: EmailNotifierOptions = {}): Promise<void> {
  await new EmailNotifier({ ...options, enabled: true }).sendTest(to);
}
