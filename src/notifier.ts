import * as fs from 'fs';
import * as path from 'path';
import nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import type { EmailSettings } from './config';
import type { Logger } from './logger';
import type { RunSummary } from './types';

export interface MailTransport {
  sendMail(message: Mail.Options): Promise<unknown>;
}

export type TransportFactory = (settings: EmailSettings) => MailTransport;

export const smtpTransport: TransportFactory = settings =>
  nodemailer.createTransport({
    host: settings.smtpHost,
    port: settings.smtpPort,
    secure: settings.smtpPort === 465,
    auth: { user: settings.sender, pass: settings.password },
  });

export function isEmailConfigured(settings: EmailSettings): boolean {
  return Boolean(settings.sender && settings.password && settings.to);
}

export function buildReport(settings: EmailSettings, summary: RunSummary, rows: number, attachments: string[]): Mail.Options {
  return {
    from: settings.sender,
    to: settings.to,
    subject: settings.subject,
    text: JSON.stringify({ total_rows: rows, summary }, null, 2),
    attachments: attachments
      .filter(file => fs.existsSync(file))
      .map(file => ({ filename: path.basename(file), path: file })),
  };
}

export class Notifier {
  constructor(
    private settings: EmailSettings,
    private logger: Logger,
    private createTransport: TransportFactory = smtpTransport
  ) {}

  /**
   * Emails the run report. Returns false when email is not configured or
   * sending failed; a failed send never fails the run.
   */
  async notify(summary: RunSummary, rows: number, attachments: string[]): Promise<boolean> {
    if (!isEmailConfigured(this.settings)) {
      this.logger.info('Email settings not configured. Skipping email.');
      return false;
    }

    try {
      const transport = this.createTransport(this.settings);
      await transport.sendMail(buildReport(this.settings, summary, rows, attachments));
      this.logger.info(`Email sent to ${this.settings.to}`);
      return true;
    } catch (error) {
      this.logger.error('Failed to send email', error);
      return false;
    }
  }
}
