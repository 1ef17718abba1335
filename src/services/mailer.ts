import nodemailer, { type Transporter } from 'nodemailer';
import type { SmtpConfig } from '../config';
import logger from '../lib/logger';

const log = logger.child('mailer');

export const PLAIN_TEXT_FALLBACK = 'Please enable HTML e-mail support to view this message.';

export type ReportMail = {
  subject: string;
  html: string;
};

export function reportSubject(org: string, date: string): string {
  return `ESXI getsmart report for ${org} at ${date}`;
}

/** Sends the rendered report as a multipart/alternative mail over STARTTLS. */
export class Mailer {
  private readonly transport: Transporter;

  constructor(private readonly smtp: SmtpConfig) {
    this.transport = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: false,
      requireTLS: true,
      auth: {
        user: smtp.user,
        pass: smtp.password,
      },
    });
  }

  async send(mail: ReportMail): Promise<void> {
    log.info('sending report', { to: this.smtp.to, subject: mail.subject });
    const info = await this.transport.sendMail({
      from: this.smtp.from,
      to: this.smtp.to,
      subject: mail.subject,
      text: PLAIN_TEXT_FALLBACK,
      html: mail.html,
    });
    log.debug('report accepted by SMTP server', { messageId: info.messageId });
  }
}
