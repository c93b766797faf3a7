import nodemailer from 'nodemailer';
import type { EmailConfig } from './config.js';

export type MailPayload = {
  to: string | string[];
  subject: string;
  html: string;
  text?: string;
};

export type Mailer = {
  sendMail(payload: MailPayload): Promise<{ messageId: string }>;
};

export function createMailer(cfg: EmailConfig): Mailer {
  const transport = nodemailer.createTransport({
    host: cfg.host,
    port: cfg.port,
    secure: cfg.secure,
    auth: cfg.user ? { user: cfg.user, pass: cfg.pass } : undefined,
  });

  return {
    async sendMail(payload: MailPayload) {
      const to = Array.isArray(payload.to) ? payload.to.join(',') : payload.to;
      const info = await transport.sendMail({
        from: `"${cfg.fromName}" <${cfg.fromAddress}>`,
        to,
        subject: payload.subject,
        text: payload.text,
        html: payload.html,
      });
      return { messageId: info.messageId };
    },
  };
}
