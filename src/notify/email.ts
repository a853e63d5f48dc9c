import nodemailer from "nodemailer";
import type { Report } from "../report/report.js";
import logger from "../logger.js";

export type EmailConfig = {
  host: string;
  port: number;
  sender: string;
  password: string;
  recipient: string;
};

export type MailMessage = {
  from: string;
  to: string;
  subject: string;
  text: string;
  html: string;
};

export type MailTransport = {
  sendMail(message: MailMessage): Promise<unknown>;
};

/** STARTTLS on 587, implicit TLS on 465. */
export function createSmtpTransport(config: EmailConfig): MailTransport {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    auth: { user: config.sender, pass: config.password }
  });
}

/**
 * Mails the report as a plain-text + HTML alternative. Resolves false (and
 * logs) instead of throwing, so a failed notification never fails the scan.
 */
export async function sendEmailReport(
  report: Report,
  config: EmailConfig,
  transport: MailTransport = createSmtpTransport(config)
): Promise<boolean> {
  if (!config.sender || !config.password || !config.recipient) {
    logger.warn("email credentials not configured, skipping notification");
    return false;
  }
  try {
    await transport.sendMail({
      from: config.sender,
      to: config.recipient,
      subject: report.subject,
      text: report.text,
      html: report.html
    });
    logger.info({ recipient: config.recipient }, "email notification sent");
    return true;
  } catch (err) {
    logger.error({ err }, "email notification failed");
    return false;
  }
}
