import nodemailer, { Transporter } from 'nodemailer';
import { Logger } from '../../../shared/src/utils/logger';
import type { SmtpConfig } from '../config';

export const VERIFICATION_SUBJECT = 'Email Verification Code';

export function verificationBody(code: string): string {
  return `Your verification code is ${code}.`;
}

/**
 * Sends the verification code to an address. Rejects when the message
 * could not be handed off.
 */
export interface Mailer {
  send(toAddress: string, code: string, displayName: string): Promise<void>;
}

export class SmtpMailer implements Mailer {
  private readonly transporter: Transporter;

  constructor(private readonly smtp: SmtpConfig, private readonly logger: Logger, transporter?: Transporter) {
    // Plain connection upgraded with STARTTLS
    this.transporter = transporter ?? nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: false,
      requireTLS: true,
      auth: smtp.user ? { user: smtp.user, pass: smtp.pass } : undefined,
    });
  }

  async send(toAddress: string, code: string, displayName: string): Promise<void> {
    await this.transporter.sendMail({
      from: this.smtp.from,
      to: toAddress,
      subject: VERIFICATION_SUBJECT,
      text: verificationBody(code),
    });
    this.logger.info('Verification email sent', { displayName, toAddress });
  }
}

// Development stand-in. The code goes to the log, unredacted.
export class ConsoleMailer implements Mailer {
  constructor(private readonly logger: Logger) {}

  async send(toAddress: string, code: string, displayName: string): Promise<void> {
    this.logger.info(`${VERIFICATION_SUBJECT} for ${displayName}: ${verificationBody(code)}`, { toAddress });
  }
}

export function createMailer(smtp: SmtpConfig | null, logger: Logger): Mailer {
  if (!smtp) {
    logger.warn('SMTP_HOST is not set; verification codes will be written to the log');
    return new ConsoleMailer(logger);
  }
  return new SmtpMailer(smtp, logger);
}
