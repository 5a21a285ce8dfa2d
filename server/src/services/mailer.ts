import nodemailer, { Transporter } from 'nodemailer';
import SMTPTransport from 'nodemailer/lib/smtp-transport';
import { SmtpConfig } from '../utils/config';
import { DeliveryError } from '../utils/errors';
import { renderSubmissionEmail } from '../utils/emailTemplate';
import { SanitizedField } from '../utils/sanitize';

/** Anything that can deliver a rendered submission. */
export interface Mailer {
  deliver(subject: string, fields: SanitizedField[]): Promise<void>;
}

/**
 * Map the configured encryption mode onto nodemailer's SMTP options.
 *
 * - ssl: TLS from the first byte.
 * - starttls: plain connect, upgraded only if the server offers STARTTLS.
 *   Without the extension the session stays in plaintext.
 *   TODO: add a strict mode that sets requireTLS and refuses to send in clear.
 * - none: never negotiate TLS.
 */
export function buildTransportOptions(smtp: SmtpConfig): SMTPTransport.Options {
  const options: SMTPTransport.Options = {
    host: smtp.server,
    port: smtp.port,
    secure: smtp.encryption === 'ssl',
    ignoreTLS: smtp.encryption === 'none',
    requireTLS: false,
    tls: { rejectUnauthorized: smtp.verifyTls, servername: smtp.server },
    connectionTimeout: smtp.timeoutMs,
    greetingTimeout: smtp.timeoutMs,
    socketTimeout: smtp.timeoutMs,
  };

  // Only authenticate when a username is configured
  if (smtp.username) {
    options.auth = { user: smtp.username, pass: smtp.password };
  }
  return options;
}

/**
 * Sends each submission as its own SMTP session (no pooling).
 */
export class SmtpMailer implements Mailer {
  private transporter: Transporter;

  constructor(private readonly smtp: SmtpConfig, transporter?: Transporter) {
    this.transporter = transporter ?? nodemailer.createTransport(buildTransportOptions(smtp));
  }

  async deliver(subject: string, fields: SanitizedField[]): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.smtp.fromAddress,
        to: this.smtp.toAddress,
        subject,
        html: renderSubmissionEmail(fields),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new DeliveryError(`send mail failed: ${message}`, { cause: err });
    }
  }
}
