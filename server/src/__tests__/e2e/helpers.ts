import { vi, Mock } from 'vitest';
import nodemailer from 'nodemailer';
import { parseConfig, AppConfig } from '../../utils/config';
import { Verifier } from '../../services/turnstileClient';
import { SmtpMailer } from '../../services/mailer';

// ─── Fixture factories ───

export const BROWSER_UA = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_5) AppleWebKit/605.1.15 Safari/605.1.15';

export function makeConfig(overrides: Record<string, unknown> = {}): AppConfig {
  return parseConfig(
    {
      cfTurnstile: { endpoint: 'https://verify.test/siteverify', secret: 'x'.repeat(35) },
      smtp: {
        server: 'smtp.test',
        port: 2525,
        encryption: 'none',
        fromAddress: 'forms@example.com',
        toAddress: 'inbox@example.com',
      },
      options: {
        enableRateLimiting: true,
        blockBotUserAgents: true,
        ctaEndpoint: '/-/cta',
      },
      ...overrides,
    },
    {},
  );
}

export function makePassingVerifier(): { verify: Mock<Verifier['verify']> } {
  return { verify: vi.fn<Verifier['verify']>().mockResolvedValue({ success: true }) };
}

/**
 * A real SmtpMailer over nodemailer's in-process JSON transport, with the
 * transport's sendMail spied so tests can read the rendered message.
 */
export function makeRecordingMailer(config: AppConfig) {
  const transporter = nodemailer.createTransport({ jsonTransport: true });
  const sendMail = vi.spyOn(transporter, 'sendMail');
  return { mailer: new SmtpMailer(config.smtp, transporter), sendMail };
}
