import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_TURNSTILE_ENDPOINT = 'https://challenges.cloudflare.com/turnstile/v0/siteverify';
export const DEFAULT_CTA_ENDPOINT = '/-/cta';
export const DEFAULT_MAX_BODY_SIZE = 4096;
export const TURNSTILE_SECRET_LENGTH = 35;

// ─── Schema ───

const siteSchema = z
  .object({
    dir: z.string().min(1, 'dir is required'),
    type: z.string().transform((t) => t.toLowerCase()).pipe(z.enum(['static', 'spa'])),
    basepage: z.string().default(''),
    paths: z.array(z.string()).default([]),
  })
  .superRefine((site, ctx) => {
    if (site.type === 'spa' && !site.basepage) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['basepage'], message: 'basepage is required for spa sites' });
    }
  });

const turnstileSchema = z.object({
  endpoint: z
    .string()
    .default('')
    .transform((e) => e || DEFAULT_TURNSTILE_ENDPOINT)
    .pipe(
      z.string().url().refine((u) => /^https?:\/\//i.test(u), 'endpoint must start with http:// or https://'),
    ),
  secret: z.string().default(''),
  timeoutMs: z.number().int().positive().default(10_000),
});

const smtpSchema = z.object({
  server: z.string().default(''),
  port: z.number().int().min(1).max(65535).default(587),
  // Anything other than ssl/starttls means an unencrypted session
  encryption: z
    .string()
    .default('none')
    .transform((e): 'ssl' | 'starttls' | 'none' => {
      const mode = e.toLowerCase();
      return mode === 'ssl' || mode === 'starttls' ? mode : 'none';
    }),
  username: z.string().default(''),
  password: z.string().default(''),
  verifyTls: z.boolean().default(true),
  fromAddress: z.string().default(''),
  toAddress: z.string().default(''),
  timeoutMs: z.number().int().positive().default(10_000),
});

const logSchema = z.object({
  destination: z.string().default(''),
  minLevel: z
    .string()
    .default('info')
    .transform((l): LogLevel => LOG_LEVELS.find((known) => known === l.toLowerCase()) ?? 'info'),
});

const optionsSchema = z.object({
  enableRateLimiting: z.boolean().default(false),
  rateLimitMax: z.number().int().positive().default(5),
  rateLimitWindowMs: z.number().int().positive().default(60_000),
  maxBodySize: z
    .number()
    .int()
    .min(0)
    .default(0)
    .transform((n) => (n === 0 ? DEFAULT_MAX_BODY_SIZE : n)),
  blockBotUserAgents: z.boolean().default(false),
  ctaEndpoint: z
    .string()
    .default('')
    .transform((p) => p || DEFAULT_CTA_ENDPOINT)
    .pipe(z.string().startsWith('/', 'ctaEndpoint must start with /')),
  enableMetrics: z.boolean().default(false),
});

export const configSchema = z.object({
  locations: z.record(z.string(), siteSchema).default({}),
  cfTurnstile: turnstileSchema.default({}),
  smtp: smtpSchema.default({}),
  log: logSchema.default({}),
  options: optionsSchema.default({}),
});

export type SiteConfig = z.infer<typeof siteSchema>;
export type SmtpConfig = z.infer<typeof smtpSchema>;
export type LogConfig = z.infer<typeof logSchema>;
export type OptionsConfig = z.infer<typeof optionsSchema>;
export type TurnstileConfig = z.infer<typeof turnstileSchema> & {
  /** True when the secret came from WB_CF_TURN_SECRET instead of the file. */
  secretFromEnv: boolean;
};

export interface AppConfig {
  locations: Record<string, SiteConfig>;
  cfTurnstile: TurnstileConfig;
  smtp: SmtpConfig;
  log: LogConfig;
  options: OptionsConfig;
}

// ─── Loading ───

/**
 * Validate an already-parsed config object and apply environment overrides.
 * Throws ConfigError listing every offending field.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }

  const parsed = result.data;
  const envSecret = env.WB_CF_TURN_SECRET;
  const cfTurnstile: TurnstileConfig = {
    ...parsed.cfTurnstile,
    secret: envSecret !== undefined ? envSecret : parsed.cfTurnstile.secret,
    secretFromEnv: envSecret !== undefined,
  };

  // Turnstile secrets are plain ASCII, so length in code units is enough
  if (cfTurnstile.secret !== '' && cfTurnstile.secret.length !== TURNSTILE_SECRET_LENGTH) {
    throw new ConfigError([`cfTurnstile.secret: must be ${TURNSTILE_SECRET_LENGTH} characters long`]);
  }

  return { ...parsed, cfTurnstile };
}

export function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`${path}: ${message}`]);
  }
  return parseConfig(raw, env);
}

/**
 * One-line Turnstile summary for the startup log. Never prints the full secret.
 */
export function describeTurnstile(cfg: TurnstileConfig): string {
  if (!cfg.secret) {
    return 'Turnstile secret is not set. Turnstile verification will reject every submission.';
  }
  let masked = `${cfg.secret.slice(0, 5)}*******...`;
  if (cfg.secretFromEnv) masked += ' (from env)';
  return `Turnstile endpoint ${cfg.endpoint} with secret ${masked}`;
}
