import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const DEFAULT_SUBJECT = 'Test Email from AWS SES';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

// Level used until loadConfig has run; an invalid value is reported by loadConfig, not here.
export const logLevel: LogLevel = logLevelSchema.catch('info').parse(process.env.LOG_LEVEL);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: logLevelSchema.default('info'),
  API_KEY: z.string().min(10, 'API_KEY required for auth'),
  VERIFIED_DOMAIN_OR_EMAIL: z.string().min(1, 'VERIFIED_DOMAIN_OR_EMAIL required (domain or email verified with the mail provider)'),
  EMAIL_SUBJECT: z.string().min(1).default(DEFAULT_SUBJECT),
  MAIL_PROVIDER: z.enum(['ses', 'smtp']).default('ses'),
  AWS_REGION: z.string().optional(),
  SES_CONFIGURATION_SET: z.string().optional(),
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(50),
  BODY_LIMIT: z.string().default('256kb')
});

export type Env = z.infer<typeof envSchema>;

export type MailProviderConfig =
  | { kind: 'ses'; region?: string; configurationSet?: string }
  | { kind: 'smtp'; host: string; port: number; secure: boolean; user: string; pass: string };

export interface AppConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly verifiedIdentity: string;
  readonly expectedApiKey: string;
  readonly subject: string;
  readonly mail: Readonly<MailProviderConfig>;
  readonly rateLimitPerMinute: number;
  readonly bodyLimit: string;
}

export type FieldErrors = Record<string, string[] | undefined>;

export class ConfigError extends Error {
  constructor(readonly fieldErrors: FieldErrors) {
    super(`Invalid environment variables: ${Object.keys(fieldErrors).join(', ')}`);
    this.name = 'ConfigError';
  }
}

function mailConfigFrom(env: Env): MailProviderConfig {
  if (env.MAIL_PROVIDER === 'ses') {
    return { kind: 'ses', region: env.AWS_REGION, configurationSet: env.SES_CONFIGURATION_SET };
  }
  const { SMTP_HOST: host, SMTP_USER: user, SMTP_PASS: pass } = env;
  if (!host || !user || !pass) {
    const missing = (['SMTP_HOST', 'SMTP_USER', 'SMTP_PASS'] as const).filter(k => !env[k]);
    throw new ConfigError(Object.fromEntries(missing.map(k => [k, [`${k} required when MAIL_PROVIDER=smtp`]])));
  }
  return { kind: 'smtp', host, port: env.SMTP_PORT, secure: env.SMTP_PORT === 465, user, pass };
}

/**
 * Validates the process environment once and returns the read-only settings
 * shared by every request. Throws {@link ConfigError} listing each bad field.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }
  const env = parsed.data;

  return Object.freeze({
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    verifiedIdentity: env.VERIFIED_DOMAIN_OR_EMAIL,
    expectedApiKey: env.API_KEY,
    subject: env.EMAIL_SUBJECT,
    mail: Object.freeze(mailConfigFrom(env)),
    rateLimitPerMinute: env.RATE_LIMIT_PER_MINUTE,
    bodyLimit: env.BODY_LIMIT
  });
}
