import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  SESSION_SECRET: z.string().min(1, 'SESSION_SECRET environment variable is required'),
  DATABASE_URL: z.string().min(1).default('postgres://localhost:5432/cafes'),
  SUPER_ADMIN_ID: z.coerce.number().int().positive().default(1),
  ABOUT_PAGE_ENABLED: booleanFlag.default('false'),
  MAIL_ADDRESS: z.string().email().optional(),
  MAIL_APP_PASSWORD: z.string().min(1).optional(),
  SMTP_HOST: z.string().min(1).default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  CONTACT_RECIPIENT: z.string().email().optional(),
  SECURE_COOKIES: booleanFlag.optional(),
});

export interface MailConfig {
  host: string;
  port: number;
  address?: string;
  password?: string;
  recipient?: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'test' | 'production';
  sessionSecret: string;
  databaseUrl: string;
  superAdminId: number;
  aboutPageEnabled: boolean;
  secureCookies: boolean;
  mail: MailConfig;
}

/**
 * Read configuration from environment variables.
 * Blank values are treated as unset so an empty `.env` entry falls back to its default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.parse(present);

  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    sessionSecret: parsed.SESSION_SECRET,
    databaseUrl: parsed.DATABASE_URL,
    superAdminId: parsed.SUPER_ADMIN_ID,
    aboutPageEnabled: parsed.ABOUT_PAGE_ENABLED,
    secureCookies: parsed.SECURE_COOKIES ?? parsed.NODE_ENV === 'production',
    mail: {
      host: parsed.SMTP_HOST,
      port: parsed.SMTP_PORT,
      address: parsed.MAIL_ADDRESS,
      password: parsed.MAIL_APP_PASSWORD,
      recipient: parsed.CONTACT_RECIPIENT ?? parsed.MAIL_ADDRESS,
    },
  };
}
