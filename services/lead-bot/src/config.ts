import dotenv from 'dotenv';
import { z } from 'zod';

const booleanFlag = z
  .string()
  .optional()
  .transform(value => ['1', 'true', 'yes'].includes(String(value || '').toLowerCase()));

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  STAFF_CHAT_ID: z.string().min(1, 'STAFF_CHAT_ID is required'),

  SPREADSHEET_ID: z.string().min(1, 'SPREADSHEET_ID is required'),
  GOOGLE_SERVICE_ACCOUNT_FILE: z.string().default('credentials.json'),

  DEFAULT_LANGUAGE: z.string().default('ru'),
  EXPORT_LANGUAGE: z.string().default('ru'),
  TIMEZONE: z.string().default('Europe/Moscow'),
  LOCALES_DIR: z.string().optional(),

  SESSION_STORE: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  SESSION_IDLE_MINUTES: positiveInt(24 * 60),
  SESSION_CLEANUP_SCHEDULE: z.string().default('*/5 * * * *'),

  WEBHOOK_ENABLED: booleanFlag,
  WEBHOOK_SECRET: z.string().default(''),
  PORT: positiveInt(5000),

  RATE_LIMIT_MESSAGES_PER_MINUTE: positiveInt(20),
  RATE_LIMIT_CALLBACKS_PER_MINUTE: positiveInt(30),
  RATE_LIMIT_COMMANDS_PER_MINUTE: positiveInt(5),
  RATE_LIMIT_COOLDOWN_SECONDS: z.coerce.number().int().min(0).default(300),

}).superRefine((env, ctx) => {
  if (env.WEBHOOK_ENABLED && !env.WEBHOOK_SECRET) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['WEBHOOK_SECRET'],
      message: 'WEBHOOK_SECRET is required when WEBHOOK_ENABLED is set',
    });
  }
});

export interface RateLimitSettings {
  messagesPerMinute: number;
  callbacksPerMinute: number;
  commandsPerMinute: number;
  cooldownSeconds: number;
}

export interface AppConfig {
  telegramBotToken: string;
  staffChatId: string;

  spreadsheetId: string;
  googleServiceAccountFile: string;

  defaultLanguage: string;
  exportLanguage: string;
  timezone: string;
  localesDir: string | null;

  sessionStore: 'memory' | 'redis';
  redisUrl: string;
  sessionIdleMs: number;
  sessionCleanupSchedule: string;

  webhookEnabled: boolean;
  webhookSecret: string;
  port: number;

  rateLimits: RateLimitSettings;
}

/**
 * Reads the process environment once at start-up. Everything downstream gets
 * the resulting object explicitly; nothing else reads `process.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  const e = parsed.data;
  return {
    telegramBotToken: e.TELEGRAM_BOT_TOKEN,
    staffChatId: e.STAFF_CHAT_ID,

    spreadsheetId: e.SPREADSHEET_ID,
    googleServiceAccountFile: e.GOOGLE_SERVICE_ACCOUNT_FILE,

    defaultLanguage: e.DEFAULT_LANGUAGE,
    exportLanguage: e.EXPORT_LANGUAGE,
    timezone: e.TIMEZONE,
    localesDir: e.LOCALES_DIR ?? null,

    sessionStore: e.SESSION_STORE,
    redisUrl: e.REDIS_URL,
    sessionIdleMs: e.SESSION_IDLE_MINUTES * 60 * 1000,
    sessionCleanupSchedule: e.SESSION_CLEANUP_SCHEDULE,

    webhookEnabled: e.WEBHOOK_ENABLED,
    webhookSecret: e.WEBHOOK_SECRET,
    port: e.PORT,

    rateLimits: {
      messagesPerMinute: e.RATE_LIMIT_MESSAGES_PER_MINUTE,
      callbacksPerMinute: e.RATE_LIMIT_CALLBACKS_PER_MINUTE,
      commandsPerMinute: e.RATE_LIMIT_COMMANDS_PER_MINUTE,
      cooldownSeconds: e.RATE_LIMIT_COOLDOWN_SECONDS,
    },
  };
}
