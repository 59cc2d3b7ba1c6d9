/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { fileURLToPath } from 'node:url';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_QUIZ_PASS_THRESHOLD = 3;
export const DEFAULT_SESSION_IDLE_TTL_MS = 6 * 60 * 60 * 1000;

const DEFAULT_CONTENT_DIR = fileURLToPath(new URL('../../../content', import.meta.url));

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Storage
  DATABASE_URL: Type.String({ minLength: 1 }),
  DATABASE_STATEMENT_TIMEOUT_MS: Type.Integer({ default: 5000, minimum: 1 }),
  REDIS_URL: Type.Optional(Type.String()),
  BULLMQ_PREFIX: Type.String({ default: 'scamsense' }),

  // Telegram
  BOT_TOKEN: Type.String({ minLength: 1 }),
  BOT_USERNAME: Type.Optional(Type.String()),
  TELEGRAM_WEBHOOK_SECRET: Type.Optional(Type.String()),
  TELEGRAM_API_BASE_URL: Type.String({ default: 'https://api.telegram.org' }),
  ADMIN_IDS: Type.Array(Type.Integer({ minimum: 1 }), { default: [] }),

  // Game rules and sessions
  QUIZ_PASS_THRESHOLD: Type.Integer({ minimum: 1, default: DEFAULT_QUIZ_PASS_THRESHOLD }),
  SESSION_IDLE_TTL_MS: Type.Integer({ minimum: 1000, default: DEFAULT_SESSION_IDLE_TTL_MS }),
  SESSION_MAX_ENTRIES: Type.Integer({ minimum: 1, default: 10000 }),
  CONTENT_DIR: Type.String({ minLength: 1 }),
});

export type Env = Static<typeof EnvSchema>;

/**
 * Non-fatal problems found while parsing. Reported by the caller once a logger exists.
 */
export interface EnvWarning {
  variable: string;
  message: string;
}

const parseInteger = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isInteger(parsed) ? parsed : Number.NaN;
};

/**
 * The pass threshold falls back to its default instead of failing startup.
 */
export const parseQuizPassThreshold = (
  value: string | undefined
): { threshold: number; warning?: EnvWarning } => {
  const parsed = parseInteger(value);
  if (parsed === undefined) {
    return { threshold: DEFAULT_QUIZ_PASS_THRESHOLD };
  }
  if (Number.isNaN(parsed) || parsed < 1) {
    return {
      threshold: DEFAULT_QUIZ_PASS_THRESHOLD,
      warning: {
        variable: 'QUIZ_PASS_THRESHOLD',
        message: `Invalid value "${String(value)}", using ${String(DEFAULT_QUIZ_PASS_THRESHOLD)}`,
      },
    };
  }
  return { threshold: parsed };
};

/**
 * Chats notified about new scam reports: comma-separated ADMIN_IDS, else a single
 * ADMIN_CHAT_ID. Entries that are not positive integers are skipped with a warning.
 */
export const parseAdminIds = (
  adminIds: string | undefined,
  adminChatId?: string
): { ids: number[]; warnings: EnvWarning[] } => {
  const fromList = adminIds !== undefined && adminIds.trim() !== '';
  const variable = fromList ? 'ADMIN_IDS' : 'ADMIN_CHAT_ID';
  const raw = fromList ? adminIds : (adminChatId ?? '');

  const ids: number[] = [];
  const warnings: EnvWarning[] = [];
  for (const entry of raw.split(',').map((part) => part.trim())) {
    if (entry === '') continue;
    if (/^\d+$/.test(entry) && Number(entry) > 0) {
      ids.push(Number(entry));
    } else {
      warnings.push({ variable, message: `Invalid admin id "${entry}", skipping` });
    }
  }
  return { ids, warnings };
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (
  env: NodeJS.ProcessEnv,
  warnings: EnvWarning[] = []
): Env => {
  const quizPassThreshold = parseQuizPassThreshold(env['QUIZ_PASS_THRESHOLD']);
  if (quizPassThreshold.warning !== undefined) {
    warnings.push(quizPassThreshold.warning);
  }
  const adminIds = parseAdminIds(env['ADMIN_IDS'], env['ADMIN_CHAT_ID']);
  warnings.push(...adminIds.warnings);

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number.parseInt(env['PORT'], 10) : 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    DATABASE_STATEMENT_TIMEOUT_MS: parseInteger(env['DATABASE_STATEMENT_TIMEOUT_MS']) ?? 5000,
    REDIS_URL: env['REDIS_URL'] !== '' ? env['REDIS_URL'] : undefined,
    BULLMQ_PREFIX: env['BULLMQ_PREFIX'] ?? 'scamsense',
    BOT_TOKEN: env['BOT_TOKEN'],
    BOT_USERNAME: env['BOT_USERNAME'],
    TELEGRAM_WEBHOOK_SECRET:
      env['TELEGRAM_WEBHOOK_SECRET'] !== '' ? env['TELEGRAM_WEBHOOK_SECRET'] : undefined,
    TELEGRAM_API_BASE_URL: env['TELEGRAM_API_BASE_URL'] ?? 'https://api.telegram.org',
    ADMIN_IDS: adminIds.ids,
    QUIZ_PASS_THRESHOLD: quizPassThreshold.threshold,
    SESSION_IDLE_TTL_MS:
      parseInteger(env['SESSION_IDLE_TTL_MS']) ?? DEFAULT_SESSION_IDLE_TTL_MS,
    SESSION_MAX_ENTRIES: parseInteger(env['SESSION_MAX_ENTRIES']) ?? 10000,
    CONTENT_DIR: env['CONTENT_DIR'] ?? DEFAULT_CONTENT_DIR,
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
    statementTimeoutMs: env.DATABASE_STATEMENT_TIMEOUT_MS,
  },
  redis: {
    url: env.REDIS_URL,
    prefix: env.BULLMQ_PREFIX,
  },
  telegram: {
    botToken: env.BOT_TOKEN,
    botUsername: env.BOT_USERNAME,
    webhookSecret: env.TELEGRAM_WEBHOOK_SECRET,
    apiBaseUrl: env.TELEGRAM_API_BASE_URL,
    adminIds: env.ADMIN_IDS,
  },
  game: {
    quizPassThreshold: env.QUIZ_PASS_THRESHOLD,
    contentDir: env.CONTENT_DIR,
  },
  sessions: {
    idleTtlMs: env.SESSION_IDLE_TTL_MS,
    maxEntries: env.SESSION_MAX_ENTRIES,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
