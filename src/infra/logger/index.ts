/**
 * Pino logger factory.
 *
 * JSON lines in production, pino-pretty elsewhere. Telegram credentials are
 * redacted wherever a logged object carries them.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty: boolean;
}

export const REDACTED_PATHS = [
  'botToken',
  'webhookSecret',
  'telegram.botToken',
  'telegram.webhookSecret',
  'config.telegram.botToken',
  'config.telegram.webhookSecret',
];

export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const {
    level = 'info',
    name = 'scamsense-bot',
    pretty = process.env['NODE_ENV'] !== 'production',
  } = config;

  const options: LoggerOptions = {
    name,
    level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
      },
    }),
  };

  return pinoLib(options);
};

export { type Logger } from 'pino';
