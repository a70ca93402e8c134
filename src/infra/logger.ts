import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger with secret redaction
 * Logs to console, plus a JSON file in production when LOG_FILE is set
 */

const REDACTED = '***REDACTED***';

const SECRET_PATTERNS = [
  /password[=:]\s*["']?([^"'\s]+)/gi,
  /api[_-]?key[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
];

// Bot API tokens, also when embedded in request URLs
const BOT_TOKEN_PATTERN = /\d{5,}:[A-Za-z0-9_-]{30,}/g;

const SECRET_KEYS = ['password', 'token', 'apiToken', 'API_TOKEN', 'secret'];

/**
 * Redacts sensitive information from log messages
 */
export function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let redacted = obj.replace(BOT_TOKEN_PATTERN, REDACTED);
    SECRET_PATTERNS.forEach((pattern) => {
      redacted = redacted.replace(pattern, (match: string, secret: string) =>
        match.replace(secret, REDACTED)
      );
    });
    return redacted;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  if (obj instanceof Error) {
    return { name: obj.name, message: redactSecrets(obj.message) };
  }

  if (obj && typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      redacted[key] = SECRET_KEYS.includes(key) ? REDACTED : redactSecrets(value);
    }
    return redacted;
  }

  return obj;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level') continue;
    info[key] = redactSecrets(info[key]);
  }
  return info;
})();

/**
 * Creates a Winston logger instance
 */
export function createLogger(env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      redactFormat,
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Global logger instance (initialized during bootstrap)
 */
export let logger: winston.Logger;

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
