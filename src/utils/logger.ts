import winston from 'winston';

// Keys whose values never reach a log line (matched case-insensitively, by substring)
const SENSITIVE_KEYS = ['secret', 'authorization', 'signature', 'password', 'cookie'];

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lower.includes(sensitive));
}

/**
 * Replace values under sensitive keys with [REDACTED], recursively
 */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redact);
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Error)) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      sanitized[key] = isSensitiveKey(key) ? '[REDACTED]' : redact(entry);
    }
    return sanitized;
  }
  return value;
}

const redactingFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (isSensitiveKey(key)) {
      info[key] = '[REDACTED]';
    } else if (key !== 'message' && key !== 'level') {
      info[key] = redact(info[key]);
    }
  }
  return info;
})();

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    redactingFormat,
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'ncsa-hmac' },
  transports: [
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'development'
        ? winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ level, message, timestamp, ...meta }) => {
              const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
              return `${timestamp} ${level}: ${message}${metaStr}`;
            })
          )
        : winston.format.json()
    })
  ]
});

export function createChildLogger(component: string): winston.Logger {
  return logger.child({ component });
}
