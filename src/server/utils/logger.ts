// =============================================================================
// Safe Logger — NEVER logs tokens, secrets or record payloads
// =============================================================================
import winston from 'winston';

const REDACT_KEYS = new Set([
  'access_token', 'accesstoken', 'refresh_token', 'refreshtoken',
  'token', 'secret', 'password', 'authorization', 'cookie',
  'apikey', 'api_key', 'client_secret', 'clientsecret',
  'jwtsecret', 'webhooktoken', 'synctoken', 'payload',
]);

function redactSensitive(value: unknown, depth = 0): unknown {
  if (depth > 6 || !value || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map((item) => redactSensitive(item, depth + 1));

  const clean: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const normKey = key.toLowerCase().replace(/[_\-.\s]/g, '');
    if (REDACT_KEYS.has(normKey)) {
      clean[key] = '[REDACTED]';
    } else if (typeof entry === 'object' && entry !== null) {
      clean[key] = redactSensitive(entry, depth + 1);
    } else {
      clean[key] = entry;
    }
  }
  return clean;
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaStr = Object.keys(meta).length
        ? ` ${JSON.stringify(redactSensitive(meta))}`
        : '';
      return `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}${metaStr}`;
    }),
  ),
  transports: [
    new winston.transports.Console(),
    ...(process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test'
      ? [new winston.transports.File({ filename: 'logs/app.log', maxsize: 5_000_000, maxFiles: 3 })]
      : []),
  ],
});

export default logger;
