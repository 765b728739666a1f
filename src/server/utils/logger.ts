// =============================================================================
// Safe Logger — never logs tokens, API keys or webhook secrets
// =============================================================================
import winston from 'winston';

const REDACT_KEYS = new Set([
  'access_token', 'accesstoken', 'token', 'secret', 'password',
  'authorization', 'apikey', 'api_key', 'client_secret', 'clientsecret',
  'plaintoken', 'encryptedtoken', 'signature',
  'zoomclientsecret', 'zoomwebhooksecrettoken', 'ghlapikey',
]);

function redactSensitive(value: unknown, depth = 0): unknown {
  if (depth > 6 || !value || typeof value !== 'object') return value;
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item, depth + 1));
  }
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
      const safe = redactSensitive(meta);
      const metaStr =
        safe && typeof safe === 'object' && Object.keys(safe).length
          ? ` ${JSON.stringify(safe)}`
          : '';
      return `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}${metaStr}`;
    }),
  ),
  transports: [
    new winston.transports.Console(),
    ...(process.env.LOG_FILE
      ? [new winston.transports.File({ filename: process.env.LOG_FILE, maxsize: 5_000_000, maxFiles: 3 })]
      : []),
  ],
});

export default logger;
