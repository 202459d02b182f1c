import pino from 'pino';

const pretty = process.env['NODE_ENV'] !== 'production' && process.env['NODE_ENV'] !== 'test';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  redact: {
    paths: ['webhook_url', 'webhookUrl', '*.webhook_url', '*.webhookUrl'],
    censor: '***REDACTED***',
  },
});
