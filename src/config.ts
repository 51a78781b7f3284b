import 'dotenv/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(raw: string | undefined): LogLevel {
  const level = (raw || 'info').toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'info';
}

function parseIntOr(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw || '', 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export const cfg = {
  port: parseIntOr(process.env.PORT, 3000),
  appUrl: process.env.APP_URL || 'http://localhost:3000',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),

  // Upper bound on products accepted by one batch request
  maxBatchSize: parseIntOr(process.env.NUTRITION_MAX_BATCH, 500),
};
