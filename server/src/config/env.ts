import dotenv from 'dotenv';

dotenv.config();

const nodeEnv = process.env.NODE_ENV ?? 'development';

function intFrom(value: string | undefined, fallback: number): number {
  const n = parseInt(value ?? '', 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function botToken(): string {
  const token = process.env.BOT_TOKEN;
  if (token) return token;
  if (nodeEnv === 'production') {
    throw new Error('BOT_TOKEN must be set in production');
  }
  return 'dev_secret_change_me';
}

export const env = {
  nodeEnv,
  port: intFrom(process.env.PORT, 4000),
  corsOrigin: process.env.CORS_ORIGIN || '*',
  botToken: botToken(),
  sessionTimeoutMs: intFrom(process.env.SESSION_TIMEOUT_MS, 15 * 60 * 1000),
  sweepIntervalMs: intFrom(process.env.SWEEP_INTERVAL_MS, 60 * 1000),
};
