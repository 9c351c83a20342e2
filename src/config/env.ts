import dotenv from 'dotenv';

dotenv.config();

export interface AppConfig {
  nodeEnv: string;
  port: number;
  host: string;
  databaseUrl?: string;
  databaseName?: string;
  allowedOrigins: string[];
  downloadTtlDays: number;
}

export const DEFAULT_DATABASE_URL = 'mongodb://127.0.0.1:27017';
export const DEFAULT_DATABASE_NAME = 'digital_store';

const parseNumber = (name: string, raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive number, got "${raw}"`);
  }
  return value;
};

// Reads the process environment; pass a plain object to build a config in tests.
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const allowedOrigins = env.FRONTEND_URL
    ? env.FRONTEND_URL.split(',').map(url => url.trim()).filter(url => url !== '')
    : ['http://localhost:3000'];

  return {
    nodeEnv: env.NODE_ENV || 'development',
    port: parseNumber('PORT', env.PORT, 5000),
    host: env.HOST || '0.0.0.0',
    databaseUrl: env.DATABASE_URL || undefined,
    databaseName: env.DATABASE_NAME || undefined,
    allowedOrigins,
    downloadTtlDays: parseNumber('DOWNLOAD_TTL_DAYS', env.DOWNLOAD_TTL_DAYS, 7),
  };
};
