import dotenv from 'dotenv';
import { ConfigError } from '../errors/ConfigError.js';

export type NodeEnv = 'development' | 'production' | 'test';
export type StoreDriver = 'mongo' | 'memory';
export type PasswordScheme = 'plain' | 'bcrypt';

export interface AppConfig {
  port: number;
  nodeEnv: NodeEnv;
  mongodbUri: string;
  mongodbDbName: string;
  storeDriver: StoreDriver;
  passwordScheme: PasswordScheme;
  appVersion: string;
  minAppVersion: string;
  corsOrigins: string[] | '*';
  rateLimit: {
    windowMs: number;
    maxRequests: number;
    authMaxRequests: number;
  };
}

type Env = Record<string, string | undefined>;

const oneOf = <T extends string>(name: string, value: string, allowed: readonly T[]): T => {
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ConfigError(`${name} must be one of ${allowed.join(', ')} (got "${value}")`);
  }
  return match;
};

const positiveInt = (name: string, value: string, max = Number.MAX_SAFE_INTEGER): number => {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed < 1 || parsed > max) {
    throw new ConfigError(`${name} must be an integer between 1 and ${max} (got "${value}")`);
  }
  return parsed;
};

const parseOrigins = (value: string): string[] | '*' => {
  const origins = value.split(',').map((origin) => origin.trim()).filter(Boolean);
  if (origins.length === 0 || origins.includes('*')) {
    return '*';
  }
  return origins;
};

export const loadConfig = (env: Env = process.env): AppConfig => ({
  // Server
  port: positiveInt('PORT', env.PORT || '5002', 65535),
  nodeEnv: oneOf('NODE_ENV', env.NODE_ENV || 'development', ['development', 'production', 'test'] as const),

  // Database
  mongodbUri: env.MONGODB_URI || 'mongodb://localhost:27017',
  mongodbDbName: env.MONGODB_DB_NAME || 'shop',
  storeDriver: oneOf('STORE_DRIVER', env.STORE_DRIVER || 'mongo', ['mongo', 'memory'] as const),

  // Auth
  passwordScheme: oneOf('PASSWORD_SCHEME', env.PASSWORD_SCHEME || 'plain', ['plain', 'bcrypt'] as const),

  // Version check
  appVersion: env.APP_VERSION || '2.0.0',
  minAppVersion: env.MIN_APP_VERSION || '1.0.0',

  // CORS
  corsOrigins: parseOrigins(env.CORS_ORIGINS || '*'),

  // Rate Limiting
  rateLimit: {
    windowMs: positiveInt('RATE_LIMIT_WINDOW_MS', env.RATE_LIMIT_WINDOW_MS || '900000'), // 15 minutes
    maxRequests: positiveInt('RATE_LIMIT_MAX_REQUESTS', env.RATE_LIMIT_MAX_REQUESTS || '1000'),
    authMaxRequests: positiveInt('AUTH_RATE_LIMIT_MAX', env.AUTH_RATE_LIMIT_MAX || '20'),
  },
});

// Reads .env into process.env; existing variables win.
export const loadEnvFile = (): void => {
  dotenv.config();
};
