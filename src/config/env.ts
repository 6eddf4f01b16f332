import dotenv from 'dotenv';

export type StorageDriver = 'mongo' | 'memory';

export interface AppConfig {
  port: number;
  storageDriver: StorageDriver;
  mongoUri?: string;
  weather: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
  };
  jwt: {
    secret: string;
    expiresInSeconds: number;
  };
  bcryptRounds: number;
  corsOrigins: string[];
  allowStoreReset: boolean;
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`${name} is not defined in .env!`);
  }
  return value;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function storageDriver(env: Env): StorageDriver {
  const raw = env.STORAGE_DRIVER?.trim().toLowerCase() || 'mongo';
  if (raw !== 'mongo' && raw !== 'memory') {
    throw new Error(`STORAGE_DRIVER must be "mongo" or "memory", got "${raw}"`);
  }
  return raw;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const driver = storageDriver(env);

  return {
    port: positiveInt(env, 'PORT', 3001),
    storageDriver: driver,
    mongoUri: driver === 'mongo' ? required(env, 'MONGODB_URI') : env.MONGODB_URI,
    weather: {
      apiKey: required(env, 'WEATHER_API_KEY'),
      baseUrl: env.WEATHER_API_URL?.trim() || 'https://api.openweathermap.org',
      timeoutMs: positiveInt(env, 'WEATHER_TIMEOUT_MS', 5000),
    },
    jwt: {
      secret: required(env, 'JWT_SECRET'),
      expiresInSeconds: positiveInt(env, 'JWT_EXPIRES_IN_SECONDS', 30 * 24 * 60 * 60),
    },
    bcryptRounds: positiveInt(env, 'BCRYPT_ROUNDS', 10),
    corsOrigins: (env.CORS_ORIGINS || 'http://localhost:3000')
      .split(',')
      .map(origin => origin.trim())
      .filter(Boolean),
    allowStoreReset: env.ALLOW_STORE_RESET?.trim().toLowerCase() === 'true',
  };
}

// Reads .env into process.env; call once before loadConfig at startup.
export function loadDotenv(): void {
  dotenv.config();
}
