import { join } from 'path';

export interface AppConfig {
  port: number;
  mongoUri: string;
  session: {
    secret: string;
    maxAgeMs: number;
  };
  bcryptRounds: number;
  viewsDir: string;
}

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

function required(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`${key} not configured. Set ${key} in environment variables.`);
  }
  return value;
}

function numberOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected a number, got "${value}"`);
  }
  return parsed;
}

export function buildConfig(env: NodeJS.ProcessEnv): AppConfig {
  return {
    port: numberOr(env.PORT, 8000),
    mongoUri: required(env, 'MONGO_URI'),
    session: {
      secret: required(env, 'SESSION_SECRET'),
      maxAgeMs: numberOr(env.SESSION_MAX_AGE_MS, ONE_DAY_MS),
    },
    bcryptRounds: numberOr(env.BCRYPT_ROUNDS, 10),
    // <root>/views from both src/config and dist/config
    viewsDir: env.VIEWS_DIR || join(__dirname, '..', '..', 'views'),
  };
}

export default (): AppConfig => buildConfig(process.env);
