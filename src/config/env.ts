import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function required(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required env var: ${key}`);
  return val;
}

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  projectRoot,
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),
  appUrl: optional('APP_URL', 'http://localhost:3000'),

  // ───── Persistence ─────
  database: {
    // postgres://… selects PostgreSQL; anything else is a SQLite file path
    url: optional('DATABASE_URL', path.join(projectRoot, 'data', 'storefront.db')),
    poolMax: optionalInt('DB_POOL_MAX', 10),
    ssl: optionalBool('DB_SSL', false),
  },

  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'storefront:'),
  },

  cache: {
    ttlSeconds: optionalInt('CACHE_TTL_SECONDS', 60),
  },

  // ───── Auth ─────
  auth: {
    jwtSecret: required('JWT_SECRET'),
    jwtExpiresInMinutes: optionalInt('JWT_EXPIRES_IN_MINUTES', 30),
    passwordResetTtlMinutes: optionalInt('PASSWORD_RESET_TTL_MINUTES', 60),
    bcryptRounds: optionalInt('BCRYPT_ROUNDS', 10),
  },

  security: {
    adminApiKey: required('ADMIN_API_KEY'),
    loginRateLimit: optionalInt('LOGIN_RATE_LIMIT', 10),
    loginRateLimitWindowSeconds: optionalInt('LOGIN_RATE_LIMIT_WINDOW_SECONDS', 60),
  },

  // ───── Commerce ─────
  commerce: {
    defaultCurrency: optional('DEFAULT_CURRENCY', 'USD'),
    defaultPageSize: optionalInt('PAGE_SIZE_DEFAULT', 20),
  },

  mail: {
    from: optional('MAIL_FROM', 'noreply@example.com'),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
    slowRequestMs: optionalInt('SLOW_REQUEST_MS', 1000),
  },

  seedFile: optional('SEED_FILE', path.join(projectRoot, 'config', 'seed-catalog.yaml')),

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
} as const;
