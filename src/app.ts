import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';

import { env } from './config/env';
import { logger } from './observability/logger';
import { createCacheStore } from './cache/cache-service';
import { createDatabase } from './database/connection';
import { runMigrations } from './database/migrator';
import type { Database } from './database/schema';
import { KyselyUnitOfWork } from './database/unit-of-work';
import { registerErrorHandler } from './http/error-handler';
import { recordRequestTiming } from './http/request-timing';
import { createAdminGuard, createAuthGuard } from './http/guards';
import { registerHealthRoutes } from './health/health-routes';
import { LoggingEmailGateway } from './notifications/email-gateway';
import { RateLimiter } from './security/rate-limiter';

import {
  LoginInteractor,
  RegisterUserInteractor,
  RequestPasswordResetInteractor,
  ResetPasswordInteractor,
} from './users/auth-interactors';
import { registerAuthRoutes } from './users/auth-routes';
import { BcryptPasswordHasher } from './users/password-hasher';
import { JwtTokenService } from './users/token-service';
import { UserRepository } from './users/user-repository';

import { CreateCategoryInteractor, CreateProductInteractor, RestockProductInteractor } from './catalog/catalog-interactors';
import { CatalogQueries } from './catalog/catalog-queries';
import { registerCatalogRoutes } from './catalog/catalog-routes';
import { SitemapQueries } from './catalog/sitemap';

import {
  AddToCartInteractor,
  ClearCartInteractor,
  RemoveFromCartInteractor,
  UpdateCartItemInteractor,
} from './cart/cart-interactors';
import { CartQueries } from './cart/cart-queries';
import { registerCartRoutes } from './cart/cart-routes';

import { PlaceOrderInteractor } from './orders/order-placement';
import { OrderQueries } from './orders/order-queries';
import { registerOrderRoutes } from './orders/order-routes';
import { OrderStatusService } from './orders/order-service';

export interface AppOptions {
  /** Overrides DATABASE_URL; tests pass ':memory:' */
  databaseUrl?: string;
  /** Overrides REDIS_URL; an empty string disables Redis */
  redisUrl?: string;
}

export interface AppContext {
  app: FastifyInstance;
  db: Database;
  redis?: Redis;
}

async function connectRedis(url: string): Promise<Redis | undefined> {
  if (!url) {
    logger.info('REDIS_URL not set; using in-memory cache');
    return undefined;
  }

  try {
    const redisInstance = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(options: AppOptions = {}): Promise<AppContext> {
  // Initialize Fastify
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
    genReqId: (req) => {
      const incoming = req.headers['x-request-id'];
      return typeof incoming === 'string' && incoming ? incoming : uuidv4();
    },
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PATCH', 'DELETE'],
  });

  registerErrorHandler(app);

  app.addHook('onRequest', (req, reply, done) => {
    reply.header('x-request-id', req.id);
    done();
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    recordRequestTiming(
      {
        requestId: req.id,
        method: req.method,
        route: req.routeOptions?.url ?? req.url,
        statusCode: reply.statusCode,
        elapsedMs: reply.elapsedTime,
        clientIp: req.ip,
      },
      env.observability.slowRequestMs,
    );
    done();
  });

  // ───── Persistence ─────
  const db = createDatabase({
    url: options.databaseUrl ?? env.database.url,
    poolMax: env.database.poolMax,
    ssl: env.database.ssl,
  });
  await runMigrations(db);
  const uow = new KyselyUnitOfWork(db);

  const redis = await connectRedis(options.redisUrl ?? env.redis.url);
  const cache = createCacheStore(redis, {
    keyPrefix: `${env.redis.keyPrefix}cache:`,
    defaultTtlSeconds: env.cache.ttlSeconds,
  });

  // ───── Auth ─────
  const hasher = new BcryptPasswordHasher(env.auth.bcryptRounds);
  const tokens = new JwtTokenService({
    secret: env.auth.jwtSecret,
    expiresInMinutes: env.auth.jwtExpiresInMinutes,
  });
  const mail = new LoggingEmailGateway(env.mail.from, env.appUrl);
  const loginLimiter = new RateLimiter(env.security.loginRateLimit, env.security.loginRateLimitWindowSeconds);

  const requireUser = createAuthGuard(tokens);
  const requireAdmin = createAdminGuard(env.security.adminApiKey);
  const defaultPageSize = env.commerce.defaultPageSize;
  const currency = env.commerce.defaultCurrency;

  // ───── Register Routes ─────
  registerHealthRoutes(app, { db, redis, enableMetrics: env.observability.enableMetrics });

  registerAuthRoutes(app, {
    register: new RegisterUserInteractor(uow, hasher, mail),
    login: new LoginInteractor(new UserRepository(db), hasher, tokens, loginLimiter),
    requestPasswordReset: new RequestPasswordResetInteractor(uow, mail, env.auth.passwordResetTtlMinutes),
    resetPassword: new ResetPasswordInteractor(uow, hasher),
  });

  registerCatalogRoutes(app, {
    queries: new CatalogQueries(db, cache, env.cache.ttlSeconds),
    sitemap: new SitemapQueries(db, env.appUrl),
    createCategory: new CreateCategoryInteractor(uow, cache),
    createProduct: new CreateProductInteractor(uow, currency),
    restockProduct: new RestockProductInteractor(uow, cache),
    requireAdmin,
    defaultPageSize,
  });

  registerCartRoutes(app, {
    queries: new CartQueries(db, currency),
    addItem: new AddToCartInteractor(uow),
    updateItem: new UpdateCartItemInteractor(uow),
    removeItem: new RemoveFromCartInteractor(uow),
    clear: new ClearCartInteractor(uow),
    requireUser,
  });

  registerOrderRoutes(app, {
    placeOrder: new PlaceOrderInteractor(uow, cache, currency),
    statuses: new OrderStatusService(uow, cache),
    queries: new OrderQueries(db),
    requireUser,
    requireAdmin,
    defaultPageSize,
  });

  app.addHook('onClose', async () => {
    await db.destroy();
    if (redis) {
      redis.disconnect();
    }
  });

  logger.info({ env: env.nodeEnv }, 'Storefront API initialized');
  return { app, db, redis };
}
