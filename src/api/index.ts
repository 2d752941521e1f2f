import express, { type Express } from 'express';
import type Redis from 'ioredis';
import { authConfigFrom, type AuthConfig } from '../auth/authConfig';
import { CredentialVerifier } from '../auth/credentials';
import { createPasswordHasher, type PasswordHasher } from '../auth/passwords';
import { SessionService } from '../auth/sessions';
import { parseTestNow, setTestNow } from '../shared/clock';
import { config as defaultConfig, type AppConfig } from '../shared/config';
import { createLogger, type Logger } from '../shared/logger';
import { createAuthMiddleware } from './middleware/auth';
import { createErrorHandler } from './middleware/errors';
import { createRequestLogMiddleware } from './middleware/requestLog';
import { createAppointmentRoutes } from './routes/appointments';
import { createBarbershopRoutes } from './routes/barbershops';
import { createReviewRoutes } from './routes/reviews';
import { createTokenRoutes } from './routes/token';
import { createUserRoutes } from './routes/users';
import { InMemoryAppointmentStore, type AppointmentStore } from './store/appointmentStore';
import { InMemoryBarbershopStore, type BarbershopStore } from './store/barbershopStore';
import { connectRedis } from './store/redis';
import { InMemoryReviewStore, type ReviewStore } from './store/reviewStore';
import { InMemoryRevocationStore, RedisRevocationStore, type RevocationStore } from './store/revocationStore';
import { InMemoryUserStore, RedisUserStore, type UserStore } from './store/userStore';

export interface AppDependencies {
  auth: AuthConfig;
  users: UserStore;
  barbershops: BarbershopStore;
  appointments: AppointmentStore;
  reviews: ReviewStore;
  passwords: PasswordHasher;
  logger: Logger;
  slowRequestMs: number;
  testMode: boolean;
}

export function createApp(deps: AppDependencies): Express {
  const { auth, users, barbershops, appointments, reviews, passwords, logger } = deps;
  const sessions = new SessionService(
    auth,
    users,
    new CredentialVerifier(users, passwords),
    logger.child({ component: 'sessions' }),
  );

  const app = express();
  app.use(express.json());

  if (deps.testMode) {
    app.use((req, _res, next) => {
      const testNow = parseTestNow(req.get('x-test-now'));
      if (testNow) setTestNow(testNow);
      next();
    });
  }

  app.use(createRequestLogMiddleware(logger.child({ component: 'http' }), { slowRequestMs: deps.slowRequestMs }));

  // Public routes
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'barbershop-api' });
  });

  const authenticate = createAuthMiddleware(sessions.validator);
  app.use('/', createTokenRoutes(sessions, authenticate));

  app.use(authenticate);
  app.use('/users', createUserRoutes({ users, passwords, logger: logger.child({ component: 'users' }) }));
  app.use('/barbershops', createBarbershopRoutes({ barbershops, reviews }));
  app.use(
    '/appointments',
    createAppointmentRoutes({ appointments, barbershops, users, logger: logger.child({ component: 'appointments' }) }),
  );
  app.use(
    '/reviews',
    createReviewRoutes({ reviews, appointments, barbershops, users, logger: logger.child({ component: 'reviews' }) }),
  );

  app.use((_req, res) => {
    res.status(404).json({ detail: 'Not found.' });
  });
  app.use(createErrorHandler(logger));

  return app;
}

export async function buildDependencies(
  appConfig: AppConfig,
  logger: Logger,
): Promise<{ deps: AppDependencies; redis: Redis | null }> {
  let redis: Redis | null = null;
  let users: UserStore;
  let revocations: RevocationStore;

  if (appConfig.store.backend === 'redis') {
    redis = await connectRedis({ url: appConfig.store.redisUrl, commandTimeoutMs: appConfig.store.timeoutMs });
    users = new RedisUserStore(redis);
    revocations = new RedisRevocationStore(redis);
  } else {
    logger.warn('Using in-memory stores; data is lost on restart');
    users = new InMemoryUserStore();
    revocations = new InMemoryRevocationStore();
  }

  return {
    redis,
    deps: {
      auth: authConfigFrom(appConfig, revocations),
      users,
      barbershops: new InMemoryBarbershopStore(),
      appointments: new InMemoryAppointmentStore(),
      reviews: new InMemoryReviewStore(),
      passwords: createPasswordHasher(appConfig.passwords.bcryptRounds),
      logger,
      slowRequestMs: appConfig.api.slowRequestMs,
      testMode: appConfig.isTest,
    },
  };
}

// Initialize and start
async function start(): Promise<void> {
  const logger = createLogger(defaultConfig.log.level, { service: 'barbershop-api' });
  const { deps, redis } = await buildDependencies(defaultConfig, logger);
  const app = createApp(deps);

  const port = defaultConfig.api.port;
  const server = app.listen(port, () => {
    logger.info('API listening', { port, store: defaultConfig.store.backend });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      if (redis) {
        redis.disconnect();
      }
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  start().catch((error: unknown) => {
    console.error('Failed to start', error);
    process.exit(1);
  });
}
