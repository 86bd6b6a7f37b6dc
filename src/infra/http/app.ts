import express from 'express';
import { UserRepository } from '../../domain/auth/user.js';
import { PostRepository } from '../../domain/posts/post.js';
import { SessionTokens } from '../../application/auth/sessionToken.js';
import { StaticDataService } from '../../application/catalog/staticDataService.js';
import { createWebRoutes } from './routes/web.js';
import { createAuthRoutes } from './routes/auth.js';
import { createAccessRoutes } from './routes/access.js';
import { createUserRoutes } from './routes/users.js';
import { createPostRoutes } from './routes/posts.js';
import { createCatalogRoutes } from './routes/catalog.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { sessionMiddleware } from './middleware/session.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';

export interface AppSettings {
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  minAdultAge: number;
  minVerifiedAge: number;
  apiRateLimit: number;
  loginRateLimit: number;
}

export interface AppDependencies {
  settings: AppSettings;
  userRepo: UserRepository;
  postRepo: PostRepository;
  /** Defaults to a freshly seeded catalog. */
  catalog?: StaticDataService;
  /** Resolves when the database answers; used by /healthz. */
  healthCheck: () => Promise<void>;
  /** Serve the OpenAPI docs under /docs. On by default. */
  docs?: boolean;
}

const HEALTH_CHECK_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Application {
  const { settings, userRepo, postRepo } = deps;
  const tokens = new SessionTokens(settings.jwtSecret, settings.jwtExpiresInSeconds);
  const catalog = deps.catalog ?? new StaticDataService();

  const app = express();

  app.use(express.json());
  app.use(createApiRateLimiter(settings.apiRateLimit));

  // Health check endpoint (no session needed)
  app.get('/healthz', (_req, res) => {
    withTimeout(deps.healthCheck(), HEALTH_CHECK_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((error: unknown) => {
        console.error('Health check failed:', error);
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  if (deps.docs !== false) {
    app.use(createSwaggerRoutes());
  }

  app.use(sessionMiddleware(tokens));

  app.use(createWebRoutes());
  app.use('/catalog', createCatalogRoutes({ catalog, minVerifiedAge: settings.minVerifiedAge }));
  app.use('/api/auth', createAuthRoutes({ userRepo, tokens, loginRateLimit: settings.loginRateLimit }));
  app.use('/api', createAccessRoutes({ minAdultAge: settings.minAdultAge }));
  app.use('/api', createUserRoutes({ userRepo, postRepo }));
  app.use('/api', createPostRoutes({ postRepo, userRepo }));

  app.use(notFoundHandler);
  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
