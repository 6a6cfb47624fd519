import express from 'express';
import cookieParser from 'cookie-parser';
import helmet from 'helmet';
import morgan from 'morgan';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { AppConfig } from '../../config.js';
import type { DbPool } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { CafeRepo } from '../db/cafeRepo.js';
import { CommentRepo } from '../db/commentRepo.js';
import { ContactRelay, type MailTransport } from '../mail/contactRelay.js';
import { createAuthRoutes } from './routes/auth.js';
import { createCafeRoutes } from './routes/cafes.js';
import { createContactRoutes } from './routes/contact.js';
import { createPageRoutes } from './routes/pages.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { flash } from './middleware/flash.js';
import { createRateLimiters, type RateLimitOptions } from './middleware/rateLimit.js';
import { sessionMiddleware } from './middleware/session.js';
import { gravatarUrl } from './gravatar.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PROJECT_ROOT = join(__dirname, '../../..');

export interface AppDependencies {
  config: AppConfig;
  pool: DbPool;
  mailTransport: MailTransport;
  rateLimits?: RateLimitOptions;
  /** Clock used to date new cafes. */
  now?: () => Date;
}

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

export function createApp({ config, pool, mailTransport, rateLimits, now }: AppDependencies) {
  const app = express();
  const userRepo = new UserRepo(pool);
  const cafeRepo = new CafeRepo(pool);
  const commentRepo = new CommentRepo(pool);
  const limiters = createRateLimiters(rateLimits);
  const session = { secret: config.sessionSecret, secure: config.secureCookies };

  app.set('view engine', 'ejs');
  app.set('views', join(PROJECT_ROOT, 'views'));
  app.locals.gravatarUrl = gravatarUrl;
  app.locals.aboutPageEnabled = config.aboutPageEnabled;

  // Cafe photos and avatars are hot-linked from other hosts
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          'img-src': ["'self'", 'data:', 'https:', 'http:'],
        },
      },
    })
  );
  if (config.nodeEnv !== 'test') {
    app.use(morgan('dev'));
  }
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());
  app.use(limiters.general);
  app.use(express.static(join(PROJECT_ROOT, 'public')));

  // Health check endpoint (no session needed)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(pool.query('SELECT 1'), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(flash);
  app.use(sessionMiddleware(userRepo, session));

  app.use(createAuthRoutes({ userRepo, session, loginRateLimiter: limiters.login }));
  app.use(createCafeRoutes({ cafeRepo, commentRepo, superAdminId: config.superAdminId, now }));
  app.use(createContactRoutes(new ContactRelay(mailTransport, config.mail)));
  app.use(createPageRoutes({ aboutPageEnabled: config.aboutPageEnabled }));

  app.use(notFoundHandler);
  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
