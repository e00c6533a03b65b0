import compression from 'compression';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import type { Express } from 'express';
import type { ILogger } from '@keepsake/types';
import { requestContext } from '../api/middleware/request-context.js';
import { createErrorHandler } from '../api/middleware/error-handler.js';
import { NotFoundError } from '../lib/errors.js';
import type { AppConfig } from '../config/env.js';

/**
 * Origins allowed to call the API with credentials.
 */
export function buildAllowedOrigins(siteUrl: string): string[] {
  const allowedOrigins = ['http://localhost:3000', 'http://localhost:4000', new URL(siteUrl).origin];

  // Add www variant for production domains
  if (siteUrl.startsWith('https://') && !siteUrl.includes('www.')) {
    allowedOrigins.push(new URL(siteUrl.replace('https://', 'https://www.')).origin);
  }

  return [...new Set(allowedOrigins)];
}

/**
 * Create the Express app with the shared middleware stack.
 *
 * Routes are mounted afterwards by the modules; call {@link attachErrorHandling}
 * once they are in place.
 */
export function createExpressApp(config: AppConfig, logger: ILogger): Express {
  const app = express();
  const allowedOrigins = buildAllowedOrigins(config.siteUrl);

  app.set('trust proxy', true);
  app.use(requestContext);
  app.use(helmet());

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (same-origin, curl)
      if (!origin) return callback(null, true);

      if (allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('CORS policy: Origin not allowed'));
      }
    },
    credentials: true
  }));

  app.use(compression());
  app.use(cookieParser(config.session.secret));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  if (config.nodeEnv !== 'test') {
    app.use(morgan(config.nodeEnv === 'production' ? 'combined' : 'dev', {
      stream: { write: line => logger.info({ access: line.trim() }, 'HTTP request') }
    }));
  }

  return app;
}

/**
 * Add the 404 fallback and the error handler. Must run after every router is mounted.
 */
export function attachErrorHandling(app: Express, logger: ILogger): void {
  app.use('/api', (req, _res, next) => {
    next(new NotFoundError(`No route for ${req.method} ${req.originalUrl}`));
  });
  app.use(createErrorHandler(logger));
}
