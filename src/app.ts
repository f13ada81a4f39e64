import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';
import { sendError } from './utils';

/**
 * Builds the Express application without binding a port
 */
export const createApp = (): Application => {
  const app = express();

  app.use(helmet());
  // Repeated query keys (?month=3&month=4) keep only the last value
  app.use(hpp());

  app.use(
    cors({
      origin: (origin, callback) => {
        // curl, server-to-server and same-origin requests carry no Origin
        if (!origin) return callback(null, true);
        const allowed = env.CORS_ORIGIN.includes('*') || env.CORS_ORIGIN.includes(origin);
        callback(null, allowed);
      },
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Requested-With', 'Accept'],
    })
  );

  app.use(
    rateLimit({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX_REQUESTS,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (_req, res) => {
        sendError(res, 'Too many requests, please try again later', 429);
      },
    })
  );

  // JSON bodies carry whole ledger batches
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(compression());
  app.use(requestLogger);

  // API routes
  app.use(env.API_PREFIX, routes);

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Interunit Loan Reconciliation API',
      version: '1.0.0',
      ledger: `${env.API_PREFIX}/ledger`,
      reconciliation: `${env.API_PREFIX}/reconciliation`,
      health: `${env.API_PREFIX}/health`,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
