import express from 'express';
import cors, { CorsOptions } from 'cors';
import { appConfig } from './connections/config/app.config';
import { DataStore } from './connections/db/repositories/types';
import { createApiRouter } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import { requestLogger } from './middlewares/request-logger.middleware';
import { logger } from './utils/logging';

// Every origin is allowed when CORS_ORIGINS is empty
const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    if (!origin || appConfig.corsOrigins.length === 0 || appConfig.corsOrigins.includes(origin)) {
      callback(null, true);
    } else {
      callback(new Error('Not allowed by CORS'));
    }
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
  maxAge: 86400, // 24 hours
  optionsSuccessStatus: 200,
};

export const createApp = (store: DataStore) => {
  const app = express();

  app.use(cors(corsOptions));
  app.use(requestLogger);
  app.use(express.json());

  app.get('/', (req, res) => {
    res.json({
      status: 'OK',
      message: `${appConfig.projectName} is running`,
      version: appConfig.version,
    });
  });

  // Health check
  app.get('/health', async (req, res) => {
    const timestamp = new Date().toISOString();
    try {
      await store.ping();
      res.json({ status: 'healthy', database: 'connected', timestamp });
    } catch (error) {
      logger.error('Health check failed', { error: error instanceof Error ? error.message : String(error) });
      res.status(503).json({ status: 'unhealthy', database: 'disconnected', timestamp });
    }
  });

  app.use('/api/v1', createApiRouter(store));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
