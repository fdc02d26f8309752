import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';

import type { AppConfig } from './config/index.js';
import type { MobileStore } from './store/types.js';
import type { PasswordVerifier } from './services/passwordVerifier.js';
import { healthCheck } from './controllers/healthController.js';
import { createLimiters, errorHandler, notFound } from './middleware/errorHandler.js';
import { createMobileRouter } from './routes/index.js';

export interface AppDeps {
  store: MobileStore;
  passwordVerifier: PasswordVerifier;
}

export const createApp = (config: AppConfig, { store, passwordVerifier }: AppDeps) => {
  const app = express();
  const { generalLimiter, authLimiter } = createLimiters(config);

  // Security middleware
  app.use(helmet());

  // CORS configuration; mobile clients usually send no Origin at all
  app.use(cors({
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
  }));

  // Rate limiting
  app.use(generalLimiter);

  // Compression middleware
  app.use(compression());

  // Logging middleware
  if (config.nodeEnv === 'development') {
    app.use(morgan('dev'));
  } else if (config.nodeEnv === 'production') {
    app.use(morgan('combined'));
  }

  // Body parsing middleware
  app.use(express.json({ limit: '100kb' }));

  // Health check endpoint
  app.get('/health', healthCheck);

  // API routes
  app.use('/api/mobile', createMobileRouter({ config, store, passwordVerifier, authLimiter }));

  // 404 handler
  app.use(notFound);

  // Error handling middleware
  app.use(errorHandler(config.nodeEnv));

  return app;
};
