import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { errorHandler } from './middleware/errorHandler';
import { createAlertRoutes } from './routes/alerts';
import { createStatusRoutes } from './routes/status';
import { WhaleService } from './services/whaleService';
import { AnalystService } from './services/analystService';
import { Errors } from '../../shared/errors/ErrorClassifier';

export interface AppDeps {
  whales: WhaleService;
  analyst: AnalystService | null;
  maxLimit: number;
}

export const createApp = ({ whales, analyst, maxLimit }: AppDeps) => {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  }));
  app.use(compression());
  app.use(express.json());

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Routes
  app.use('/api/alerts', createAlertRoutes({ whales, analyst, maxLimit }));
  app.use('/api/status', createStatusRoutes(whales));

  app.use((req, res, next) => {
    next(Errors.NotFound(`Route ${req.method} ${req.path}`));
  });

  // Error handling
  app.use(errorHandler);

  return app;
};
