import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { AppContext } from './context';
import { createHealthRouter } from './routes/health';
import { createQueryRouter } from './routes/query';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';

// Create Express application
export const createApp = (context: AppContext): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  app.use(requestLogger);

  app.use('/health', createHealthRouter(context.pool, context.schema));
  app.use('/', createQueryRouter(context.agent));

  // Exported files when stored on the local filesystem
  if (context.exportsDir) {
    app.use('/exports', express.static(context.exportsDir, {
      index: false,
      setHeaders: (res) => {
        res.setHeader('Content-Disposition', 'attachment');
      }
    }));
  }

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: 'Financial Reconciliation Agent',
      status: 'running',
      timestamp: new Date().toISOString()
    });
  });

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler
  app.use(errorHandler);

  return app;
};
