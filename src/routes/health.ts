import { Router, Request, Response } from 'express';
import { QueryPool, checkDatabaseHealth } from '../db/connection';
import { SchemaDescriptor } from '../types';
import { asyncHandler } from '../middleware/errorHandler';

interface HealthCheck {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  services: {
    database: {
      status: string;
      message: string;
    };
    schema: {
      status: string;
      tables: number;
    };
  };
  responseTime: number;
}

export function createHealthRouter(pool: QueryPool, schema: SchemaDescriptor): Router {
  const router = Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const startTime = Date.now();
    const database = await checkDatabaseHealth(pool);
    const healthy = database.status === 'healthy' && schema.size > 0;

    const health: HealthCheck = {
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: {
        database,
        schema: {
          status: schema.size > 0 ? 'loaded' : 'empty',
          tables: schema.size
        }
      },
      responseTime: Date.now() - startTime
    };

    res.status(healthy ? 200 : 503).json(health);
  }));

  // Liveness probe, no dependencies
  router.get('/liveness', (_req: Request, res: Response) => {
    res.json({ status: 'alive', timestamp: new Date().toISOString() });
  });

  return router;
}
