/**
 * Express Application
 */

import express, { type Express } from 'express';
import cors from 'cors';
import { env } from '@/shared/config';
import { cuidController, createCuidRouter, cuidErrorHandler, type CuidController } from '@/modules/cuid';

export function createApp(controller: CuidController = cuidController): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: env.FRONTEND_URL }));
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      message: 'CUID service is running',
      uptime: process.uptime(),
      generators: controller.getStats().activeGenerators,
    });
  });

  app.use('/api', createCuidRouter(controller));
  app.use(cuidErrorHandler);

  return app;
}
