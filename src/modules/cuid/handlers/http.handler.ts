/**
 * CUID HTTP Handler
 * Express routes over the CUID controller
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { logger } from '@/shared/utils';
import type { CuidController } from '../controllers/cuid.controller';
import { CuidErrorType, isCuidError } from '../types/error.types';

const STATUS_BY_ERROR: Partial<Record<CuidErrorType, number>> = {
  [CuidErrorType.INVALID_INPUT]: 400,
  [CuidErrorType.GENERATOR_NOT_FOUND]: 404,
  [CuidErrorType.NAME_TAKEN]: 409,
};

function parseCount(raw: unknown): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  // Non-numeric text becomes NaN and is rejected by the controller
  return typeof raw === 'string' && /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
}

export function createCuidRouter(controller: CuidController): Router {
  const router = Router();

  router.get('/cuid', (req: Request, res: Response) => {
    const handle = controller.getDefaultHandle();
    const count = parseCount(req.query.count);

    if (count === undefined) {
      res.json({ id: controller.generate(handle) });
      return;
    }

    res.json({ ids: controller.generateMany(handle, count) });
  });

  router.get('/cuid/:id', (req: Request, res: Response) => {
    res.json(controller.parse(req.params.id));
  });

  return router;
}

/**
 * Maps CuidError types onto HTTP statuses; anything else is a 500
 */
export function cuidErrorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isCuidError(error)) {
    const status = STATUS_BY_ERROR[error.type];
    if (status !== undefined) {
      res.status(status).json({ error: error.message, type: error.type });
      return;
    }
  }

  logger.error('Unhandled request error', error);
  res.status(500).json({ error: 'Internal server error' });
}
