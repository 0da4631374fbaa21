import { Router, type Request, type Response, type NextFunction } from 'express';
import type { Database } from '../../db/connection.js';
import { logger } from '../../utils/logger.js';
import { InternalServerError } from '../errors.js';

/**
 * Public routes: landing message and database health check
 */
export function createHealthRouter(db: Database.Database): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Contacts API' });
  });

  /**
   * GET /api/healthchecker - runs SELECT 1 against the database
   */
  router.get('/api/healthchecker', (_req: Request, res: Response, next: NextFunction) => {
    let row: { ok: number } | undefined;
    try {
      row = db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
    } catch (error) {
      logger.error({ error }, 'Health check query failed');
      next(new InternalServerError('Error connecting to database'));
      return;
    }

    if (row?.ok !== 1) {
      next(new InternalServerError('Database is not configured correctly'));
      return;
    }

    res.json({ message: 'Database connection OK' });
  });

  return router;
}
