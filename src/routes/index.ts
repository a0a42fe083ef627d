import { Router } from 'express';
import { LibraryContext } from '../context';
import { env } from '../config/environment';
import { HealthCheckResponse } from '../types/api.types';
import { createItemsRouter } from './v1/items.routes';
import { createUsersRouter } from './v1/users.routes';
import { createLoansRouter } from './v1/loans.routes';
import { createMaintenanceRouter } from './v1/maintenance.routes';

/**
 * API Routes Aggregator
 */
export const createRoutes = (context: LibraryContext): Router => {
  const router = Router();

  // v1 routes
  router.use('/v1/items', createItemsRouter(context.itemService));
  router.use('/v1/users', createUsersRouter(context.userService));
  router.use('/v1/loans', createLoansRouter(context.loanService));
  router.use('/v1/maintenance', createMaintenanceRouter(context.maintenanceService));

  // Health check endpoint
  router.get('/health', (_req, res) => {
    const health: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      storage: env.STORAGE_DRIVER,
      uptime: process.uptime(),
    };
    res.status(200).json(health);
  });

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Library Catalog API',
      library: context.directory.name,
    });
  });

  return router;
};
