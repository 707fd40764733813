/**
 * Explorer Routes: location ingest, fog export and maintenance.
 */

import { Router } from 'express';
import { createExplorerController } from '../controllers/explorerController.js';
import { ingestLimiter, maintenanceLimiter, readLimiter } from '../middleware/rateLimiter.js';
import type { ExplorerService } from '../services/explorer/index.js';

export function createExplorerRoutes(service: ExplorerService): Router {
  const router = Router();
  const controller = createExplorerController(service);

  // Ingest
  router.post('/fixes', ingestLimiter, controller.ingestReadings);

  // Export & statistics
  router.get('/fog', readLimiter, controller.getFog);
  router.get('/tunnels', readLimiter, controller.getTunnels);
  router.get('/stats', readLimiter, controller.getStats);

  // Maintenance
  router.post('/rebuild', maintenanceLimiter, controller.rebuildRegion);
  router.post('/reset', maintenanceLimiter, controller.resetRegion);
  router.post('/snapshot', maintenanceLimiter, controller.saveSnapshot);

  return router;
}
