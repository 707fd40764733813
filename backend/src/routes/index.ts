import { Router } from 'express';
import { createExplorerRoutes } from './explorerRoutes.js';
import { pool } from '../db/index.js';
import type { ExplorerService } from '../services/explorer/index.js';

export function createRoutes(service: ExplorerService): Router {
  const router = Router();

  // Health check
  router.get('/health', async (_req, res) => {
    const { areaSquareMeters } = service.statistics();
    try {
      await pool.query('SELECT 1');
      res.json({ status: 'ok', database: 'connected', areaSquareMeters, timestamp: new Date().toISOString() });
    } catch {
      res.status(503).json({ status: 'degraded', database: 'disconnected', areaSquareMeters, timestamp: new Date().toISOString() });
    }
  });

  router.use('/api/explorer', createExplorerRoutes(service));

  return router;
}
