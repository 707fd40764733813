/**
 * Explorer Controller: ingest, maintenance, fog export and statistics.
 *
 * Handlers close over the process's ExplorerService; request bodies are
 * parsed with zod here, so a malformed body becomes a 400 via the error handler.
 */

import type { Request, Response } from 'express';
import type { ExplorerService } from '../services/explorer/index.js';
import { formatPercent } from '../services/explorer/index.js';
import { serviceUnavailable } from '../middleware/errorHandler.js';
import { ingestBodySchema, resetBodySchema, type IngestSummary, type StatsResponse } from '../types/index.js';

export function createExplorerController(service: ExplorerService) {
  /**
   * Add a batch of readings in order
   */
  async function ingestReadings(req: Request, res: Response): Promise<void> {
    const { readings } = ingestBodySchema.parse(req.body);
    const summary: IngestSummary = {
      received: readings.length,
      accepted: 0,
      rejected: 0,
      skipped: 0,
      tunnels: 0,
      errors: [],
    };

    for (const reading of readings) {
      const result = await service.ingest(reading);
      if (result.status === 'accepted') {
        summary.accepted++;
        if (result.tunnel) summary.tunnels++;
      } else if (result.status === 'rejected') {
        summary.rejected++;
        summary.errors.push(result.error);
      } else {
        summary.skipped++;
      }
    }

    res.json(summary);
  }

  /**
   * Rebuild the region from the raw fix log
   */
  async function rebuildRegion(_req: Request, res: Response): Promise<void> {
    const result = await service.rebuildFromLog();
    if (!result) {
      throw serviceUnavailable('No fix history available to rebuild from');
    }
    res.json({ rebuild: result, save: service.save() });
  }

  async function resetRegion(req: Request, res: Response): Promise<void> {
    const { clearLog } = resetBodySchema.parse(req.body ?? {});
    const save = await service.reset({ clearLog });
    res.json({ reset: true, clearLog, save });
  }

  function saveSnapshot(_req: Request, res: Response): void {
    res.json(service.save());
  }

  function getFog(_req: Request, res: Response): void {
    res.json(service.fogPolygon());
  }

  function getTunnels(_req: Request, res: Response): void {
    res.json(service.tunnelLines());
  }

  function getStats(_req: Request, res: Response): void {
    const stats = service.statistics();
    const response: StatsResponse = {
      ...stats,
      percentOfLandLabel: `${formatPercent(stats.percentOfLand)}%`,
    };
    res.json(response);
  }

  return { ingestReadings, rebuildRegion, resetRegion, saveSnapshot, getFog, getTunnels, getStats };
}

export type ExplorerController = ReturnType<typeof createExplorerController>;
