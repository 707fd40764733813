import { config } from 'dotenv';
import { resolve } from 'path';

// Load .env BEFORE any other imports that might use env vars
config({ path: resolve(process.cwd(), '.env') });
config({ path: resolve(process.cwd(), '../.env') });

// Log DB connection info only in development
if (process.env.NODE_ENV !== 'production') {
  console.log('DB Config:', {
    host: process.env.DB_HOST,
    port: process.env.DB_PORT,
    database: process.env.DB_NAME,
  });
}

// Now import everything else
import 'express-async-errors';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { loadConfig } from './config.js';

const appConfig = loadConfig();
const app = express();

// Security middleware
app.use(helmet());
app.use(cors({
  origin: appConfig.frontendOrigin,
}));

// Location batches can be large
app.use(express.json({ limit: '2mb' }));

// Lazy load modules that read env vars at import time
const startServer = async () => {
  const { db, pool } = await import('./db/index.js');
  const { ExplorerService, SnapshotStore, PgFixLog, ensureFixLogSchema } = await import('./services/explorer/index.js');
  const { createRoutes } = await import('./routes/index.js');
  const { errorHandler } = await import('./middleware/errorHandler.js');

  // The fix log is optional at startup: without it the service still runs from its snapshot
  let fixLogReady = true;
  try {
    await ensureFixLogSchema(pool);
  } catch (err) {
    fixLogReady = false;
    console.warn('⚠️  Fix log unavailable, continuing without rebuild history:', err instanceof Error ? err.message : err);
  }

  const service = new ExplorerService({
    store: new SnapshotStore(appConfig.snapshotPath),
    fixLog: fixLogReady ? new PgFixLog(db) : undefined,
    autosaveIntervalMs: appConfig.autosaveIntervalMs,
    maxAccuracyMeters: appConfig.maxAccuracyMeters,
  });

  const started = await service.start();
  console.log(`🗺️  Explored region ${started.restored ? 'restored from snapshot' : 'not restored'}${started.rebuild ? `, rebuilt from ${started.rebuild.replayedCount} fixes` : ''}`);

  // Routes
  app.use(createRoutes(service));

  // Error handling (must be last)
  app.use(errorHandler);

  const server = app.listen(appConfig.port, '0.0.0.0', () => {
    console.log(`🚀 Backend server running on http://localhost:${appConfig.port}`);
    console.log(`📊 Health check: http://localhost:${appConfig.port}/health`);
    console.log(`🗺️  API: http://localhost:${appConfig.port}/api/explorer`);
  });

  // Final save before releasing resources
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close();
    try {
      service.shutdown();
    } catch (err) {
      console.error('Final snapshot save failed:', err);
      process.exitCode = 1;
    }
    pool.end().catch((err) => console.error('Failed to close database pool:', err));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
};

startServer().catch(console.error);
