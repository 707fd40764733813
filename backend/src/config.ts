import path from 'path';
import { z } from 'zod';

/**
 * Runtime configuration from environment variables (after dotenv has run).
 * Database settings are read directly by db/index.ts.
 */

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  BACKEND_PORT: z.coerce.number().int().positive().default(3001),
  FRONTEND_URL: z.string().url().default('http://localhost:5173'),
  SNAPSHOT_PATH: z.string().min(1).default(path.join('data', 'explored.wkb')),
  AUTOSAVE_INTERVAL_MS: z.coerce.number().int().nonnegative().default(30_000),
  MAX_ACCURACY_METERS: z.coerce.number().positive().default(40),
});

export interface AppConfig {
  nodeEnv: string;
  port: number;
  frontendOrigin: string;
  snapshotPath: string;
  autosaveIntervalMs: number;
  maxAccuracyMeters: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.BACKEND_PORT,
    frontendOrigin: parsed.FRONTEND_URL,
    snapshotPath: path.resolve(process.cwd(), parsed.SNAPSHOT_PATH),
    autosaveIntervalMs: parsed.AUTOSAVE_INTERVAL_MS,
    maxAccuracyMeters: parsed.MAX_ACCURACY_METERS,
  };
}
