/**
 * File-backed snapshot of the explored region.
 *
 * Atomic file writes via write-to-tmp + rename, so the file on disk is always
 * the last snapshot that was written completely. Load and save failures are
 * reported in the result; only storage exhaustion is thrown.
 */

import fs from 'fs';
import path from 'path';
import { decodeRegion, encodeRegion } from './persistenceCodec.js';
import { errorMessage, isFatalError } from './errors.js';
import type { ExploredRegion, LoadResult, SaveResult } from './types.js';
import { emptyRegion } from './types.js';

export class SnapshotStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /** Read the snapshot; an empty region with needsRebuild when it is missing or unusable. */
  load(): LoadResult {
    if (!fs.existsSync(this.filePath)) {
      return { region: emptyRegion(), needsRebuild: true };
    }
    try {
      const region = decodeRegion(fs.readFileSync(this.filePath));
      console.log(`[Snapshot] Loaded ${region.coordinates.length} polygon(s) from ${this.filePath}`);
      return { region, needsRebuild: false };
    } catch (err) {
      const error = errorMessage(err);
      console.warn(`[Snapshot] Discarding unreadable snapshot ${this.filePath}:`, error);
      return { region: emptyRegion(), needsRebuild: true, error };
    }
  }

  save(region: ExploredRegion): SaveResult {
    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(dir, `.explored-${Date.now()}-${Math.random().toString(36).slice(2)}.tmp`);
    try {
      const bytes = encodeRegion(region);
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(tmpPath, bytes);
      fs.renameSync(tmpPath, this.filePath);
      return { saved: true, bytes: bytes.length };
    } catch (err) {
      fs.rmSync(tmpPath, { force: true });
      if (isFatalError(err)) throw err;
      const error = errorMessage(err);
      console.warn(`[Snapshot] Failed to save snapshot to ${this.filePath}:`, error);
      return { saved: false, error };
    }
  }
}
