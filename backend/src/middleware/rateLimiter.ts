/**
 * Shared Rate Limiters
 *
 * Tiers:
 * 1. Ingest: location batches from the tracking client (120 req/min)
 * 2. Read: fog/tunnel/stats polling from the map view (60 req/min)
 * 3. Maintenance: rebuild, reset and forced snapshot (5 req/min)
 */
import rateLimit from 'express-rate-limit';

export const ingestLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 120, // a batch every half second
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many location uploads, please batch readings' },
});

export const readLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 60,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later' },
});

export const maintenanceLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 5, // rebuild is a long exclusive operation
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many maintenance requests, please try again later' },
});
