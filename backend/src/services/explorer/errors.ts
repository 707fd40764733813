/**
 * Errors the engine must not swallow: storage exhaustion and failed allocations.
 * Everything else in ingest, persistence and rebuild is recoverable.
 */

const FATAL_CODES = new Set(['ENOSPC', 'EDQUOT', 'ENOMEM']);

export function isFatalError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ('code' in err && typeof err.code === 'string' && FATAL_CODES.has(err.code)) {
    return true;
  }
  return err instanceof RangeError && /allocation failed|invalid array length|out of memory/i.test(err.message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
