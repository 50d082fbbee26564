/**
 * Reads the market data provider's snapshot drop: a JSON array of snapshot
 * records, or an object with a `snapshots` array.
 */

import { existsSync, readFileSync } from 'fs';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('snapshot_file');

export function extractSnapshotRecords(parsed: unknown): unknown[] {
  if (Array.isArray(parsed)) return parsed;
  if (parsed && typeof parsed === 'object' && 'snapshots' in parsed && Array.isArray(parsed.snapshots)) {
    return parsed.snapshots;
  }
  throw new Error('snapshot_file_invalid: expected an array or { "snapshots": [...] }');
}

export function loadSnapshotFile(path: string): unknown[] {
  if (!existsSync(path)) {
    throw new Error(`snapshot_file_not_found: ${path}`);
  }

  const records = extractSnapshotRecords(JSON.parse(readFileSync(path, 'utf-8')));
  logger.info({ path, recordCount: records.length }, 'Loaded snapshot records');
  return records;
}
