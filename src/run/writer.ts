/**
 * Run Writer
 * Saves run records to disk for the presentation layer and keeps a small run index beside them
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { basename, join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { contentHash } from '@/core/seed';
import type { RunRecordV1 } from './types';

const logger = createChildLogger('run_writer');

export interface WriteResult {
  runId: string;
  filePath: string;
  contentHash: string;
}

export interface RunIndexEntry {
  run_id: string;
  run_date: string;
  file: string;
  content_hash: string;
  watchlist: string;
  scored: number;
  failed: number;
}

function isIndexEntry(value: unknown): value is RunIndexEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'run_id' in value &&
    typeof value.run_id === 'string' &&
    'file' in value &&
    typeof value.file === 'string'
  );
}

export function readRunIndex(runsDir: string): RunIndexEntry[] {
  const indexPath = join(runsDir, 'index.json');
  if (!existsSync(indexPath)) return [];
  const parsed: unknown = JSON.parse(readFileSync(indexPath, 'utf-8'));
  return Array.isArray(parsed) ? parsed.filter(isIndexEntry) : [];
}

function saveToIndex(runsDir: string, run: RunRecordV1, filePath: string, hash: string): void {
  // A rerun with identical inputs has the same run_id and replaces its entry
  const entries = readRunIndex(runsDir).filter((entry) => entry.run_id !== run.run_id);
  entries.push({
    run_id: run.run_id,
    run_date: run.run_date,
    file: basename(filePath),
    content_hash: hash,
    watchlist: run.watchlist.name,
    scored: run.summary.scored,
    failed: run.summary.failed,
  });
  entries.sort((a, b) => a.run_id.localeCompare(b.run_id));
  writeFileSync(join(runsDir, 'index.json'), JSON.stringify(entries, null, 2), 'utf-8');
}

export function writeRunRecord(
  run: RunRecordV1,
  runsDir: string = join(process.cwd(), 'data', 'runs')
): WriteResult {
  if (!existsSync(runsDir)) {
    mkdirSync(runsDir, { recursive: true });
  }

  const filePath = join(runsDir, `${run.run_id}.json`);
  const hash = contentHash(run);
  const content = JSON.stringify(run, null, 2);

  writeFileSync(filePath, content, 'utf-8');
  writeFileSync(join(runsDir, 'latest.json'), content, 'utf-8');
  saveToIndex(runsDir, run, filePath, hash);

  logger.info({ runId: run.run_id, filePath }, 'Run record written');

  return {
    runId: run.run_id,
    filePath,
    contentHash: hash,
  };
}
