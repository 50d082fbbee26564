/**
 * Run Validator
 * Validates run records against the schema
 */

import { validateRun, type ValidationResult } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import type { RunRecordV1 } from './types';

const logger = createChildLogger('run_validator');

export function validateRunRecord(data: unknown): ValidationResult<RunRecordV1> {
  const result = validateRun(data);

  if (!result.valid) {
    logger.error({ errors: result.errors }, 'Run validation failed');
  } else {
    logger.debug('Run validation passed');
  }

  return result;
}

export function validateAndThrow(data: unknown): RunRecordV1 {
  const result = validateRun(data);

  if (!result.valid || !result.data) {
    throw new Error(
      `Run validation failed: ${result.errors?.join('; ') ?? 'Unknown error'}`
    );
  }

  return result.data;
}

export interface ConsistencyCheck {
  passed: boolean;
  issues: string[];
}

export function checkRunConsistency(run: RunRecordV1): ConsistencyCheck {
  const issues: string[] = [];

  // Results follow the watchlist one-to-one, in watchlist order
  if (run.results.length !== run.watchlist.tickers.length) {
    issues.push(
      `Result count (${run.results.length}) doesn't match watchlist count (${run.watchlist.tickers.length})`
    );
  }
  run.results.forEach((entry, i) => {
    const expected = run.watchlist.tickers[i];
    if (expected !== undefined && entry.ticker !== expected) {
      issues.push(`Result ${i} is ${entry.ticker}, watchlist order expects ${expected}`);
    }
  });

  const scored = run.results.filter((entry) => entry.status === 'scored').length;
  if (run.summary.scored !== scored || run.summary.failed !== run.results.length - scored) {
    issues.push('Summary counts do not match results');
  }
  if (run.summary.total !== run.results.length) {
    issues.push(`Summary total (${run.summary.total}) doesn't match result count (${run.results.length})`);
  }

  for (const entry of run.results) {
    if (entry.status !== 'scored') continue;
    const composites = [entry.composites.short_term, entry.composites.mid_term, entry.composites.long_term];
    if (composites.some((v) => v < 1 || v > 20)) {
      issues.push(`Invalid composite scores for ${entry.ticker}`);
    }
  }

  return {
    passed: issues.length === 0,
    issues,
  };
}
