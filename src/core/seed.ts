/**
 * Deterministic hashing for reproducible run ids and config fingerprints
 */

import { createHash } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function contentHash(content: unknown): string {
  const normalized = stableStringify(content);
  return deterministicHash(normalized);
}

export function stableStringify(obj: unknown): string {
  if (obj === null || typeof obj !== 'object') {
    return JSON.stringify(obj) ?? 'null';
  }

  if (Array.isArray(obj)) {
    return '[' + obj.map(stableStringify).join(',') + ']';
  }

  const record: Record<string, unknown> = { ...obj };
  const keys = Object.keys(record)
    .filter((key) => record[key] !== undefined)
    .sort();
  const pairs = keys.map((key) => JSON.stringify(key) + ':' + stableStringify(record[key]));
  return '{' + pairs.join(',') + '}';
}
