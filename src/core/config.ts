/**
 * Application configuration loaded from JSON files
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { getEnvConfig } from './env';
import { normalizeTicker } from '@/scoring/snapshot';

export interface WatchlistConfig {
  name: string;
  tickers: string[];
  description?: string;
  version?: string;
}

export interface AppConfig {
  watchlist: WatchlistConfig;
  watchlistPath: string;
  projectRoot: string;
}

function getProjectRoot(): string {
  return process.cwd();
}

export function resolveWatchlistPath(projectRoot: string, override?: string | null): string {
  const requested = override ?? getEnvConfig().watchlist;
  if (!requested) {
    return join(projectRoot, 'config', 'watchlist.json');
  }

  if (isAbsolute(requested)) return requested;
  if (requested.endsWith('.json') || requested.includes('/')) {
    return join(projectRoot, requested);
  }
  // Bare names refer to config/watchlists/<name>.json
  return join(projectRoot, 'config', 'watchlists', `${requested}.json`);
}

export function normalizeWatchlist(raw: unknown): WatchlistConfig {
  const parsed: Record<string, unknown> =
    raw && typeof raw === 'object' && !Array.isArray(raw) ? { ...raw } : {};
  const tickers = Array.isArray(parsed.tickers) ? parsed.tickers : [];
  const normalizedTickers: string[] = [];
  const seen = new Set<string>();
  for (const ticker of tickers) {
    if (typeof ticker !== 'string') continue;
    const upper = normalizeTicker(ticker);
    if (upper && !seen.has(upper)) {
      seen.add(upper);
      normalizedTickers.push(upper);
    }
  }

  return {
    name: typeof parsed.name === 'string' ? parsed.name : 'Watchlist',
    description: typeof parsed.description === 'string' ? parsed.description : '',
    version: typeof parsed.version === 'string' ? parsed.version : '1',
    tickers: normalizedTickers,
  };
}

export function loadConfig(options: { projectRoot?: string; watchlist?: string | null } = {}): AppConfig {
  const projectRoot = options.projectRoot ?? getProjectRoot();
  const watchlistPath = resolveWatchlistPath(projectRoot, options.watchlist);
  if (!existsSync(watchlistPath)) {
    throw new Error(`watchlist_not_found: ${watchlistPath}`);
  }

  const watchlist = normalizeWatchlist(JSON.parse(readFileSync(watchlistPath, 'utf-8')));
  if (watchlist.tickers.length === 0) {
    throw new Error(`watchlist_empty: ${watchlistPath}`);
  }

  return {
    watchlist,
    watchlistPath,
    projectRoot,
  };
}
