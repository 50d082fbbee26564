/**
 * Watchlist Run Script
 * Scores the latest snapshot drop against the watchlist and writes run.json
 *
 * Usage: npx tsx scripts/run_watchlist.ts [--watchlist=<name|path>] [--snapshots=<path>] [--preset=<name>]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config(); // Also load .env for any missing variables
import { loadConfig } from '../src/core/config';
import { getEnvConfig } from '../src/core/env';
import { loadSnapshotFile } from '../src/data/snapshot_file';
import { ScoringEngine } from '../src/scoring/engine';
import { getScoringConfig } from '../src/scoring/scoring_config';
import { scoreWatchlistRecords } from '../src/run/pipeline';
import { buildRunRecord } from '../src/run/builder';
import { writeRunRecord } from '../src/run/writer';
import { validateAndThrow, checkRunConsistency } from '../src/run/validator';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_watchlist');

interface WatchlistRunCliArgs {
  watchlist: string | null;
  snapshotsPath: string;
  preset: string | null;
}

function readFlag(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`--${name}=`));
  if (eqArg) return eqArg.slice(name.length + 3);
  const posIndex = process.argv.findIndex((arg) => arg === `--${name}`);
  return posIndex >= 0 ? process.argv[posIndex + 1] : undefined;
}

function applyCliArgs(): WatchlistRunCliArgs {
  const env = getEnvConfig();

  const watchlist = readFlag('watchlist') ?? env.watchlist;
  if (watchlist) {
    logger.info({ watchlist }, 'Using watchlist override');
  }

  const preset = readFlag('preset') ?? env.scoringPreset;
  if (preset) {
    logger.info({ preset }, 'Using scoring preset');
  }

  return {
    watchlist,
    snapshotsPath: resolve(
      process.cwd(),
      readFlag('snapshots') ?? env.snapshotsPath ?? 'data/snapshots/latest.json'
    ),
    preset,
  };
}

function main(): void {
  const startTime = Date.now();
  logger.info('Starting watchlist run');

  try {
    const cliArgs = applyCliArgs();

    const appConfig = loadConfig({ watchlist: cliArgs.watchlist });
    const scoringConfig = getScoringConfig({ presetName: cliArgs.preset });
    const engine = new ScoringEngine(scoringConfig);

    const records = loadSnapshotFile(cliArgs.snapshotsPath);

    logger.info({ tickerCount: appConfig.watchlist.tickers.length }, 'Scoring watchlist...');
    const batch = scoreWatchlistRecords(engine, appConfig.watchlist.tickers, records);

    logger.info(batch.summary, 'Scoring complete');

    // Build run record
    const runRecord = buildRunRecord(batch, {
      watchlistName: appConfig.watchlist.name,
      tickers: appConfig.watchlist.tickers,
      config: engine.config,
      preset: cliArgs.preset,
    });

    // Validate against schema
    validateAndThrow(runRecord);

    const consistency = checkRunConsistency(runRecord);
    if (!consistency.passed) {
      logger.warn({ issues: consistency.issues }, 'Run consistency issues detected');
    }

    const writeResult = writeRunRecord(runRecord);

    // Summary
    const duration = (Date.now() - startTime) / 1000;
    console.log('\n' + '='.repeat(50));
    console.log('WATCHLIST RUN COMPLETE');
    console.log('='.repeat(50));
    console.log(`Run ID:        ${runRecord.run_id}`);
    console.log(`Run Date:      ${runRecord.run_date}`);
    console.log(`Watchlist:     ${runRecord.watchlist.name}`);
    console.log(`Preset:        ${runRecord.scoring.preset ?? 'default'}`);
    console.log(`Scored:        ${runRecord.summary.scored}/${runRecord.summary.total}`);
    console.log(`Duration:      ${duration.toFixed(1)}s`);

    console.log('\nComposites (short / mid / long):');
    for (const entry of runRecord.results) {
      if (entry.status === 'scored') {
        const c = entry.composites;
        console.log(
          `  ${entry.ticker.padEnd(6)} ${c.short_term.toFixed(1)} / ${c.mid_term.toFixed(1)} / ${c.long_term.toFixed(1)}`
        );
        for (const warning of entry.warnings) {
          console.log(`         warning: ${warning}`);
        }
      } else {
        console.log(`  ${entry.ticker.padEnd(6)} FAILED: ${entry.error.issues.join('; ')}`);
      }
    }

    console.log('\nOutput Files:');
    console.log(`  - ${writeResult.filePath}`);
    console.log('='.repeat(50) + '\n');
  } catch (error) {
    logger.error({ error }, 'Watchlist run failed');
    console.error('Watchlist run failed:', error);
    process.exit(1);
  }
}

main();
