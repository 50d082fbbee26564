/**
 * Schema Validation Script
 * Compiles every schema, then checks the bundled presets and sample snapshots against them
 *
 * Usage: npx tsx scripts/validate_schemas.ts
 */

import { existsSync, readdirSync } from 'fs';
import { join } from 'path';
import {
  getRunValidator,
  getScoringConfigValidator,
  getSnapshotValidator,
} from '../src/validation/ajv_instance';
import { loadPresetConfig, mergeScoringConfig, validateScoringConfig } from '../src/scoring/scoring_config';
import { DEFAULT_SCORING_CONFIG } from '../src/scoring/scoring_defaults';
import { loadSnapshotFile } from '../src/data/snapshot_file';
import { parseSnapshot, tickerOf } from '../src/scoring/snapshot';
import { InvalidSnapshotError } from '../src/scoring/errors';

const projectRoot = process.cwd();

let hasErrors = false;

// Snapshot issues are reported without failing the script.
function check(label: string, run: () => string[], fatal: boolean = true): void {
  try {
    const issues = run();
    if (issues.length === 0) {
      console.log(`✓ ${label}`);
      return;
    }
    if (fatal) hasErrors = true;
    console.log(`${fatal ? '✗' : '!'} ${label}`);
    issues.forEach((issue) => console.log(`  ${issue}`));
  } catch (error) {
    hasErrors = true;
    console.log(`✗ ${label}`);
    console.log(`  Error: ${error instanceof Error ? error.message : String(error)}`);
  }
}

console.log('Compiling schemas...\n');
check('security_snapshot.v1', () => (getSnapshotValidator().schema ? [] : ['no schema']));
check('scoring_config.v1', () => (getScoringConfigValidator().schema ? [] : ['no schema']));
check('run.v1', () => (getRunValidator().schema ? [] : ['no schema']));

console.log('\nChecking presets...\n');
const presetsDir = join(projectRoot, 'config', 'presets');
const presets = existsSync(presetsDir)
  ? readdirSync(presetsDir).filter((f) => f.endsWith('.json'))
  : [];
for (const file of presets) {
  check(`config/presets/${file}`, () => {
    const preset = loadPresetConfig(projectRoot, file.replace(/\.json$/, ''));
    return validateScoringConfig(mergeScoringConfig(DEFAULT_SCORING_CONFIG, preset.config));
  });
}

const snapshotsPath = join(projectRoot, 'data', 'snapshots', 'latest.json');
if (existsSync(snapshotsPath)) {
  console.log('\nChecking sample snapshots...\n');
  for (const record of loadSnapshotFile(snapshotsPath)) {
    check(`snapshot ${tickerOf(record) || '<missing ticker>'}`, () => {
      try {
        parseSnapshot(record);
        return [];
      } catch (error) {
        if (error instanceof InvalidSnapshotError) return error.issues;
        throw error;
      }
    }, false);
  }
}

if (hasErrors) {
  console.log('\nSchema validation FAILED');
  process.exit(1);
} else {
  console.log('\nAll schemas and config files validated successfully');
}
