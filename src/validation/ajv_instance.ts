/**
 * Ajv validation instance with schema validators
 * Snapshots, scoring overrides and run records all pass through here
 */

import Ajv2020, { type ErrorObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { RawSecuritySnapshot } from '@/scoring/pure/types';
import type { RawScoringConfig } from '@/scoring/scoring_config';
import type { RunRecordV1 } from '@/run/types';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date-time etc.)
addFormats(ajv);

// Lazy-loaded validators
let snapshotValidator: ValidateFunction<RawSecuritySnapshot> | null = null;
let scoringConfigValidator: ValidateFunction<RawScoringConfig> | null = null;
let runValidator: ValidateFunction<RunRecordV1> | null = null;

export function getSnapshotValidator(): ValidateFunction<RawSecuritySnapshot> {
  if (!snapshotValidator) {
    snapshotValidator = ajv.compile<RawSecuritySnapshot>(loadSchema('security_snapshot.v1'));
  }
  return snapshotValidator;
}

export function getScoringConfigValidator(): ValidateFunction<RawScoringConfig> {
  if (!scoringConfigValidator) {
    scoringConfigValidator = ajv.compile<RawScoringConfig>(loadSchema('scoring_config.v1'));
  }
  return scoringConfigValidator;
}

export function getRunValidator(): ValidateFunction<RunRecordV1> {
  if (!runValidator) {
    runValidator = ajv.compile<RunRecordV1>(loadSchema('run.v1'));
  }
  return runValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (
    errors?.map((e) => `${e.instancePath || 'root'}: ${e.message ?? 'invalid'}`) ?? [
      'Unknown validation error',
    ]
  );
}

function runValidation<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  return { valid: false, data: null, errors: formatAjvErrors(validate.errors) };
}

export function validateSnapshotRecord(data: unknown): ValidationResult<RawSecuritySnapshot> {
  return runValidation(getSnapshotValidator(), data);
}

export function validateScoringOverride(data: unknown): ValidationResult<RawScoringConfig> {
  return runValidation(getScoringConfigValidator(), data);
}

export function validateRun(data: unknown): ValidationResult<RunRecordV1> {
  return runValidation(getRunValidator(), data);
}
