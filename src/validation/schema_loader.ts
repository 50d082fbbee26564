/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';

export interface Schema {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
  [keyword: string]: unknown;
}

export type SchemaName = 'security_snapshot.v1' | 'scoring_config.v1' | 'run.v1';

const SCHEMA_DIR = fileURLToPath(new URL('../../schemas', import.meta.url));

const schemaCache = new Map<SchemaName, Schema>();

export function loadSchema(schemaName: SchemaName): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(SCHEMA_DIR, `${schemaName}.schema.json`);
  const schema: Schema = JSON.parse(readFileSync(schemaPath, 'utf-8'));

  schemaCache.set(schemaName, schema);
  return schema;
}
