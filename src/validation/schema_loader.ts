/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { SchemaObject } from 'ajv';
import { ConfigError } from '@/core/errors';

export type SchemaName =
  | 'sec_company_tickers.v1'
  | 'wikidata_search.v1'
  | 'wikidata_entity.v1';

const schemaCache = new Map<SchemaName, SchemaObject>();

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadSchema(schemaName: SchemaName): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const projectRoot = process.cwd();
  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const parsed: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (!isSchemaObject(parsed)) {
    throw new ConfigError(`Schema ${schemaName} is not a JSON object`, schemaPath);
  }

  schemaCache.set(schemaName, parsed);
  return parsed;
}
