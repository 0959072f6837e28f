/**
 * Ajv validation instance with validators for the external payloads
 * Responses from SEC and Wikidata are checked before anything reads them
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import { loadSchema, type SchemaName } from './schema_loader';
import type {
  SecCompanyTickersPayload,
  WikidataEntityPayload,
  WikidataSearchPayload,
} from './payloads';

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
});

// Lazy-loaded validators
let secTickersValidator: ValidateFunction<SecCompanyTickersPayload> | null = null;
let wikidataSearchValidator: ValidateFunction<WikidataSearchPayload> | null = null;
let wikidataEntityValidator: ValidateFunction<WikidataEntityPayload> | null = null;

function compile<T>(name: SchemaName): ValidateFunction<T> {
  return ajv.compile<T>(loadSchema(name));
}

export function getSecTickersValidator(): ValidateFunction<SecCompanyTickersPayload> {
  if (!secTickersValidator) {
    secTickersValidator = compile<SecCompanyTickersPayload>('sec_company_tickers.v1');
  }
  return secTickersValidator;
}

export function getWikidataSearchValidator(): ValidateFunction<WikidataSearchPayload> {
  if (!wikidataSearchValidator) {
    wikidataSearchValidator = compile<WikidataSearchPayload>('wikidata_search.v1');
  }
  return wikidataSearchValidator;
}

export function getWikidataEntityValidator(): ValidateFunction<WikidataEntityPayload> {
  if (!wikidataEntityValidator) {
    wikidataEntityValidator = compile<WikidataEntityPayload>('wikidata_entity.v1');
  }
  return wikidataEntityValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateSecTickers(data: unknown): ValidationResult<SecCompanyTickersPayload> {
  return runValidator(getSecTickersValidator(), data);
}

export function validateWikidataSearch(data: unknown): ValidationResult<WikidataSearchPayload> {
  return runValidator(getWikidataSearchValidator(), data);
}

export function validateWikidataEntity(data: unknown): ValidationResult<WikidataEntityPayload> {
  return runValidator(getWikidataEntityValidator(), data);
}
